/**
 * Battery sensor type definitions
 */

import type { BatterySample } from '$types/common';

/**
 * Source of battery readouts
 * `read` resolves null when no battery is present; it never throws for that case
 */
export interface BatterySensor {
  read(): Promise<BatterySample>;
}

/**
 * OS access used by the platform readers, injected so tests need no real hardware
 */
export interface BatteryReaderDeps {
  /** Run a program and resolve its stdout */
  execFile(file: string, args: readonly string[], timeoutMs: number): Promise<string>;
  /** Read a text file */
  readFile(path: string): Promise<string>;
  /** List a directory */
  readdir(path: string): Promise<string[]>;
}

export type BatteryPlatform = 'linux' | 'darwin' | 'win32' | 'other';
