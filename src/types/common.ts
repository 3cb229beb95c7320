/**
 * Common type definitions used throughout the project
 */

/**
 * Single battery readout, taken fresh on every poll
 */
export interface BatteryReading {
  /** Charge level in percent, 0-100 */
  readonly percent: number;
  /** Whether the laptop is on AC power, null when the platform cannot tell */
  readonly pluggedIn: boolean | null;
}

/**
 * Battery readout - null when no battery is present or readable
 */
export type BatterySample = BatteryReading | null;

/**
 * Plug power state as observed from the device
 */
export type PlugState = 'ON' | 'OFF' | 'UNKNOWN';
