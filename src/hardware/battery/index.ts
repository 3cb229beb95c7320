export { createSystemBatterySensor, createNodeReaderDeps, POWER_SUPPLY_ROOT } from './battery';
export {
  parsePmsetOutput,
  parseWin32BatteryOutput,
  parseSysfsStatus,
  toBatteryPlatform
} from './helpers';
export type { BatterySensor, BatteryReaderDeps, BatteryPlatform } from './types';
