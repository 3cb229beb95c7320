export type { BatteryReading, BatterySample, PlugState } from './common';
export type {
  ChargeUserConfig,
  ChargeAppConstants,
  ChargeConfig,
  PlugBackend,
  UnverifiedCommandPolicy
} from './config';
export {
  ValidationError,
  ConfigValidationError,
  ChargePolicyValidationError,
  PlugError,
  PlugApiError,
  PlugTimeoutError,
  PlugNotFoundError,
  BatterySensorError,
  errorMessage
} from './errors';
export type { ConfigFieldError } from './errors';
