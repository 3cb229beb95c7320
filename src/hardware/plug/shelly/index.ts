export { ShellyRPCClient, toRpcUrl } from './client';
export { createShellyDriver } from './driver';
export type { ShellyClientConfig, ShellyDeviceInfo, ShellySwitchStatus } from './types';
