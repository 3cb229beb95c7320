export { createPlugController } from './plug';
export { toPlugState, plugIsOn, resolveUnverified } from './helpers';
export { postJson } from './http';
export { ShellyRPCClient, createShellyDriver } from './shelly';
export { TPLinkCloudClient, createTPLinkCloudDriver } from './tplink';
export type {
  PlugController,
  PlugControllerOptions,
  PlugControllerDependencies,
  PlugDriver,
  PlugDeviceInfo
} from './types';
