export { TPLinkCloudClient } from './client';
export { createTPLinkCloudDriver } from './driver';
export { deviceFamily, selectDevice, decodeNickname } from './helpers';
export type { TPLinkCloudClientConfig, TPLinkCloudDevice, TPLinkDeviceFamily, TPLinkSysInfo } from './types';
