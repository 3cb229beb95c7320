export { decide } from './charge-policy';
export { validateChargePolicyConfig, validatePercent, toChargePolicyConfig } from './helpers';
export type { ChargeAction, ChargePolicyConfig, NoOpReason } from './types';
