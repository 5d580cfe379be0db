import type { ReconPolicy } from './types.js';

export const DEFAULT_TIMEOUT_MS = 15_000;

export const DEFAULT_NAME_WIDTH = 40;

export const DEFAULT_VALUE_WIDTH = 20;

/** Broker settings shown by `cluster`; everything else is dropped. */
export const DEFAULT_CONFIG_ALLOW_LIST: readonly string[] = ['ssl.client.auth'];

export const DEFAULT_RECON_POLICY: Readonly<ReconPolicy> = {
  timeoutMs: DEFAULT_TIMEOUT_MS,
  allowList: DEFAULT_CONFIG_ALLOW_LIST,
  nameWidth: DEFAULT_NAME_WIDTH,
  valueWidth: DEFAULT_VALUE_WIDTH,
};

function positiveInteger(value: number | undefined, fallback: number): number {
  if (typeof value === 'number' && Number.isFinite(value) && Number.isInteger(value) && value > 0) {
    return value;
  }
  return fallback;
}

export function resolveReconPolicy(overrides: Partial<ReconPolicy> = {}): ReconPolicy {
  return {
    timeoutMs: positiveInteger(overrides.timeoutMs, DEFAULT_TIMEOUT_MS),
    allowList: overrides.allowList ? [...overrides.allowList] : [...DEFAULT_CONFIG_ALLOW_LIST],
    nameWidth: positiveInteger(overrides.nameWidth, DEFAULT_NAME_WIDTH),
    valueWidth: positiveInteger(overrides.valueWidth, DEFAULT_VALUE_WIDTH),
  };
}
