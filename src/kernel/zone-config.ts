import type { ZoneConfig } from './types.js';

export const DEFAULT_RANGE_MIN_BYTES = 1 << 20;
export const DEFAULT_RANGE_MAX_BYTES = 64 << 20;
export const DEFAULT_GC_TTL_SECONDS = 25 * 60 * 60;
export const DEFAULT_NUM_REPLICAS = 3;

export function createEmptyZoneConfig(): ZoneConfig {
  return {
    rangeMinBytes: 0,
    rangeMaxBytes: 0,
    gc: { ttlSeconds: 0 },
    numReplicas: 0,
    constraints: [],
    leasePreferences: [],
    subzones: [],
    subzoneSpans: [],
  };
}

export function createDefaultZoneConfig(): ZoneConfig {
  return {
    ...createEmptyZoneConfig(),
    rangeMinBytes: DEFAULT_RANGE_MIN_BYTES,
    rangeMaxBytes: DEFAULT_RANGE_MAX_BYTES,
    gc: { ttlSeconds: DEFAULT_GC_TTL_SECONDS },
    numReplicas: DEFAULT_NUM_REPLICAS,
  };
}
