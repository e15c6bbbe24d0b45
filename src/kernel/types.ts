export type ConstraintType = 'DEPRECATED_POSITIVE' | 'REQUIRED' | 'PROHIBITED';

export interface Constraint {
  readonly type: ConstraintType;
  readonly key: string;
  readonly value: string;
}

/**
 * A group of constraints applied to `numReplicas` replicas. Zero means the
 * group applies to every replica of the range.
 */
export interface ConstraintGroup {
  readonly constraints: readonly Constraint[];
  readonly numReplicas: number;
}

export type ConstraintGroupList = readonly ConstraintGroup[];

export interface LeasePreference {
  readonly constraints: readonly Constraint[];
}

export interface GCPolicy {
  readonly ttlSeconds: number;
}

export interface Subzone {
  readonly indexId: number;
  readonly partitionName: string;
  readonly config: ZoneConfig;
}

export interface SubzoneSpan {
  readonly key: string;
  readonly endKey: string;
  readonly subzoneIndex: number;
}

export interface ZoneConfig {
  readonly rangeMinBytes: number;
  readonly rangeMaxBytes: number;
  readonly gc: GCPolicy;
  readonly numReplicas: number;
  readonly constraints: ConstraintGroupList;
  readonly leasePreferences: readonly LeasePreference[];
  readonly subzones: readonly Subzone[];
  readonly subzoneSpans: readonly SubzoneSpan[];
}

export type DocumentFormat = 'yaml' | 'json';
