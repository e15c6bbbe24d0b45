import type {
  ConstraintGroupList,
  GCPolicy,
  LeasePreference,
  Subzone,
  SubzoneSpan,
  ZoneConfig,
} from '../kernel/types.js';

export type Presence<T> =
  | { readonly kind: 'absent' }
  | { readonly kind: 'present'; readonly value: T };

export const ABSENT: Presence<never> = { kind: 'absent' };

export const present = <T>(value: T): Presence<T> => ({ kind: 'present', value });

/**
 * Document-facing twin of {@link ZoneConfig}. It also carries the deprecated
 * `experimental_lease_preferences` field, which is read but never written.
 * A fresh value is built for every encode and decode.
 */
export interface MarshalableZoneConfig {
  readonly rangeMinBytes: number;
  readonly rangeMaxBytes: number;
  readonly gc: GCPolicy;
  readonly numReplicas: number;
  readonly constraints: ConstraintGroupList;
  readonly leasePreferences: readonly LeasePreference[];
  readonly experimentalLeasePreferences: Presence<readonly LeasePreference[]>;
  readonly subzones: readonly Subzone[];
  readonly subzoneSpans: readonly SubzoneSpan[];
}

export type MarshalableZoneConfigDraft = {
  -readonly [Key in keyof MarshalableZoneConfig]: MarshalableZoneConfig[Key];
};

export function zoneConfigToMarshalable(config: ZoneConfig): MarshalableZoneConfig {
  let numReplicas = 0;
  // Some backends tell an explicit zero apart from an unset field.
  if (config.numReplicas !== 0) {
    numReplicas = config.numReplicas;
  }

  return {
    rangeMinBytes: config.rangeMinBytes,
    rangeMaxBytes: config.rangeMaxBytes,
    gc: config.gc,
    numReplicas,
    constraints: config.constraints,
    leasePreferences: config.leasePreferences,
    experimentalLeasePreferences: ABSENT,
    subzones: config.subzones,
    subzoneSpans: config.subzoneSpans,
  };
}

export function zoneConfigFromMarshalable(marshalable: MarshalableZoneConfig): ZoneConfig {
  // Stored configs never carry the deprecated field, so when it is present it
  // came from the document being applied and overrides whatever
  // lease_preferences was seeded from storage.
  const leasePreferences =
    marshalable.experimentalLeasePreferences.kind === 'present'
      ? marshalable.experimentalLeasePreferences.value
      : marshalable.leasePreferences;

  return {
    rangeMinBytes: marshalable.rangeMinBytes,
    rangeMaxBytes: marshalable.rangeMaxBytes,
    gc: marshalable.gc,
    numReplicas: marshalable.numReplicas,
    constraints: marshalable.constraints,
    leasePreferences,
    subzones: marshalable.subzones,
    subzoneSpans: marshalable.subzoneSpans,
  };
}
