import type { PermissionKind } from './types.js';

export interface CapabilityGrant {
  kind: PermissionKind;
  /** Id of the context the grant was made for */
  ownerId: string;
}

/**
 * Action the embedding platform runs when a capability is granted, e.g.
 * opting into location services for `geolocation` or allowing system
 * exclusive messages for `midi-sysex`.
 */
export type CapabilitySideEffect = (grant: CapabilityGrant) => void;

export type CapabilitySideEffects = Partial<Record<PermissionKind, CapabilitySideEffect>>;

/**
 * Run the hook registered for `kind`, if any. Call only for grants.
 */
export function applyGrantSideEffect(
  sideEffects: CapabilitySideEffects,
  kind: PermissionKind,
  ownerId: string,
): void {
  sideEffects[kind]?.({ kind, ownerId });
}
