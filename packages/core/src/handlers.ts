import type {
  CheckDetails,
  DeviceDetails,
  ExecutionContext,
  PermissionKind,
  RequestDetails,
  StatusCallback,
} from './types.js';

// ─── Policy authority signatures ────────────────────────────────────────────

/**
 * Decides one slot of a batch. `respond` may be called now, later, or never;
 * only one answer per slot is accepted.
 */
export type RequestHandler = (
  context: ExecutionContext,
  kind: PermissionKind,
  respond: StatusCallback,
  details: RequestDetails,
) => void;

/** Synchronous "is this allowed right now" answer. */
export type CheckHandler = (
  context: ExecutionContext | undefined,
  kind: PermissionKind,
  requestingOrigin: string,
  details: CheckDetails,
) => boolean;

export type DeviceCheckHandler = (details: DeviceDetails) => boolean;

export type DeviceGrantHandler = (details: DeviceDetails) => void;
