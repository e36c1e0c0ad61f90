// ─── Types ──────────────────────────────────────────────────────────────────
export type {
  PermissionKind,
  DevicePermissionKind,
  PermissionStatus,
  PermissionDetails,
  RequestDetails,
  CheckDetails,
  MediaType,
  DeviceDescriptor,
  DeviceDetails,
  ContextRef,
  ExecutionContext,
  StatusCallback,
  StatusesCallback,
} from './types.js';
export { DEFAULT_PERMISSION_STATUS, INVALID_SUBSCRIPTION_ID } from './types.js';

// ─── Config ─────────────────────────────────────────────────────────────────
export { configSchema, loadConfig } from './config.js';
export type { BrokerConfig } from './config.js';

// ─── Errors ─────────────────────────────────────────────────────────────────
export { PermissionContractError } from './errors.js';

// ─── Policy authority ───────────────────────────────────────────────────────
export type {
  RequestHandler,
  CheckHandler,
  DeviceCheckHandler,
  DeviceGrantHandler,
} from './handlers.js';
export { applyGrantSideEffect } from './side-effects.js';
export type {
  CapabilityGrant,
  CapabilitySideEffect,
  CapabilitySideEffects,
} from './side-effects.js';

// ─── Bookkeeping ────────────────────────────────────────────────────────────
export { PendingRequest } from './pending-request.js';
export { PendingRequestTable } from './pending-request-table.js';

// ─── Broker ─────────────────────────────────────────────────────────────────
export { PermissionBroker } from './permission-broker.js';
export type { PermissionBrokerOptions } from './permission-broker.js';
