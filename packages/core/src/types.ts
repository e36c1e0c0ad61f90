// ─── Capability kinds ───────────────────────────────────────────────────────

export type DevicePermissionKind = 'hid' | 'serial' | 'usb' | 'bluetooth';

export type PermissionKind =
  | 'geolocation'
  | 'notifications'
  | 'midi'
  | 'midi-sysex'
  | 'audio-capture'
  | 'video-capture'
  | 'display-capture'
  | 'clipboard-read'
  | 'clipboard-sanitized-write'
  | 'idle-detection'
  | 'sensors'
  | 'storage-access'
  | 'window-management'
  | 'fullscreen'
  | 'pointer-lock'
  | 'keyboard-lock'
  | 'background-sync'
  | 'protected-media-identifier'
  | DevicePermissionKind;

export type PermissionStatus = 'granted' | 'denied' | 'ask';

/** Status every slot of a batch holds until the policy authority answers. */
export const DEFAULT_PERMISSION_STATUS: PermissionStatus = 'denied';

/** Returned by `subscribeStatusChange`; the broker keeps no subscriptions. */
export const INVALID_SUBSCRIPTION_ID = -1;

// ─── Details dictionaries ───────────────────────────────────────────────────

/** Caller-supplied, open-ended details. The broker only ever adds keys. */
export type PermissionDetails = Record<string, unknown>;

export type RequestDetails = PermissionDetails & {
  /** Last committed URL of the requesting context */
  requestingUrl: string;
  /** True when the requesting context has no parent */
  isMainFrame: boolean;
};

export type MediaType = 'audio' | 'video';

export type CheckDetails = PermissionDetails & {
  requestingUrl?: string;
  isMainFrame: boolean;
  mediaType?: MediaType;
};

export type DeviceDescriptor = Record<string, unknown>;

export interface DeviceDetails {
  deviceType: DevicePermissionKind;
  /** Serialized origin, e.g. `https://example.test` */
  origin: string;
  device: DeviceDescriptor;
  context: ExecutionContext;
}

// ─── Execution context (host-provided) ──────────────────────────────────────

/**
 * Weak handle to an execution context. Resolves to `undefined` once the
 * context has gone away.
 */
export interface ContextRef {
  resolve(): ExecutionContext | undefined;
}

/**
 * The requesting context as the embedding host sees it (a frame, a tab,
 * a worker). The broker never decides anything from it; it only reads
 * location data for the details dictionaries and asks whether it is still
 * alive.
 */
export interface ExecutionContext {
  readonly id: string;
  getWeakRef(): ContextRef;
  getLastCommittedUrl(): string;
  hasParent(): boolean;
  isBeingDestroyed(): boolean;

  /** Used by `checkDevice` when no device check handler is registered */
  defaultDevicePermissionHandler(details: DeviceDetails): boolean;

  /** Used by `grantDevice` when no device grant handler is registered */
  defaultGrantDevicePermissionHandler(details: DeviceDetails): void;
}

// ─── Callbacks ──────────────────────────────────────────────────────────────

export type StatusCallback = (status: PermissionStatus) => void;

export type StatusesCallback = (statuses: PermissionStatus[]) => void;
