/**
 * PermissionBroker — turns capability requests into decisions by handing
 * each one to the registered policy authority and collecting the answers.
 *
 * Flow for a batch:
 *  1. requestBatch() stores a PendingRequest in the table under a fresh id
 *  2. The request handler is called once per slot with a respond function
 *     bound to (requestId, slotIndex)
 *  3. Each respond call lands in onResponse(), which fills the slot
 *  4. When the last slot is filled the request leaves the table and the
 *     caller's callback receives the statuses in request order
 *
 * With no handler registered every path fails open: requests are granted
 * and checks pass.
 */

import { loadConfig, type BrokerConfig } from './config.js';
import { PermissionContractError } from './errors.js';
import type {
  CheckHandler,
  DeviceCheckHandler,
  DeviceGrantHandler,
  RequestHandler,
} from './handlers.js';
import { PendingRequest } from './pending-request.js';
import { PendingRequestTable } from './pending-request-table.js';
import { applyGrantSideEffect, type CapabilitySideEffects } from './side-effects.js';
import {
  INVALID_SUBSCRIPTION_ID,
  type CheckDetails,
  type DeviceDescriptor,
  type DeviceDetails,
  type DevicePermissionKind,
  type ExecutionContext,
  type PermissionDetails,
  type PermissionKind,
  type PermissionStatus,
  type RequestDetails,
  type StatusCallback,
  type StatusesCallback,
} from './types.js';

export interface PermissionBrokerOptions {
  /** Defaults to `loadConfig()` */
  config?: BrokerConfig;
  /** Hooks run once per granted capability */
  sideEffects?: CapabilitySideEffects;
}

export class PermissionBroker {
  private readonly pending = new PendingRequestTable<PendingRequest>();
  private readonly config: BrokerConfig;
  private readonly sideEffects: CapabilitySideEffects;

  private requestHandler?: RequestHandler;
  private checkHandler?: CheckHandler;
  private deviceCheckHandler?: DeviceCheckHandler;
  private deviceGrantHandler?: DeviceGrantHandler;

  constructor(options: PermissionBrokerOptions = {}) {
    this.config = options.config ?? loadConfig();
    this.sideEffects = options.sideEffects ?? {};
  }

  // ── Handler registration ──────────────────────────────────────────────

  /**
   * Replace the request handler. Requests already dispatched keep the
   * handler they were dispatched to.
   *
   * Clearing the handler flushes every outstanding request: callbacks run
   * with whatever has been answered so far (the rest stays denied), except
   * for requests whose context is gone, which are dropped silently.
   */
  setRequestHandler(handler: RequestHandler | undefined): void {
    if (handler || this.pending.isEmpty()) {
      this.requestHandler = handler;
      return;
    }

    const flushed = this.pending.drain();
    this.requestHandler = undefined;
    this.debug(() => `Request handler cleared, flushing ${flushed.length} pending request(s)`);

    for (const [requestId, request] of flushed) {
      const context = request.resolveContext();
      if (!context || context.isBeingDestroyed()) {
        this.debug(() => `Dropping request ${requestId}: context ${request.ownerId} is gone`);
        continue;
      }
      this.runCompletion(requestId, request);
    }
  }

  setCheckHandler(handler: CheckHandler | undefined): void {
    this.checkHandler = handler;
  }

  setDevicePermissionHandler(handler: DeviceCheckHandler | undefined): void {
    this.deviceCheckHandler = handler;
  }

  setGrantDevicePermissionHandler(handler: DeviceGrantHandler | undefined): void {
    this.deviceGrantHandler = handler;
  }

  // ── Request path ──────────────────────────────────────────────────────

  /**
   * Ask for a single capability. The callback receives its status.
   */
  request(
    kind: PermissionKind,
    context: ExecutionContext,
    requestingOrigin: string,
    userGesture: boolean,
    details: PermissionDetails | undefined,
    callback: StatusCallback,
  ): void {
    this.requestBatch([kind], context, requestingOrigin, userGesture, details, (statuses) =>
      callback(statuses[0]),
    );
  }

  /**
   * Ask for several capabilities as one unit. The callback receives one
   * status per kind, in the order given, once every kind has been decided.
   *
   * Empty batches and batches made while no request handler is registered
   * complete synchronously. A callback that throws is logged, on every path.
   *
   * A handler that throws while deciding a slot is logged and that slot is
   * denied; the remaining slots are still dispatched.
   */
  requestBatch(
    permissionKinds: readonly PermissionKind[],
    context: ExecutionContext,
    requestingOrigin: string,
    userGesture: boolean,
    details: PermissionDetails | undefined,
    callback: StatusesCallback,
  ): void {
    if (permissionKinds.length === 0) {
      this.invokeCallback('empty request', () => callback([]));
      return;
    }

    const handler = this.requestHandler;
    if (!handler) {
      const statuses = permissionKinds.map((kind): PermissionStatus => {
        applyGrantSideEffect(this.sideEffects, kind, context.id);
        return 'granted';
      });
      this.invokeCallback('unhandled request', () => callback(statuses));
      return;
    }

    const request = new PendingRequest(context, permissionKinds, callback, this.sideEffects);
    const requestId = this.pending.add(request);
    this.debug(
      () =>
        `Dispatching request ${requestId} [${permissionKinds.join(', ')}] from ${requestingOrigin}` +
        (userGesture ? ' (user gesture)' : ''),
    );

    const requestingUrl = context.getLastCommittedUrl();
    const isMainFrame = !context.hasParent();

    permissionKinds.forEach((kind, slotIndex) => {
      const respond: StatusCallback = (status) => this.onResponse(requestId, slotIndex, status);
      const slotDetails: RequestDetails = { ...details, requestingUrl, isMainFrame };
      try {
        handler(context, kind, respond, slotDetails);
      } catch (err) {
        console.error(
          `[PermissionBroker] Request handler threw for request ${requestId} slot ${slotIndex}:`,
          err,
        );
        if (this.pending.lookup(requestId)?.isSlotResolved(slotIndex) === false) {
          this.onResponse(requestId, slotIndex, 'denied');
        }
      }
    });
  }

  /**
   * Promise form of `requestBatch`. Never settles if the handler never
   * answers, nor if the request handler is cleared after the requesting
   * context has gone away (the flush drops such requests without a
   * callback). Wrap it in your own timeout if you need one.
   */
  requestBatchAsync(
    permissionKinds: readonly PermissionKind[],
    context: ExecutionContext,
    requestingOrigin: string,
    userGesture = false,
    details?: PermissionDetails,
  ): Promise<PermissionStatus[]> {
    return new Promise<PermissionStatus[]>((resolve) => {
      this.requestBatch(permissionKinds, context, requestingOrigin, userGesture, details, resolve);
    });
  }

  /**
   * Promise form of `request`. Settles under the same conditions as
   * `requestBatchAsync`.
   */
  requestAsync(
    kind: PermissionKind,
    context: ExecutionContext,
    requestingOrigin: string,
    userGesture = false,
    details?: PermissionDetails,
  ): Promise<PermissionStatus> {
    return new Promise<PermissionStatus>((resolve) => {
      this.request(kind, context, requestingOrigin, userGesture, details, resolve);
    });
  }

  /**
   * Deliver the answer for one slot. Unknown ids (finished, flushed or
   * never issued) are ignored.
   */
  onResponse(requestId: number, slotIndex: number, status: PermissionStatus): void {
    const request = this.pending.lookup(requestId);
    if (!request) return;

    try {
      request.resolveSlot(slotIndex, status);
    } catch (err) {
      if (!(err instanceof PermissionContractError)) throw err;
      const violation = new PermissionContractError(err.message, requestId, slotIndex);
      if (this.config.CONTRACT_VIOLATION === 'throw') throw violation;
      console.warn(`[PermissionBroker] Ignoring response for request ${requestId}:`, violation.message);
      return;
    }

    if (!request.isComplete()) return;

    this.pending.remove(requestId);
    this.runCompletion(requestId, request);
  }

  // ── Diagnostics ───────────────────────────────────────────────────────

  /**
   * Number of batches still waiting for answers.
   */
  pendingCount(): number {
    return this.pending.size;
  }

  isRequestPending(requestId: number): boolean {
    return this.pending.has(requestId);
  }

  // ── Check path ────────────────────────────────────────────────────────

  /**
   * Synchronous check against the check handler. Passes when none is
   * registered.
   */
  checkWithDetails(
    kind: PermissionKind,
    context: ExecutionContext | undefined,
    requestingOrigin: string,
    details?: PermissionDetails,
  ): boolean {
    const handler = this.checkHandler;
    if (!handler) return true;

    const checkDetails: CheckDetails = {
      ...details,
      isMainFrame: context ? !context.hasParent() : false,
    };
    if (context) {
      checkDetails.requestingUrl = context.getLastCommittedUrl();
    }
    if (kind === 'audio-capture') {
      checkDetails.mediaType = 'audio';
    } else if (kind === 'video-capture') {
      checkDetails.mediaType = 'video';
    }

    return handler(context, kind, requestingOrigin, checkDetails);
  }

  getStatus(kind: PermissionKind, requestingOrigin: string, embeddingOrigin: string): PermissionStatus {
    const granted = this.checkWithDetails(kind, undefined, requestingOrigin, { embeddingOrigin });
    return granted ? 'granted' : 'denied';
  }

  getStatusForFrame(
    kind: PermissionKind,
    context: ExecutionContext,
    requestingOrigin: string,
  ): PermissionStatus {
    const granted = this.checkWithDetails(kind, context, requestingOrigin, {});
    return granted ? 'granted' : 'denied';
  }

  // ── Device path ───────────────────────────────────────────────────────

  /**
   * Ask whether `origin` may use `device`. Falls back to the context's own
   * default handler when no device check handler is registered.
   */
  checkDevice(
    kind: DevicePermissionKind,
    context: ExecutionContext,
    origin: URL,
    device: DeviceDescriptor,
  ): boolean {
    const details = this.buildDeviceDetails(kind, context, origin, device);
    if (!this.deviceCheckHandler) {
      return context.defaultDevicePermissionHandler(details);
    }
    return this.deviceCheckHandler(details);
  }

  /**
   * Tell the policy authority that `origin` was given `device`. Falls back
   * to the context's own default handler when none is registered.
   */
  grantDevice(
    kind: DevicePermissionKind,
    context: ExecutionContext,
    origin: URL,
    device: DeviceDescriptor,
  ): void {
    const details = this.buildDeviceDetails(kind, context, origin, device);
    if (!this.deviceGrantHandler) {
      context.defaultGrantDevicePermissionHandler(details);
      return;
    }
    this.deviceGrantHandler(details);
  }

  // ── Unsupported surface ───────────────────────────────────────────────

  /** Revocation is not modelled; policy authorities track it themselves. */
  resetPermission(_kind: PermissionKind, _requestingOrigin: string, _embeddingOrigin: string): void {}

  /** Status changes are never reported. */
  subscribeStatusChange(
    _kind: PermissionKind,
    _context: ExecutionContext,
    _requestingOrigin: string,
    _callback: StatusCallback,
  ): number {
    return INVALID_SUBSCRIPTION_ID;
  }

  unsubscribeStatusChange(_subscriptionId: number): void {}

  // ── Internals ─────────────────────────────────────────────────────────

  private buildDeviceDetails(
    kind: DevicePermissionKind,
    context: ExecutionContext,
    origin: URL,
    device: DeviceDescriptor,
  ): DeviceDetails {
    return {
      deviceType: kind,
      origin: origin.origin,
      device: structuredClone(device),
      context,
    };
  }

  private runCompletion(requestId: number, request: PendingRequest): void {
    this.debug(() => `Completing request ${requestId} with [${request.results.join(', ')}]`);
    this.invokeCallback(`request ${requestId}`, () => request.runCallback());
  }

  private invokeCallback(label: string, run: () => void): void {
    try {
      run();
    } catch (err) {
      console.error(`[PermissionBroker] Completion callback for ${label} threw:`, err);
    }
  }

  private debug(message: () => string): void {
    if (this.config.DEBUG) {
      console.debug(`[PermissionBroker] ${message()}`);
    }
  }
}
