/**
 * PendingRequest — aggregates the answers for one batch of capability
 * requests until every slot has been resolved.
 *
 * Slot `i` of `results` belongs to `permissionKinds[i]`. Unanswered slots
 * hold the default denial, which is what a flushed request reports.
 */

import { PermissionContractError } from './errors.js';
import { applyGrantSideEffect, type CapabilitySideEffects } from './side-effects.js';
import {
  DEFAULT_PERMISSION_STATUS,
  type ContextRef,
  type ExecutionContext,
  type PermissionKind,
  type PermissionStatus,
  type StatusesCallback,
} from './types.js';

export class PendingRequest {
  readonly ownerId: string;
  readonly permissionKinds: readonly PermissionKind[];

  private readonly contextRef: ContextRef;
  private readonly statuses: PermissionStatus[];
  private readonly resolved: boolean[];
  private remainingResults: number;
  private callback?: StatusesCallback;

  constructor(
    context: ExecutionContext,
    permissionKinds: readonly PermissionKind[],
    callback: StatusesCallback,
    private readonly sideEffects: CapabilitySideEffects = {},
  ) {
    this.ownerId = context.id;
    this.contextRef = context.getWeakRef();
    this.permissionKinds = Object.freeze([...permissionKinds]);
    this.statuses = this.permissionKinds.map(() => DEFAULT_PERMISSION_STATUS);
    this.resolved = this.permissionKinds.map(() => false);
    this.remainingResults = this.permissionKinds.length;
    this.callback = callback;
  }

  /**
   * Record the answer for one slot.
   *
   * Throws `PermissionContractError` (leaving all state untouched) if the
   * request is already complete, the slot is out of range, or the slot was
   * already answered.
   */
  resolveSlot(slotIndex: number, status: PermissionStatus): void {
    if (this.isComplete()) {
      throw new PermissionContractError(
        `Slot ${slotIndex} answered after the request completed`,
        undefined,
        slotIndex,
      );
    }
    if (!Number.isInteger(slotIndex) || slotIndex < 0 || slotIndex >= this.statuses.length) {
      throw new PermissionContractError(
        `Slot ${slotIndex} is out of range for a batch of ${this.statuses.length}`,
        undefined,
        slotIndex,
      );
    }
    if (this.resolved[slotIndex]) {
      throw new PermissionContractError(`Slot ${slotIndex} was already answered`, undefined, slotIndex);
    }

    if (status === 'granted') {
      applyGrantSideEffect(this.sideEffects, this.permissionKinds[slotIndex], this.ownerId);
    }

    this.statuses[slotIndex] = status;
    this.resolved[slotIndex] = true;
    this.remainingResults--;
  }

  /** False for unanswered and out-of-range slots alike. */
  isSlotResolved(slotIndex: number): boolean {
    return this.resolved[slotIndex] === true;
  }

  isComplete(): boolean {
    return this.remainingResults === 0;
  }

  get remaining(): number {
    return this.remainingResults;
  }

  /** Copy of the current per-slot statuses. */
  get results(): PermissionStatus[] {
    return [...this.statuses];
  }

  /**
   * Hand the results to the completion callback. Only the first call does
   * anything.
   */
  runCallback(): void {
    const callback = this.callback;
    if (!callback) return;
    this.callback = undefined;
    callback([...this.statuses]);
  }

  /**
   * The requesting context, or `undefined` once it is gone.
   */
  resolveContext(): ExecutionContext | undefined {
    return this.contextRef.resolve();
  }
}
