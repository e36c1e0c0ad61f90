/**
 * Raised when a caller breaks a precondition of the batch bookkeeping,
 * e.g. a policy handler answering the same slot twice.
 */
export class PermissionContractError extends Error {
  constructor(
    message: string,
    readonly requestId?: number,
    readonly slotIndex?: number,
  ) {
    super(message);
    this.name = 'PermissionContractError';
  }
}
