import { LifecycleAction, TransactionStatus } from '../enums';

/**
 * Stable machine-readable error codes
 */
export type TransactionErrorCode =
  | 'INVALID_ARGUMENT'
  | 'TRANSACTION_NOT_FOUND'
  | 'INVALID_STATE'
  | 'INVALID_REFUND_AMOUNT';

/**
 * Base class for every rejection raised by the lifecycle service
 */
export abstract class TransactionError extends Error {
  abstract readonly code: TransactionErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }

  /**
   * Diagnostic fields carried by the error
   */
  abstract get details(): Record<string, unknown>;
}

/**
 * Malformed command input (empty owner id, non-positive amount)
 */
export class InvalidArgumentError extends TransactionError {
  readonly code = 'INVALID_ARGUMENT';

  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
  }

  get details(): Record<string, unknown> {
    return { field: this.field };
  }
}

/**
 * No record exists for the referenced id
 */
export class TransactionNotFoundError extends TransactionError {
  readonly code = 'TRANSACTION_NOT_FOUND';

  constructor(public readonly transactionId: string) {
    super(`Transaction not found: ${transactionId}`);
  }

  get details(): Record<string, unknown> {
    return { transactionId: this.transactionId };
  }
}

/**
 * Command is not legal in the transaction's current status
 */
export class InvalidTransactionStateError extends TransactionError {
  readonly code = 'INVALID_STATE';

  constructor(
    public readonly transactionId: string,
    public readonly currentStatus: TransactionStatus,
    public readonly action: LifecycleAction,
  ) {
    super(
      `Cannot ${action} transaction ${transactionId} in status ${currentStatus}`,
    );
  }

  get details(): Record<string, unknown> {
    return {
      transactionId: this.transactionId,
      currentStatus: this.currentStatus,
      action: this.action,
    };
  }
}

/**
 * Refund larger than the remaining refundable balance
 */
export class InvalidRefundAmountError extends TransactionError {
  readonly code = 'INVALID_REFUND_AMOUNT';

  constructor(
    public readonly transactionId: string,
    public readonly requestedAmount: number,
    public readonly availableAmount: number,
  ) {
    super(
      `Cannot refund ${requestedAmount} for transaction ${transactionId}. Available: ${availableAmount}`,
    );
  }

  get details(): Record<string, unknown> {
    return {
      transactionId: this.transactionId,
      requestedAmount: this.requestedAmount,
      availableAmount: this.availableAmount,
    };
  }
}
