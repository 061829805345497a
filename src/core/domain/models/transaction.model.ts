import { TransactionStatus, isTerminalStatus } from '../enums';
import { addAmounts, subtractAmounts } from '../value-objects/amount.vo';

/**
 * Serialisable shape of a transaction, as stored and as returned over the API
 */
export interface TransactionSnapshot {
  id: string;
  ownerId: string;
  capturedAmount: number;
  refundedAmount: number;
  refundableAmount: number;
  status: TransactionStatus;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Transaction domain model - the source of truth for payment state
 * Pure TypeScript class with no framework dependencies
 */
export class Transaction {
  constructor(
    public readonly id: string,
    public readonly ownerId: string,
    public readonly capturedAmount: number,
    private _status: TransactionStatus = TransactionStatus.CREATED,
    private _refundedAmount = 0,
    public readonly createdAt: Date = new Date(),
    private _updatedAt: Date = createdAt,
  ) {}

  get status(): TransactionStatus {
    return this._status;
  }

  get refundedAmount(): number {
    return this._refundedAmount;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  /**
   * Amount still available for refunds
   */
  get refundableAmount(): number {
    return subtractAmounts(this.capturedAmount, this._refundedAmount);
  }

  /**
   * Check if transaction is in a terminal state
   */
  isTerminal(): boolean {
    return isTerminalStatus(this._status);
  }

  /**
   * Update transaction status (should only be called by the lifecycle service)
   */
  updateStatus(newStatus: TransactionStatus, at: Date = new Date()): void {
    this._status = newStatus;
    this._updatedAt = at;
  }

  /**
   * Add a refund to the running total. Bounds are checked by the caller.
   */
  recordRefund(amount: number, at: Date = new Date()): number {
    this._refundedAmount = addAmounts(this._refundedAmount, amount);
    this._updatedAt = at;
    return this._refundedAmount;
  }

  /**
   * Convert to plain object for storage/serialization
   */
  toPlainObject(): TransactionSnapshot {
    return {
      id: this.id,
      ownerId: this.ownerId,
      capturedAmount: this.capturedAmount,
      refundedAmount: this._refundedAmount,
      refundableAmount: this.refundableAmount,
      status: this._status,
      createdAt: new Date(this.createdAt.getTime()),
      updatedAt: new Date(this._updatedAt.getTime()),
    };
  }

  toJSON(): TransactionSnapshot {
    return this.toPlainObject();
  }

  /**
   * Detached copy; the store hands these out so callers never alias stored state
   */
  clone(): Transaction {
    return Transaction.fromPlainObject(this.toPlainObject());
  }

  /**
   * Create from plain object (for hydration from storage)
   */
  static fromPlainObject(data: TransactionSnapshot): Transaction {
    return new Transaction(
      data.id,
      data.ownerId,
      data.capturedAmount,
      data.status,
      data.refundedAmount,
      new Date(data.createdAt),
      new Date(data.updatedAt),
    );
  }

  toString(): string {
    return `Transaction{id='${this.id}', owner='${this.ownerId}', amount=${this.capturedAmount}, refunded=${this._refundedAmount}, status=${this._status}}`;
  }
}
