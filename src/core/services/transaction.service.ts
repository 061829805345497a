import { v4 as uuidv4 } from 'uuid';
import {
  LifecycleAction,
  TransactionEventType,
  TransactionStatus,
} from '../domain/enums';
import {
  InvalidArgumentError,
  InvalidRefundAmountError,
  InvalidTransactionStateError,
  TransactionError,
  TransactionNotFoundError,
} from '../domain/errors';
import { Transaction } from '../domain/models';
import {
  addAmounts,
  isPositiveAmount,
  normalizeAmount,
} from '../domain/value-objects/amount.vo';
import {
  Clock,
  EventDispatcher,
  IdGenerator,
  LifecycleLogger,
  TransactionStore,
} from '../interfaces';
import { TransactionStateMachine } from '../state-machine';

export interface TransactionServiceOptions {
  logger?: LifecycleLogger;
  idGenerator?: IdGenerator;
  clock?: Clock;
}

/**
 * Transaction Lifecycle Service
 *
 * Owns every business rule of the payment lifecycle. Each command validates
 * its input, reads the record, asks the state machine for the target status
 * and only then mutates and writes the record back through the store.
 * All operations are synchronous and either fully apply or throw before any
 * write.
 */
export class TransactionService {
  private readonly idGenerator: IdGenerator;
  private readonly clock: Clock;
  private readonly logger?: LifecycleLogger;

  constructor(
    private readonly store: TransactionStore,
    private readonly stateMachine: TransactionStateMachine = new TransactionStateMachine(),
    private readonly eventDispatcher?: EventDispatcher,
    options: TransactionServiceOptions = {},
  ) {
    this.idGenerator = options.idGenerator ?? (() => uuidv4());
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger;
  }

  /**
   * Create a new transaction in CREATED state.
   * The amount must still be positive once rounded to AMOUNT_DECIMALS.
   */
  createTransaction(ownerId: string, amount: number): Transaction {
    if (ownerId.length === 0) {
      throw this.rejected(
        new InvalidArgumentError('ownerId cannot be empty', 'ownerId'),
      );
    }
    const capturedAmount = normalizeAmount(amount);
    if (!isPositiveAmount(capturedAmount)) {
      throw this.rejected(
        new InvalidArgumentError('amount must be positive', 'amount'),
      );
    }

    const now = this.clock();
    const transaction = new Transaction(
      this.idGenerator(),
      ownerId,
      capturedAmount,
      this.stateMachine.getInitialState(),
      0,
      now,
      now,
    );

    this.store.save(transaction);
    this.logger?.log(
      `Transaction ${transaction.id} created for ${ownerId} (${transaction.capturedAmount})`,
    );
    this.emit(TransactionEventType.CREATED, transaction, null, {
      amount: transaction.capturedAmount,
    });

    return transaction;
  }

  /**
   * CREATED -> AUTHORIZED
   */
  authorize(transactionId: string): Transaction {
    return this.applyAction(
      transactionId,
      LifecycleAction.AUTHORIZE,
      TransactionEventType.AUTHORIZED,
    );
  }

  /**
   * AUTHORIZED -> CAPTURED
   */
  capture(transactionId: string): Transaction {
    return this.applyAction(
      transactionId,
      LifecycleAction.CAPTURE,
      TransactionEventType.CAPTURED,
    );
  }

  /**
   * Add a refund to a captured transaction.
   * The transaction becomes REFUNDED once the refunded total reaches the
   * captured amount; otherwise it stays CAPTURED.
   * Amounts are compared and recorded after rounding to AMOUNT_DECIMALS.
   */
  refund(transactionId: string, requestedAmount: number): Transaction {
    const amount = normalizeAmount(requestedAmount);
    if (!isPositiveAmount(amount)) {
      throw this.rejected(
        new InvalidArgumentError('refund amount must be positive', 'amount'),
      );
    }

    const transaction = this.requireTransaction(transactionId);
    const fromStatus = transaction.status;

    if (!this.stateMachine.canPerform(fromStatus, LifecycleAction.REFUND)) {
      throw this.rejected(
        new InvalidTransactionStateError(
          transactionId,
          fromStatus,
          LifecycleAction.REFUND,
        ),
      );
    }

    const available = transaction.refundableAmount;
    if (amount > available) {
      throw this.rejected(
        new InvalidRefundAmountError(transactionId, amount, available),
      );
    }

    const result = this.stateMachine.resolveTransition(
      fromStatus,
      LifecycleAction.REFUND,
      {
        capturedAmount: transaction.capturedAmount,
        refundedAmountAfter: addAmounts(transaction.refundedAmount, amount),
      },
    );
    if (!result.success) {
      throw this.rejected(
        new InvalidTransactionStateError(
          transactionId,
          fromStatus,
          LifecycleAction.REFUND,
        ),
      );
    }

    const now = this.clock();
    transaction.recordRefund(amount, now);
    transaction.updateStatus(result.toStatus, now);
    this.store.save(transaction);

    const fullyRefunded = result.toStatus === TransactionStatus.REFUNDED;
    this.logger?.log(
      `Transaction ${transactionId} refunded ${amount} (total ${transaction.refundedAmount}, ${fromStatus} -> ${result.toStatus})`,
    );
    this.emit(TransactionEventType.REFUNDED, transaction, fromStatus, {
      amount,
      fullyRefunded,
    });

    return transaction;
  }

  /**
   * Get the current record, including the derived refundable amount
   */
  getTransaction(transactionId: string): Transaction {
    return this.requireTransaction(transactionId);
  }

  /**
   * Status-only transitions (authorize, capture)
   */
  private applyAction(
    transactionId: string,
    action: LifecycleAction,
    eventType: TransactionEventType,
  ): Transaction {
    const transaction = this.requireTransaction(transactionId);
    const fromStatus = transaction.status;

    const result = this.stateMachine.resolveTransition(fromStatus, action);
    if (!result.success) {
      throw this.rejected(
        new InvalidTransactionStateError(transactionId, fromStatus, action),
      );
    }

    transaction.updateStatus(result.toStatus, this.clock());
    this.store.save(transaction);

    this.logger?.log(
      `Transaction ${transactionId} ${action}: ${fromStatus} -> ${result.toStatus}`,
    );
    this.emit(eventType, transaction, fromStatus);

    return transaction;
  }

  private requireTransaction(transactionId: string): Transaction {
    const transaction = this.store.findById(transactionId);
    if (!transaction) {
      throw this.rejected(new TransactionNotFoundError(transactionId));
    }
    return transaction;
  }

  private rejected<E extends TransactionError>(error: E): E {
    this.logger?.warn(`Rejected: ${error.message}`);
    return error;
  }

  private emit(
    eventType: TransactionEventType,
    transaction: Transaction,
    fromStatus: TransactionStatus | null,
    extra: { amount?: number; fullyRefunded?: boolean } = {},
  ): void {
    if (!this.eventDispatcher) {
      return;
    }

    this.eventDispatcher.dispatch({
      eventType,
      transactionId: transaction.id,
      transaction: transaction.toPlainObject(),
      fromStatus,
      toStatus: transaction.status,
      ...extra,
      timestamp: transaction.updatedAt,
    });
  }
}
