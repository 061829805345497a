/**
 * Transaction lifecycle states
 * State machine enforced - transitions validated by the lifecycle service
 */
export enum TransactionStatus {
  /**
   * Initial state - transaction recorded, nothing charged yet
   */
  CREATED = 'CREATED',

  /**
   * Funds reserved against the payer
   */
  AUTHORIZED = 'AUTHORIZED',

  /**
   * Amount charged; refunds may be issued against it
   */
  CAPTURED = 'CAPTURED',

  /**
   * Captured amount fully refunded (terminal state)
   */
  REFUNDED = 'REFUNDED',
}

/**
 * Compile-time exhaustiveness check for switches over closed unions
 */
export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}

/**
 * Helper to determine if a status is terminal (no further transitions possible)
 */
export function isTerminalStatus(status: TransactionStatus): boolean {
  switch (status) {
    case TransactionStatus.REFUNDED:
      return true;
    case TransactionStatus.CREATED:
    case TransactionStatus.AUTHORIZED:
    case TransactionStatus.CAPTURED:
      return false;
    default:
      return assertNever(status);
  }
}

/**
 * Helper to determine if money has moved for a transaction
 */
export function isSettledStatus(status: TransactionStatus): boolean {
  switch (status) {
    case TransactionStatus.CAPTURED:
    case TransactionStatus.REFUNDED:
      return true;
    case TransactionStatus.CREATED:
    case TransactionStatus.AUTHORIZED:
      return false;
    default:
      return assertNever(status);
  }
}

/**
 * Narrow an arbitrary string to a known status
 */
export function isTransactionStatus(value: string): value is TransactionStatus {
  return Object.values<string>(TransactionStatus).includes(value);
}
