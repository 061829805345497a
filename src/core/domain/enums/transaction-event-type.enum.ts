/**
 * Events emitted after a lifecycle change has been persisted
 */
export enum TransactionEventType {
  /**
   * New transaction stored in CREATED state
   */
  CREATED = 'transaction.created',

  /**
   * CREATED -> AUTHORIZED
   */
  AUTHORIZED = 'transaction.authorized',

  /**
   * AUTHORIZED -> CAPTURED
   */
  CAPTURED = 'transaction.captured',

  /**
   * Refund recorded, partial (still CAPTURED) or full (REFUNDED)
   */
  REFUNDED = 'transaction.refunded',
}
