import { LifecycleAction, TransactionStatus, isTerminalStatus } from '../domain/enums';
import { StateTransition, TransitionCondition } from './types';

/**
 * Refund leaves part of the captured amount outstanding
 */
export const RefundLeavesBalance: TransitionCondition = {
  name: 'RefundLeavesBalance',
  evaluate: (context) =>
    context.refundedAmountAfter !== undefined &&
    context.capturedAmount !== undefined &&
    context.refundedAmountAfter < context.capturedAmount,
  errorMessage: 'Refund would not leave an outstanding balance',
};

/**
 * Refund brings the refunded total up to (or past) the captured amount
 */
export const RefundCompletesCapture: TransitionCondition = {
  name: 'RefundCompletesCapture',
  evaluate: (context) =>
    context.refundedAmountAfter !== undefined &&
    context.capturedAmount !== undefined &&
    context.refundedAmountAfter >= context.capturedAmount,
  errorMessage: 'Refund would not cover the captured amount',
};

/**
 * Transaction lifecycle transition rules
 *
 * Key principles:
 * - States only move forward
 * - Refunds accumulate; the terminal transition is derived from the total
 * - REFUNDED is terminal
 */
export const TRANSITION_RULES: StateTransition[] = [
  {
    from: TransactionStatus.CREATED,
    to: TransactionStatus.AUTHORIZED,
    action: LifecycleAction.AUTHORIZE,
    description: 'Funds reserved against the payer',
  },
  {
    from: TransactionStatus.AUTHORIZED,
    to: TransactionStatus.CAPTURED,
    action: LifecycleAction.CAPTURE,
    description: 'Authorized amount charged',
  },

  // ============ Refund Transitions ============

  {
    from: TransactionStatus.CAPTURED,
    to: TransactionStatus.CAPTURED,
    action: LifecycleAction.REFUND,
    conditions: [RefundLeavesBalance],
    description: 'Partial refund recorded',
  },
  {
    from: TransactionStatus.CAPTURED,
    to: TransactionStatus.REFUNDED,
    action: LifecycleAction.REFUND,
    conditions: [RefundCompletesCapture],
    description: 'Captured amount fully refunded',
  },
];

/**
 * Rules that start from a status for an action
 */
export function findTransitionRules(
  from: TransactionStatus,
  action: LifecycleAction,
  rules: StateTransition[] = TRANSITION_RULES,
): StateTransition[] {
  return rules.filter((rule) => rule.from === from && rule.action === action);
}

/**
 * Check if a state is terminal
 */
export function isTerminalState(status: TransactionStatus): boolean {
  return isTerminalStatus(status);
}

/**
 * Get initial state for new transactions
 */
export function getInitialState(): TransactionStatus {
  return TransactionStatus.CREATED;
}
