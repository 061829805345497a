import { LifecycleAction, TransactionStatus } from '../domain/enums';

/**
 * State transition definition
 */
export interface StateTransition {
  from: TransactionStatus;
  to: TransactionStatus;
  action: LifecycleAction;
  conditions?: TransitionCondition[];
  description?: string;
}

/**
 * Transition condition - must be met for transition to be selected
 */
export interface TransitionCondition {
  name: string;
  evaluate: (context: TransitionContext) => boolean;
  errorMessage?: string;
}

/**
 * Context for evaluating transitions
 */
export interface TransitionContext {
  currentStatus: TransactionStatus;
  action: LifecycleAction;
  capturedAmount?: number;
  /**
   * Refunded total after the command is applied
   */
  refundedAmountAfter?: number;
}

/**
 * Transition result
 */
export interface TransitionResult {
  success: boolean;
  fromStatus: TransactionStatus;
  toStatus: TransactionStatus;
  reason?: string;
  conditionFailures?: string[];
}

/**
 * State machine configuration
 */
export interface StateMachineConfig {
  initialState: TransactionStatus;
  transitions: StateTransition[];
}
