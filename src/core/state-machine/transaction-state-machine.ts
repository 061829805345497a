import { LifecycleAction, TransactionStatus } from '../domain/enums';
import {
  StateTransition,
  TransitionContext,
  TransitionResult,
  StateMachineConfig,
} from './types';
import {
  TRANSITION_RULES,
  isTerminalState,
  getInitialState,
} from './transition-rules';

/**
 * Transaction state machine - decides where an action takes a transaction
 * Pure TypeScript implementation with no external dependencies
 */
export class TransactionStateMachine {
  private readonly config: StateMachineConfig;
  private readonly transitions: Map<string, StateTransition[]>;

  constructor(config?: Partial<StateMachineConfig>) {
    this.config = {
      initialState: getInitialState(),
      transitions: TRANSITION_RULES,
      ...config,
    };

    this.transitions = new Map();
    this.initializeTransitions();
  }

  /**
   * Index rules by (from, action) for lookup
   */
  private initializeTransitions(): void {
    for (const transition of this.config.transitions) {
      const key = this.getTransitionKey(transition.from, transition.action);
      const existing = this.transitions.get(key) ?? [];
      existing.push(transition);
      this.transitions.set(key, existing);
    }
  }

  /**
   * Whether the action is defined at all for the status
   */
  canPerform(status: TransactionStatus, action: LifecycleAction): boolean {
    if (isTerminalState(status)) {
      return false;
    }
    return this.findTransitions(status, action).length > 0;
  }

  /**
   * Pick the target status for an action.
   * When several rules share (from, action), the first whose conditions all
   * hold wins.
   */
  resolveTransition(
    from: TransactionStatus,
    action: LifecycleAction,
    context: Partial<TransitionContext> = {},
  ): TransitionResult {
    const fullContext: TransitionContext = {
      ...context,
      currentStatus: from,
      action,
    };

    if (isTerminalState(from)) {
      return {
        success: false,
        fromStatus: from,
        toStatus: from,
        reason: `Cannot transition from terminal state: ${from}`,
      };
    }

    const candidates = this.findTransitions(from, action);
    if (candidates.length === 0) {
      return {
        success: false,
        fromStatus: from,
        toStatus: from,
        reason: `Action ${action} is not defined for status ${from}`,
      };
    }

    const failures: string[] = [];
    for (const transition of candidates) {
      const transitionFailures = this.evaluateConditions(transition, fullContext);
      if (transitionFailures.length === 0) {
        return {
          success: true,
          fromStatus: from,
          toStatus: transition.to,
        };
      }
      failures.push(...transitionFailures);
    }

    return {
      success: false,
      fromStatus: from,
      toStatus: from,
      reason: 'Transition conditions not met',
      conditionFailures: failures,
    };
  }

  /**
   * Get all possible next states from current state
   */
  getNextStates(currentStatus: TransactionStatus): TransactionStatus[] {
    if (isTerminalState(currentStatus)) {
      return [];
    }

    const nextStates = new Set<TransactionStatus>();
    for (const transition of this.config.transitions) {
      if (transition.from === currentStatus) {
        nextStates.add(transition.to);
      }
    }
    return Array.from(nextStates);
  }

  /**
   * Actions that have at least one rule from the status
   */
  getAvailableActions(currentStatus: TransactionStatus): LifecycleAction[] {
    return Object.values(LifecycleAction).filter((action) =>
      this.canPerform(currentStatus, action),
    );
  }

  isTerminal(status: TransactionStatus): boolean {
    return isTerminalState(status);
  }

  getInitialState(): TransactionStatus {
    return this.config.initialState;
  }

  /**
   * Get all defined transitions
   */
  getAllTransitions(): StateTransition[] {
    return [...this.config.transitions];
  }

  private evaluateConditions(
    transition: StateTransition,
    context: TransitionContext,
  ): string[] {
    const failures: string[] = [];

    for (const condition of transition.conditions ?? []) {
      try {
        if (!condition.evaluate(context)) {
          failures.push(
            condition.errorMessage || `Condition ${condition.name} failed`,
          );
        }
      } catch (error) {
        failures.push(
          `Condition ${condition.name} threw error: ${error instanceof Error ? error.message : String(error)}`,
        );
      }
    }

    return failures;
  }

  private findTransitions(
    from: TransactionStatus,
    action: LifecycleAction,
  ): StateTransition[] {
    return this.transitions.get(this.getTransitionKey(from, action)) ?? [];
  }

  private getTransitionKey(
    from: TransactionStatus,
    action: LifecycleAction,
  ): string {
    return `${from}:${action}`;
  }

  /**
   * Create a visualization-friendly representation of the state machine
   */
  toMermaidDiagram(): string {
    const lines = ['stateDiagram-v2', `    [*] --> ${this.config.initialState}`];

    for (const transition of this.config.transitions) {
      lines.push(
        `    ${transition.from} --> ${transition.to} : ${transition.action}`,
      );
    }

    for (const status of Object.values(TransactionStatus)) {
      if (isTerminalState(status)) {
        lines.push(`    ${status} --> [*]`);
      }
    }

    return lines.join('\n');
  }
}
