/**
 * Bounded recovery: every non-fatal failure increments a counter and every
 * counter has a configured ceiling.
 */

import type { Verdict } from '../types/index.js';
import { isFatal, type ErrorKind } from './errors.js';
import type { TaskMode } from './types.js';

export type RoundOutcome =
  | { type: 'verdict'; verdict: Verdict }
  | { type: 'error'; kind: ErrorKind; message: string };

export type RecoveryAction =
  | { type: 'continue' }
  | { type: 'abort'; kind: ErrorKind; reason: string };

export interface FailureCounters {
  /** Consecutive failed rounds on the active sub-goal */
  subGoalFailures: number;
  /** Consecutive rounds whose device action failed */
  actionFailures: number;
}

export interface RecoveryBudgets {
  maxSubgoalFailures: number;
  maxActionFailures: number;
}

export function emptyCounters(): FailureCounters {
  return { subGoalFailures: 0, actionFailures: 0 };
}

/**
 * Whether the round counts against the sub-goal. Exploring only counts real
 * errors: a tap that does nothing is still coverage.
 */
export function countsAsFailure(outcome: RoundOutcome, mode: TaskMode): boolean {
  if (outcome.type === 'error') return true;
  if (outcome.verdict === 'success') return false;
  if (mode === 'explore') return outcome.verdict === 'error';
  return true;
}

export function nextCounters(counters: FailureCounters, outcome: RoundOutcome, mode: TaskMode): FailureCounters {
  const actionFailed = outcome.type === 'error' && outcome.kind === 'ActionExecutionFailed';
  return {
    subGoalFailures: countsAsFailure(outcome, mode) ? counters.subGoalFailures + 1 : 0,
    actionFailures: actionFailed ? counters.actionFailures + 1 : 0,
  };
}

/**
 * Decide what happens after a round, given counters that already include it.
 */
export function determineRecovery(
  outcome: RoundOutcome,
  counters: FailureCounters,
  budgets: RecoveryBudgets,
): RecoveryAction {
  if (outcome.type === 'error' && isFatal(outcome.kind)) {
    return { type: 'abort', kind: outcome.kind, reason: outcome.message };
  }

  if (counters.actionFailures > budgets.maxActionFailures) {
    return {
      type: 'abort',
      kind: 'ActionExecutionFailed',
      reason: `Device action failed in ${counters.actionFailures} consecutive rounds`,
    };
  }

  if (counters.subGoalFailures >= budgets.maxSubgoalFailures) {
    const last = outcome.type === 'error' ? outcome.kind : outcome.verdict;
    return {
      type: 'abort',
      kind: 'SubGoalStuck',
      reason: `No progress on the current sub-goal after ${counters.subGoalFailures} consecutive rounds (last: ${last})`,
    };
  }

  return { type: 'continue' };
}
