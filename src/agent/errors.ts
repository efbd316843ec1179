/**
 * Error taxonomy shared by every stage of a session.
 */

export type ErrorKind =
  | 'InvalidConfig'
  | 'InvalidTask'
  | 'PlanningFailed'
  | 'DecisionUnparsable'
  | 'UnresolvableTarget'
  | 'ActionExecutionFailed'
  | 'SubGoalStuck'
  | 'RoundLimitExceeded'
  | 'DeviceUnreachable'
  | 'VlmUnavailable';

const FATAL_KINDS: ReadonlySet<ErrorKind> = new Set([
  'InvalidConfig',
  'InvalidTask',
  'PlanningFailed',
  'SubGoalStuck',
  'RoundLimitExceeded',
  'DeviceUnreachable',
  'VlmUnavailable',
]);

/** Fatal as soon as it is raised. ActionExecutionFailed only becomes fatal by repetition. */
export function isFatal(kind: ErrorKind): boolean {
  return FATAL_KINDS.has(kind);
}

export class AgentError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'AgentError';
  }
}

export function isAgentError(err: unknown): err is AgentError {
  return err instanceof AgentError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
