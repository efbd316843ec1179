export { SessionController, isSuccessfulOutcome } from './session-controller.js';
export type { SessionDeps } from './session-controller.js';
export { createRuntime } from './runtime.js';
export type { Runtime, RuntimeOverrides } from './runtime.js';
export { DecisionEngine } from './decision-engine.js';
export type { DecisionContext, DecisionEngineOptions } from './decision-engine.js';
export { ActionExecutor } from './action-executor.js';
export type { ActionExecutorOptions } from './action-executor.js';
export { OutcomeReflector, crashText, isIdentical, textsPresent } from './reflector.js';
export type { ReflectInput } from './reflector.js';
export { diffScreens, summarizeDiff } from './screen-diff.js';
export type { ScreenDiff } from './screen-diff.js';
export { ActionHistory } from './action-history.js';
export type { RoundSummary, LoopDetection } from './action-history.js';
export { TokenTracker } from './token-tracker.js';
export type { CallPurpose, TokenUsage } from './token-tracker.js';
export { determineRecovery, countsAsFailure, nextCounters, emptyCounters } from './error-recovery.js';
export type { RoundOutcome, RecoveryAction, FailureCounters, RecoveryBudgets } from './error-recovery.js';
export { parseDecision, parsePlan, parseReflection, extractJson, normalizeOperation } from './response-parser.js';
export type { ParseResult, ReflectionDecision, ParsedReflection, PlannedSubGoal } from './response-parser.js';
export { loadConfig, resolveConfig, validateConfig, normalizeBaseUrl, DEFAULT_BASE_URLS } from './config.js';
export type { PilotConfig, VlmProvider, Settings } from './config.js';
export { AgentError, isAgentError, isFatal, errorMessage } from './errors.js';
export type { ErrorKind } from './errors.js';
export { taskSchema } from './types.js';
export type {
  Task,
  TaskMode,
  SubGoal,
  SubGoalStatus,
  SessionState,
  SessionStatus,
  SessionResult,
  SessionEvent,
  Reflection,
} from './types.js';
