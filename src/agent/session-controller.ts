import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import os from 'node:os';
import path from 'node:path';
import type { Decision, DeviceController, Verdict } from '../types/index.js';
import { toScreenRef } from '../types/index.js';
import type { VlmClient } from '../vlm/types.js';
import { ScreenObserver } from '../screen/ScreenObserver.js';
import { ElementGrounder } from '../screen/ElementGrounder.js';
import type { KnowledgeBase, KnowledgeStore } from '../memory/KnowledgeStore.js';
import { buildKnowledgeContext, elementLabel } from '../memory/KnowledgeInjector.js';
import { SessionLog, type ActionRecord } from '../memory/SessionLog.js';
import { CancelToken } from '../task/cancel-token.js';
import { ActionExecutor } from './action-executor.js';
import { ActionHistory } from './action-history.js';
import type { PilotConfig } from './config.js';
import { DecisionEngine } from './decision-engine.js';
import {
  determineRecovery,
  emptyCounters,
  nextCounters,
  type FailureCounters,
  type RoundOutcome,
} from './error-recovery.js';
import { AgentError, errorMessage, isAgentError, type ErrorKind } from './errors.js';
import { describeAction } from './prompt.js';
import { OutcomeReflector, textsPresent } from './reflector.js';
import { TokenTracker } from './token-tracker.js';
import {
  taskSchema,
  type SessionEvent,
  type SessionResult,
  type SessionState,
  type SessionStatus,
  type SubGoal,
  type Task,
} from './types.js';

export interface SessionDeps {
  device: DeviceController;
  vlm: VlmClient;
  config: PilotConfig;
  knowledge: KnowledgeStore;
  /** Where the session log and captures go; null keeps nothing but captures in the OS temp dir */
  runsDir?: string | null;
  cancelToken?: CancelToken;
  sessionId?: string;
  /** Replace typed text with a placeholder in the session log */
  redactTypedText?: boolean;
}

interface Termination {
  status: SessionStatus;
  kind?: ErrorKind;
  message: string;
}

type RoundResult =
  | { type: 'task_complete'; summary: string }
  | { type: 'subgoal_complete' }
  | { type: 'outcome'; outcome: RoundOutcome; advance: boolean };

const TRANSITIONS: Record<SessionState, readonly SessionState[]> = {
  init: ['planning', 'terminating'],
  planning: ['round_loop', 'terminating'],
  round_loop: ['round_loop', 'reflecting', 'terminating'],
  reflecting: ['round_loop', 'terminating'],
  terminating: ['terminated'],
  terminated: [],
};

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function statusFor(kind: ErrorKind): SessionStatus {
  return kind === 'RoundLimitExceeded' ? 'incomplete' : 'failed';
}

/**
 * Drives one task on one device: plan, then observe → decide → ground →
 * execute → reflect until the task completes or a budget runs out.
 * Emits SessionEvent on 'event'.
 */
export class SessionController extends EventEmitter {
  readonly sessionId: string;
  readonly cancelToken: CancelToken;

  private state: SessionState = 'init';
  private started = false;
  private round = 0;
  private subGoals: SubGoal[] = [];
  private current = 0;
  private counters: FailureCounters = emptyCounters();
  private kb: KnowledgeBase | null = null;

  private readonly parsedTask: ReturnType<typeof taskSchema.safeParse>;
  private readonly log: SessionLog;
  private readonly tokens = new TokenTracker();
  private readonly history = new ActionHistory();
  private readonly observer: ScreenObserver;
  private readonly engine: DecisionEngine;
  private readonly grounder: ElementGrounder;
  private readonly executor: ActionExecutor;
  private readonly reflector: OutcomeReflector;

  constructor(
    private deps: SessionDeps,
    taskInput: unknown,
  ) {
    super();
    const { config } = deps;
    this.sessionId = deps.sessionId ?? randomUUID();
    this.cancelToken = deps.cancelToken ?? new CancelToken();

    const runsDir = deps.runsDir === undefined ? config.storage.runsDir : deps.runsDir;
    this.parsedTask = taskSchema.safeParse(taskInput);
    const header = this.parsedTask.success
      ? {
          task: this.parsedTask.data.goal,
          mode: this.parsedTask.data.mode,
          app: this.parsedTask.data.app ?? this.parsedTask.data.packageName,
        }
      : { task: '', mode: 'unknown' };
    this.log = new SessionLog(
      runsDir,
      { sessionId: this.sessionId, startedAt: Date.now(), ...header },
      { redactText: deps.redactTypedText },
    );

    const captureDir = runsDir
      ? path.join(runsDir, this.sessionId, 'screens')
      : path.join(os.tmpdir(), 'android-pilot', this.sessionId);
    this.observer = new ScreenObserver(deps.device, { captureDir, minElementDist: config.device.minElementDist });
    this.engine = new DecisionEngine(
      deps.vlm,
      { maxAttempts: config.agent.maxDecisionAttempts, gridCellSize: config.device.gridCellSize },
      this.tokens,
    );
    this.grounder = new ElementGrounder({ gridCellSize: config.device.gridCellSize });
    this.executor = new ActionExecutor(deps.device, {
      timeoutMs: config.agent.deviceTimeoutMs,
      settleMs: config.agent.requestIntervalMs,
    });
    this.reflector = new OutcomeReflector(deps.vlm, { minElementDist: config.device.minElementDist }, this.tokens);
  }

  getState(): SessionState {
    return this.state;
  }

  getRound(): number {
    return this.round;
  }

  getRecords(): readonly ActionRecord[] {
    return this.log.getRecords();
  }

  cancel(reason?: string): void {
    this.cancelToken.cancel(reason);
  }

  async run(): Promise<SessionResult> {
    if (this.started) throw new Error('A session can only be run once');
    this.started = true;

    let termination: Termination;
    try {
      termination = await this.execute();
    } catch (err) {
      if (isAgentError(err)) {
        termination = { status: statusFor(err.kind), kind: err.kind, message: err.message };
        this.emitEvent({ type: 'failure', round: this.round, kind: err.kind, message: err.message });
      } else {
        console.log(`[Session] ${this.sessionId} crashed: ${errorMessage(err)}`);
        termination = { status: 'failed', message: errorMessage(err) };
      }
    }
    return this.terminate(termination);
  }

  // --- Lifecycle ---

  private async execute(): Promise<Termination> {
    this.emitEvent({ type: 'state', state: this.state, round: 0 });
    if (!this.parsedTask.success) {
      const issues = this.parsedTask.error.issues.map((i) => `${i.path.join('.') || 'task'}: ${i.message}`);
      throw new AgentError('InvalidTask', `Invalid task: ${issues.join('; ')}`);
    }
    const task = this.parsedTask.data;
    this.round = 0;

    const app = task.app ?? task.packageName;
    if (app) this.kb = this.deps.knowledge.open(app);
    console.log(`[Session] ${this.sessionId} started (${task.mode}): ${task.goal}`);

    if (task.packageName) await this.launch(task.packageName);
    if (this.cancelToken.canceled) return this.cancelled();

    this.transition('planning');
    this.subGoals = await this.engine.decompose(task);
    this.activate(0);
    this.emitEvent({ type: 'plan_created', subGoals: this.subGoals.map((g) => g.description) });

    const maxRounds = task.mode === 'explore' ? this.deps.config.agent.maxExploreRounds : this.deps.config.agent.maxTaskRounds;

    while (true) {
      if (this.cancelToken.canceled) return this.cancelled();
      this.round++;
      // 超出预算的那一轮也计数，但不截图、不调用模型
      if (this.round > maxRounds) {
        throw new AgentError('RoundLimitExceeded', `Round budget of ${maxRounds} used up`);
      }
      this.transition('round_loop');

      const result = await this.playRound(task);

      if (result.type === 'task_complete') {
        for (const g of this.subGoals) if (g.status !== 'done') g.status = 'done';
        return { status: 'completed', message: result.summary };
      }
      if (result.type === 'subgoal_complete') {
        if (this.advance()) return { status: 'completed', message: 'All sub-goals completed' };
        continue;
      }

      const { outcome } = result;
      this.counters = nextCounters(this.counters, outcome, task.mode);
      if (outcome.type === 'error') {
        this.emitEvent({ type: 'failure', round: this.round, kind: outcome.kind, message: outcome.message });
      }
      const recovery = determineRecovery(outcome, this.counters, this.deps.config.agent);
      if (recovery.type === 'abort') {
        throw new AgentError(recovery.kind, recovery.reason);
      }
      if (result.advance && this.advance()) {
        return { status: 'completed', message: 'All sub-goals completed' };
      }
    }
  }

  private async playRound(task: Task): Promise<RoundResult> {
    const subGoal = this.activeSubGoal();
    const round = this.round;
    this.emitEvent({ type: 'round_started', round, subGoal: subGoal.description });
    console.log(`[Session] round ${round}, sub-goal ${this.current + 1}/${this.subGoals.length}: ${subGoal.description}`);

    const before = await this.observer.capture(`r${round}-before`);
    const base = {
      round,
      subGoalIndex: this.current,
      subGoal: subGoal.description,
      before: toScreenRef(before),
    };

    let decision: Decision;
    try {
      decision = await this.engine.decide({
        task,
        subGoal,
        subGoalIndex: this.current,
        subGoalCount: this.subGoals.length,
        screen: before,
        knowledge: buildKnowledgeContext(this.kb?.lookup(before.signature) ?? [], before.elements),
        history: this.history.recent(),
        hint: this.history.detectAny()?.message,
      });
    } catch (err) {
      if (!isAgentError(err) || err.kind !== 'DecisionUnparsable') throw err;
      return this.failRound(base, before.signature, 'no decision', err);
    }
    this.emitEvent({ type: 'decision', round, decision });

    if (decision.kind === 'task_complete') {
      const summary = decision.summary ?? 'Task reported complete';
      this.append({ ...base, timestamp: Date.now(), description: `Task complete: ${summary}` });
      return { type: 'task_complete', summary };
    }
    if (decision.kind === 'subgoal_complete') {
      this.append({ ...base, timestamp: Date.now(), description: `Sub-goal complete: ${decision.reason ?? subGoal.description}` });
      return { type: 'subgoal_complete' };
    }

    const { intent } = decision;
    const grounding = this.grounder.ground(intent, before);
    if (!grounding.ok) {
      return this.failRound({ ...base, intent }, before.signature, intent.operation, grounding.error);
    }
    const { action, via, element } = grounding.grounded;
    const attempt = element ? `${action.kind} "${elementLabel(element)}"` : describeAction(action);
    this.emitEvent({ type: 'action', round, intent, action });

    try {
      await this.executor.execute(action);
    } catch (err) {
      if (!isAgentError(err) || err.kind !== 'ActionExecutionFailed') throw err;
      return this.failRound({ ...base, intent, action, via, elementSignature: element?.signature }, before.signature, attempt, err);
    }

    this.transition('reflecting');
    const after = await this.observer.capture(`r${round}-after`);
    const reflection = await this.reflector.reflect({
      task,
      subGoal,
      before,
      after,
      action,
      intent,
      element,
      appPackage: task.packageName,
    });
    console.log(`[Session] round ${round}: ${attempt} -> ${reflection.verdict} (${reflection.description})`);
    this.emitEvent({ type: 'verdict', round, verdict: reflection.verdict, description: reflection.description });

    if (element && this.kb && this.shouldRecord(task, reflection.verdict)) {
      this.kb.merge({
        screenSignature: before.signature,
        elementSignature: element.signature,
        elementLabel: elementLabel(element),
        description: reflection.description,
        action: action.kind,
        verdict: reflection.verdict,
      });
    }

    this.append({
      ...base,
      timestamp: Date.now(),
      intent,
      action,
      via,
      elementSignature: element?.signature,
      after: toScreenRef(after),
      verdict: reflection.verdict,
      description: reflection.description,
    });
    this.history.record({
      round,
      description: attempt,
      signature: `${before.signature}:${element?.signature ?? describeAction(action)}`,
      outcome: reflection.verdict,
    });

    if (reflection.verdict === 'error') {
      await this.recoverFromError(task);
    } else if (reflection.pressBack) {
      await this.bestEffort('back after an unhelpful action', () => this.executor.pressBack());
    }

    const advance =
      reflection.verdict === 'success' &&
      (intent.completesSubgoal === true || textsPresent(after, subGoal.verifyText));
    return { type: 'outcome', outcome: { type: 'verdict', verdict: reflection.verdict }, advance };
  }

  private failRound(
    partial: Omit<ActionRecord, 'timestamp' | 'description'>,
    screenSignature: string,
    attempt: string,
    err: AgentError,
  ): RoundResult {
    console.log(`[Session] round ${partial.round}: ${err.kind}: ${err.message}`);
    this.append({ ...partial, timestamp: Date.now(), errorKind: err.kind, description: err.message });
    this.history.record({
      round: partial.round,
      description: attempt,
      signature: `${screenSignature}:${attempt}`,
      outcome: err.kind,
    });
    return { type: 'outcome', outcome: { type: 'error', kind: err.kind, message: err.message }, advance: false };
  }

  private terminate(termination: Termination): SessionResult {
    this.transition('terminating');
    if (termination.status !== 'completed') {
      const active = this.subGoals[this.current];
      if (active && active.status === 'active' && termination.status === 'failed') active.status = 'failed';
    }

    try {
      this.kb?.flush();
    } catch (err) {
      console.log(`[Knowledge] flush failed: ${errorMessage(err)}`);
    }
    this.log.setSubGoals(this.subGoals);
    try {
      this.log.finalize({ status: termination.status, kind: termination.kind });
    } catch (err) {
      console.log(`[Session] could not write session log: ${errorMessage(err)}`);
    }

    this.transition('terminated');
    const result: SessionResult = {
      sessionId: this.sessionId,
      status: termination.status,
      kind: termination.kind,
      message: termination.message,
      rounds: this.round,
      subGoals: this.subGoals.map((g) => ({ ...g, verifyText: [...g.verifyText] })),
      records: this.log.getRecords(),
      tokenUsage: this.tokens.getUsage(),
    };
    console.log(
      `[Session] ${this.sessionId} ${result.status}${result.kind ? ` (${result.kind})` : ''} after ${result.rounds} rounds: ${result.message}`,
    );
    this.emitEvent({ type: 'done', result });
    return result;
  }

  // --- Helpers ---

  private shouldRecord(task: Task, verdict: Verdict): boolean {
    if (task.mode === 'explore') return verdict !== 'error';
    return verdict === 'success' || verdict === 'unexpected-change';
  }

  private async launch(packageName: string): Promise<void> {
    try {
      await this.deps.device.launchApp(packageName);
    } catch (err) {
      if (isAgentError(err)) throw err;
      throw new AgentError('InvalidTask', `Could not launch ${packageName}: ${errorMessage(err)}`, { cause: err });
    }
    await delay(this.deps.config.agent.appLoadDelayMs);
  }

  private async recoverFromError(task: Task): Promise<void> {
    const pkg = task.packageName;
    if (pkg) {
      await this.bestEffort(`relaunch ${pkg}`, async () => {
        await this.deps.device.launchApp(pkg);
        await delay(this.deps.config.agent.appLoadDelayMs);
      });
    } else {
      await this.bestEffort('back after an error', () => this.executor.pressBack());
    }
  }

  /** Recovery steps may fail without ending the session, unless the device is gone. */
  private async bestEffort(label: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      if (isAgentError(err) && err.kind === 'DeviceUnreachable') throw err;
      console.log(`[Session] ${label} failed: ${errorMessage(err)}`);
    }
  }

  private activeSubGoal(): SubGoal {
    const goal = this.subGoals[this.current];
    if (!goal) throw new AgentError('PlanningFailed', 'No active sub-goal');
    return goal;
  }

  private activate(index: number): void {
    this.current = index;
    this.activeSubGoal().status = 'active';
    this.log.setSubGoals(this.subGoals);
  }

  /** Marks the active sub-goal done; true when none remain. */
  private advance(): boolean {
    const done = this.activeSubGoal();
    done.status = 'done';
    this.counters = { ...this.counters, subGoalFailures: 0 };
    this.emitEvent({ type: 'subgoal_completed', round: this.round, subGoal: done.description });
    console.log(`[Session] sub-goal done: ${done.description}`);
    if (this.current + 1 >= this.subGoals.length) {
      this.log.setSubGoals(this.subGoals);
      return true;
    }
    this.activate(this.current + 1);
    return false;
  }

  private cancelled(): Termination {
    console.log(`[Session] ${this.sessionId} cancelled at round ${this.round}`);
    return { status: 'cancelled', message: this.cancelToken.reason };
  }

  private append(record: ActionRecord): void {
    this.log.append(record);
  }

  private transition(next: SessionState): void {
    if (this.state === next && next !== 'round_loop') return;
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal session transition ${this.state} -> ${next}`);
    }
    this.state = next;
    this.emitEvent({ type: 'state', state: next, round: this.round });
  }

  private emitEvent(event: SessionEvent): void {
    this.emit('event', event);
  }
}

/**
 * Whether a finished session counts as a success for callers that only see
 * pass/fail. Exploration that used its whole round budget did its job.
 */
export function isSuccessfulOutcome(result: SessionResult, mode: Task['mode']): boolean {
  if (result.status === 'completed') return true;
  return mode === 'explore' && result.kind === 'RoundLimitExceeded';
}
