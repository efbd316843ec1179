import { randomUUID } from 'node:crypto';
import { CancelToken } from './cancel-token.js';
import type { SessionController } from '../agent/session-controller.js';
import { errorMessage, isAgentError, type ErrorKind } from '../agent/errors.js';
import type { ActionRecord } from '../memory/SessionLog.js';
import type { SessionEvent, SessionResult, Task } from '../agent/types.js';

// ===== Types =====

export type RunStatus = 'queued' | 'running' | 'completed' | 'incomplete' | 'failed' | 'cancelled';

const TERMINAL_STATUSES: ReadonlySet<RunStatus> = new Set([
  'completed', 'incomplete', 'failed', 'cancelled',
]);

export function isTerminal(status: RunStatus): boolean {
  return TERMINAL_STATUSES.has(status);
}

export interface RunState {
  runId: string;
  goal: string;
  mode: Task['mode'];
  app?: string;
  status: RunStatus;
  createdAt: number;
  updatedAt: number;
  progress: { round: number; subGoal?: string };
  metrics: { elapsedMs: number };
  result?: SessionResult;
  error?: { kind?: ErrorKind; message: string };
}

/** Run state without the (potentially long) record list. */
export function toRunView(run: RunState) {
  const { result, ...rest } = run;
  if (!result) return rest;
  const { records, ...summary } = result;
  return { ...rest, result: { ...summary, recordCount: records.length } };
}

/** Builds the controller for one run; the manager owns its cancel token. */
export type SessionFactory = (task: Task, sessionId: string, token: CancelToken) => SessionController;

// ===== Semaphore for concurrency control =====

class Semaphore {
  private _count: number;
  private _waiters: Array<() => void> = [];

  constructor(max: number) {
    this._count = max;
  }

  async acquire(): Promise<void> {
    if (this._count > 0) {
      this._count--;
      return;
    }
    return new Promise<void>((resolve) => {
      this._waiters.push(resolve);
    });
  }

  release(): void {
    const next = this._waiters.shift();
    if (next) {
      next();
    } else {
      this._count++;
    }
  }
}

// ===== RunManager =====

const DEFAULT_TTL_MS = 30 * 60 * 1000; // 30 minutes
const CLEANUP_INTERVAL_MS = 5 * 60 * 1000; // 5 minutes
// 一台设备同一时间只跑一个会话
const DEFAULT_MAX_CONCURRENT = 1;

export interface RunManagerOptions {
  createSession: SessionFactory;
  ttlMs?: number;
  maxConcurrentRuns?: number;
}

export class RunManager {
  private runs = new Map<string, RunState>();
  private tokens = new Map<string, CancelToken>();
  private sessions = new Map<string, SessionController>();
  private cleanupTimer: ReturnType<typeof setInterval> | null = null;
  private createSession: SessionFactory;
  private ttlMs: number;
  private semaphore: Semaphore;

  constructor(opts: RunManagerOptions) {
    this.createSession = opts.createSession;
    this.ttlMs = opts.ttlMs ?? DEFAULT_TTL_MS;
    this.semaphore = new Semaphore(opts.maxConcurrentRuns ?? DEFAULT_MAX_CONCURRENT);
    this.cleanupTimer = setInterval(() => this.cleanup(), CLEANUP_INTERVAL_MS);
    if (this.cleanupTimer.unref) this.cleanupTimer.unref();
  }

  /**
   * Submit a session. In sync mode, awaits it and returns the result inline.
   * In async mode, starts it in the background and returns the runId.
   */
  async submit(task: Task, opts: { mode: 'sync' | 'async' }): Promise<{ runId: string; result?: SessionResult }> {
    const run = this.createRun(task);
    const token = new CancelToken();
    this.tokens.set(run.runId, token);

    if (opts.mode === 'sync') {
      const result = await this.executeRun(run.runId, task, token);
      return { runId: run.runId, result };
    }

    this.executeRun(run.runId, task, token).catch((err) => {
      console.log(`[Session] run ${run.runId} failed outside the session: ${errorMessage(err)}`);
    });
    return { runId: run.runId };
  }

  get(runId: string): RunState | undefined {
    return this.runs.get(runId);
  }

  /** Records so far for a live run, or the final records of a finished one. */
  records(runId: string): readonly ActionRecord[] | undefined {
    const run = this.runs.get(runId);
    if (!run) return undefined;
    return this.sessions.get(runId)?.getRecords() ?? run.result?.records ?? [];
  }

  cancel(runId: string): boolean {
    const run = this.runs.get(runId);
    if (!run) return false;
    if (isTerminal(run.status)) return false;

    const token = this.tokens.get(runId);
    if (token) token.cancel('Session cancelled by user');

    // A running session finishes its current round and reports 'cancelled' itself.
    if (run.status === 'queued') {
      run.error = { message: 'Session cancelled by user' };
      this.transition(runId, 'cancelled');
    }
    return true;
  }

  list(filter?: { status?: RunStatus; app?: string; limit?: number; offset?: number }): RunState[] {
    const results = this.filterRuns(filter);
    const offset = filter?.offset ?? 0;
    const limit = filter?.limit ?? 50;
    return results.slice(offset, offset + limit);
  }

  count(filter?: { status?: RunStatus; app?: string }): number {
    return this.filterRuns(filter).length;
  }

  dispose(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    for (const token of this.tokens.values()) {
      token.cancel('Server shutting down');
    }
    this.tokens.clear();
    this.sessions.clear();
    this.runs.clear();
  }

  // --- Internal helpers ---

  private createRun(task: Task): RunState {
    const now = Date.now();
    const run: RunState = {
      runId: randomUUID(),
      goal: task.goal,
      mode: task.mode,
      app: task.app ?? task.packageName,
      status: 'queued',
      createdAt: now,
      updatedAt: now,
      progress: { round: 0 },
      metrics: { elapsedMs: 0 },
    };
    this.runs.set(run.runId, run);
    return run;
  }

  private transition(runId: string, status: RunStatus): void {
    const run = this.runs.get(runId);
    if (!run) return;
    if (isTerminal(run.status)) return;
    run.status = status;
    run.updatedAt = Date.now();
    if (isTerminal(status)) {
      run.metrics.elapsedMs = run.updatedAt - run.createdAt;
      this.tokens.delete(runId);
      this.sessions.delete(runId);
    }
  }

  private onSessionEvent(runId: string, event: SessionEvent): void {
    const run = this.runs.get(runId);
    if (!run || isTerminal(run.status)) return;
    if (event.type === 'round_started') {
      run.progress = { round: event.round, subGoal: event.subGoal };
      run.updatedAt = Date.now();
    }
  }

  private async executeRun(runId: string, task: Task, token: CancelToken): Promise<SessionResult | undefined> {
    await this.semaphore.acquire();

    try {
      // Cancelled while waiting for the device
      if (token.canceled) {
        this.transition(runId, 'cancelled');
        return undefined;
      }

      const session = this.createSession(task, runId, token);
      this.sessions.set(runId, session);
      session.on('event', (event: SessionEvent) => this.onSessionEvent(runId, event));
      this.transition(runId, 'running');

      const result = await session.run();
      const run = this.runs.get(runId);
      if (!run) return result;

      run.result = result;
      if (result.status !== 'completed') {
        run.error = { kind: result.kind, message: result.message };
      }
      this.transition(runId, result.status);
      return result;
    } catch (err) {
      const run = this.runs.get(runId);
      if (run && !isTerminal(run.status)) {
        run.error = { kind: isAgentError(err) ? err.kind : undefined, message: errorMessage(err) };
        this.transition(runId, 'failed');
      }
      throw err;
    } finally {
      this.semaphore.release();
    }
  }

  private filterRuns(filter?: { status?: RunStatus; app?: string }): RunState[] {
    let results = Array.from(this.runs.values());

    if (filter?.status) {
      results = results.filter((r) => r.status === filter.status);
    }
    if (filter?.app) {
      results = results.filter((r) => r.app === filter.app);
    }

    // Newest first
    results.sort((a, b) => b.createdAt - a.createdAt);
    return results;
  }

  private cleanup(): void {
    const now = Date.now();
    for (const [id, run] of this.runs) {
      if (isTerminal(run.status) && now - run.updatedAt > this.ttlMs) {
        this.runs.delete(id);
        this.tokens.delete(id);
        this.sessions.delete(id);
      }
    }
  }
}
