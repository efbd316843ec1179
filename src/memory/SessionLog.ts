import fs from 'node:fs';
import path from 'node:path';
import type { ActionIntent, GroundingSource, ResolvedAction, ScreenRef, Verdict } from '../types/index.js';
import type { ErrorKind } from '../agent/errors.js';

// 一轮的执行记录，写入后不可修改
export interface ActionRecord {
  round: number;
  subGoalIndex: number;
  subGoal: string;
  timestamp: number;
  intent?: ActionIntent;
  action?: ResolvedAction;
  via?: GroundingSource;
  elementSignature?: string;
  before: ScreenRef;
  after?: ScreenRef;
  verdict?: Verdict;
  /** Set when the round failed before a verdict could be reached */
  errorKind?: ErrorKind;
  description: string;
}

export interface SessionLogHeader {
  sessionId: string;
  task: string;
  mode: string;
  app?: string;
  startedAt: number;
}

export interface SessionLogFile extends SessionLogHeader {
  endedAt?: number;
  status?: string;
  kind?: string;
  subGoals: Array<{ description: string; status: string }>;
  records: readonly ActionRecord[];
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function hideTypedText(record: ActionRecord): ActionRecord {
  const intent = record.intent?.text !== undefined ? { ...record.intent, text: '<hidden>' } : record.intent;
  const action = record.action?.kind === 'type_text' ? { ...record.action, text: '<hidden>' } : record.action;
  return { ...record, intent, action };
}

/**
 * Append-only record log for one session. Every append rewrites
 * session.partial.json so a crash leaves the rounds so far on disk;
 * finalize() writes session.json.
 */
export class SessionLog {
  private records: ActionRecord[] = [];
  private subGoals: Array<{ description: string; status: string }> = [];
  private finalized = false;
  readonly dir: string;

  constructor(
    runsDir: string | null,
    private header: SessionLogHeader,
    private opts: { redactText?: boolean } = {},
  ) {
    this.dir = runsDir ? path.join(runsDir, header.sessionId) : '';
  }

  append(record: ActionRecord): ActionRecord {
    if (this.finalized) {
      throw new Error(`Session log ${this.header.sessionId} is already finalized`);
    }
    const stored = deepFreeze(this.opts.redactText ? hideTypedText(record) : { ...record });
    this.records.push(stored);
    this.writePartial();
    return stored;
  }

  setSubGoals(subGoals: Array<{ description: string; status: string }>): void {
    this.subGoals = subGoals.map((g) => ({ ...g }));
  }

  getRecords(): readonly ActionRecord[] {
    return this.records;
  }

  get size(): number {
    return this.records.length;
  }

  finalize(outcome: { status: string; kind?: string }): SessionLogFile {
    const file: SessionLogFile = {
      ...this.header,
      endedAt: Date.now(),
      status: outcome.status,
      kind: outcome.kind,
      subGoals: this.subGoals,
      records: this.records,
    };
    if (!this.finalized) {
      this.finalized = true;
      this.write('session.json', file);
      if (this.dir) fs.rmSync(path.join(this.dir, 'session.partial.json'), { force: true });
    }
    return file;
  }

  private writePartial(): void {
    this.write('session.partial.json', { ...this.header, subGoals: this.subGoals, records: this.records });
  }

  private write(name: string, data: SessionLogFile): void {
    if (!this.dir) return;
    try {
      fs.mkdirSync(this.dir, { recursive: true });
      fs.writeFileSync(path.join(this.dir, name), JSON.stringify(data, null, 2), 'utf-8');
    } catch (err) {
      console.error(`[Session] Failed to write ${name}:`, err);
    }
  }
}
