import fs from 'node:fs';
import path from 'node:path';
import { AgentError } from '../agent/errors.js';
import { mergeObservation } from './KnowledgeMerger.js';
import { appKnowledgeSchema } from './types.js';
import type { AppKnowledge, AppSummary, KnowledgeEntry, KnowledgeObservation } from './types.js';

const FLUSH_DELAY = 5000;

/** Guard against path traversal: package names and similar identifiers only */
export function isSafeAppId(app: string): boolean {
  return /^[a-zA-Z0-9][a-zA-Z0-9_.-]{0,199}$/.test(app) && !app.includes('..');
}

export interface KnowledgeStoreOptions {
  refinement: boolean;
  flushDelayMs?: number;
}

/**
 * Per-app knowledge handle. Owned by the store; all merges for one app go
 * through the same instance, which keeps the entry-per-key invariant.
 */
export class KnowledgeBase {
  constructor(
    readonly app: string,
    private data: AppKnowledge,
    private refinement: boolean,
    private onChange: () => void,
    private onFlush: () => void,
  ) {}

  lookup(screenSignature: string): KnowledgeEntry[] {
    const screen = this.data.screens[screenSignature];
    return screen ? Object.values(screen) : [];
  }

  get(screenSignature: string, elementSignature: string): KnowledgeEntry | undefined {
    return this.data.screens[screenSignature]?.[elementSignature];
  }

  merge(obs: KnowledgeObservation): KnowledgeEntry {
    const screen = (this.data.screens[obs.screenSignature] ??= {});
    const entry = mergeObservation(this.app, screen[obs.elementSignature], obs, { refinement: this.refinement });
    screen[obs.elementSignature] = entry;
    this.data.updatedAt = entry.updatedAt;
    this.onChange();
    return entry;
  }

  summary(): AppSummary {
    const screens = Object.values(this.data.screens);
    return {
      app: this.app,
      screens: screens.length,
      entries: screens.reduce((n, s) => n + Object.keys(s).length, 0),
      updatedAt: this.data.updatedAt,
    };
  }

  flush(): void {
    this.onFlush();
  }

  snapshot(): AppKnowledge {
    return structuredClone(this.data);
  }

  /** Drop every entry; callers holding this handle keep using it. */
  reset(): void {
    this.data = { app: this.app, version: 1, updatedAt: Date.now(), screens: {} };
  }
}

/**
 * One JSON file per app under baseDir. Writes are debounced and forced
 * by flush()/dispose(); each write goes through a temp file and rename.
 */
export class KnowledgeStore {
  private handles = new Map<string, KnowledgeBase>();
  private dirty = new Set<string>();
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private flushDelay: number;

  constructor(
    private baseDir: string,
    private opts: KnowledgeStoreOptions,
  ) {
    this.flushDelay = opts.flushDelayMs ?? FLUSH_DELAY;
  }

  open(app: string): KnowledgeBase {
    if (!isSafeAppId(app)) {
      throw new AgentError('InvalidTask', `Unsafe app identifier: ${app}`);
    }
    const existing = this.handles.get(app);
    if (existing) return existing;

    const handle = new KnowledgeBase(
      app,
      this.load(app),
      this.opts.refinement,
      () => this.markDirty(app),
      () => this.flush(app),
    );
    this.handles.set(app, handle);
    return handle;
  }

  lookup(app: string, screenSignature: string): KnowledgeEntry[] {
    if (!isSafeAppId(app)) return [];
    return this.open(app).lookup(screenSignature);
  }

  listApps(): AppSummary[] {
    const apps = new Set(this.handles.keys());
    if (fs.existsSync(this.baseDir)) {
      for (const f of fs.readdirSync(this.baseDir)) {
        if (f.endsWith('.json')) apps.add(f.slice(0, -'.json'.length));
      }
    }
    return [...apps]
      .filter((app) => this.hasApp(app))
      .map((app) => this.open(app).summary())
      .sort((a, b) => b.updatedAt - a.updatedAt);
  }

  hasApp(app: string): boolean {
    if (!isSafeAppId(app)) return false;
    if (fs.existsSync(this.filePath(app))) return true;
    const handle = this.handles.get(app);
    return handle !== undefined && handle.summary().entries > 0;
  }

  /** Empty an app's knowledge in place: open handles stay valid. */
  clearApp(app: string): boolean {
    if (!this.hasApp(app)) return false;
    this.handles.get(app)?.reset();
    this.dirty.delete(app);
    fs.rmSync(this.filePath(app), { force: true });
    return true;
  }

  /** Write pending changes now (one app, or all of them). */
  flush(app?: string): void {
    const apps = app ? [app] : [...this.dirty];
    for (const a of apps) {
      if (!this.dirty.has(a)) continue;
      const handle = this.handles.get(a);
      if (!handle) continue;
      this.write(a, handle.snapshot());
      this.dirty.delete(a);
    }
  }

  dispose(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
    this.flush();
  }

  // === Private helpers ===

  private filePath(app: string): string {
    return path.join(this.baseDir, `${app}.json`);
  }

  private load(app: string): AppKnowledge {
    const empty: AppKnowledge = { app, version: 1, updatedAt: Date.now(), screens: {} };
    const filePath = this.filePath(app);
    if (!fs.existsSync(filePath)) return empty;

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
    } catch (err) {
      console.warn(`[Knowledge] ${filePath} is not valid JSON, starting fresh:`, err);
      return empty;
    }
    const parsed = appKnowledgeSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn(`[Knowledge] ${filePath} has an unexpected shape, starting fresh`);
      return empty;
    }
    return parsed.data;
  }

  private write(app: string, data: AppKnowledge): void {
    fs.mkdirSync(this.baseDir, { recursive: true });
    const target = this.filePath(app);
    const tmp = `${target}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, JSON.stringify(data, null, 2), 'utf-8');
    fs.renameSync(tmp, target);
  }

  private markDirty(app: string): void {
    this.dirty.add(app);
    if (this.flushTimer) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      try {
        this.flush();
      } catch (err) {
        console.error('[Knowledge] Background flush failed:', err);
      }
    }, this.flushDelay);
    if (this.flushTimer.unref) this.flushTimer.unref();
  }
}
