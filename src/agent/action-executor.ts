import type { DeviceController, ResolvedAction } from '../types/index.js';
import { AgentError, errorMessage, isAgentError } from './errors.js';

export interface ActionExecutorOptions {
  /** Upper bound for one device primitive */
  timeoutMs: number;
  /** Wait after a successful primitive so animations settle before the next capture */
  settleMs: number;
  /** Extra attempts for a failed primitive */
  retries?: number;
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Issues device primitives for resolved actions. A failed primitive is
 * retried once; DeviceUnreachable is passed through untouched. A wait only
 * sleeps and never touches the device.
 */
export class ActionExecutor {
  private retries: number;

  constructor(
    private device: DeviceController,
    private opts: ActionExecutorOptions,
  ) {
    this.retries = opts.retries ?? 1;
  }

  async execute(action: ResolvedAction): Promise<void> {
    if (action.kind === 'wait') {
      await delay(action.durationMs);
      return;
    }
    let lastError: unknown;
    for (let attempt = 0; attempt <= this.retries; attempt++) {
      try {
        await withTimeout(this.dispatch(action), this.opts.timeoutMs, action.kind);
        if (this.opts.settleMs > 0) await delay(this.opts.settleMs);
        return;
      } catch (err) {
        if (isAgentError(err) && err.kind === 'DeviceUnreachable') throw err;
        lastError = err;
        console.log(`[Executor] ${action.kind} failed (attempt ${attempt + 1}/${this.retries + 1}): ${errorMessage(err)}`);
      }
    }
    throw new AgentError('ActionExecutionFailed', `${action.kind} failed: ${errorMessage(lastError)}`, { cause: lastError });
  }

  async pressBack(): Promise<void> {
    await this.execute({ kind: 'back' });
  }

  private async dispatch(action: ResolvedAction): Promise<void> {
    switch (action.kind) {
      case 'tap':
        return this.device.tap(action.point);
      case 'long_press':
        return this.device.longPress(action.point, action.durationMs);
      case 'swipe':
        return this.device.swipe(action.from, action.to, action.durationMs);
      case 'type_text':
        if (action.focus) await this.device.tap(action.focus);
        return this.device.typeText(action.text);
      case 'back':
        return this.device.pressBack();
      case 'enter':
        return this.device.pressEnter();
      case 'delete':
        return this.device.pressDelete(action.count);
      case 'wait':
        return delay(action.durationMs);
    }
  }
}
