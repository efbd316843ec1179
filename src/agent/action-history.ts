import type { Verdict } from '../types/index.js';
import type { ErrorKind } from './errors.js';

export interface RoundSummary {
  round: number;
  /** What was attempted, in words the model can read back */
  description: string;
  /** Identity of the attempt on this screen, used for repetition checks */
  signature: string;
  outcome: Verdict | ErrorKind;
}

export interface LoopDetection {
  type: 'exact_repeat' | 'oscillation' | 'futile_retry';
  message: string;
  windowSize: number;
}

const NO_PROGRESS: ReadonlySet<string> = new Set(['no-op', 'error', 'UnresolvableTarget', 'ActionExecutionFailed']);

/**
 * Per-session round history. Feeds the "recent rounds" part of the decision
 * prompt and spots the model going in circles.
 */
export class ActionHistory {
  private rounds: RoundSummary[] = [];

  record(summary: RoundSummary): void {
    this.rounds.push(summary);
  }

  getHistory(): readonly RoundSummary[] {
    return this.rounds;
  }

  recent(count = 5): string[] {
    return this.rounds.slice(-count).map((r) => `round ${r.round}: ${r.description} -> ${r.outcome}`);
  }

  /** Same attempt on the same screen N times in a row. */
  detectRepeat(windowSize = 3): LoopDetection | null {
    if (this.rounds.length < windowSize) return null;
    const recent = this.rounds.slice(-windowSize);
    if (!recent.every((r) => r.signature === recent[0].signature)) return null;
    return {
      type: 'exact_repeat',
      message: `"${recent[0].description}" was attempted ${windowSize} times in a row. Choose a different element or action.`,
      windowSize,
    };
  }

  /** A -> B -> A -> B */
  detectOscillation(windowSize = 4): LoopDetection | null {
    if (this.rounds.length < windowSize) return null;
    const recent = this.rounds.slice(-windowSize);
    const [a, b] = [recent[0].signature, recent[1].signature];
    if (a === b) return null;
    const oscillating = recent.every((r, i) => r.signature === (i % 2 === 0 ? a : b));
    if (!oscillating) return null;
    return {
      type: 'oscillation',
      message: `Alternating between "${recent[0].description}" and "${recent[1].description}" without progress. Try another path.`,
      windowSize,
    };
  }

  /** Same attempt failing or doing nothing repeatedly. */
  detectFutileRetry(threshold = 2): LoopDetection | null {
    if (this.rounds.length < threshold) return null;
    const recent = this.rounds.slice(-threshold);
    const sig = recent[0].signature;
    if (!recent.every((r) => r.signature === sig && NO_PROGRESS.has(r.outcome))) return null;
    return {
      type: 'futile_retry',
      message: `"${recent[0].description}" had no effect ${threshold} times. It probably does nothing here; pick something else or go back.`,
      windowSize: threshold,
    };
  }

  detectAny(): LoopDetection | null {
    return this.detectFutileRetry() || this.detectRepeat() || this.detectOscillation() || null;
  }
}
