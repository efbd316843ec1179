/**
 * Tracks token usage across VLM calls, split by the stage that made them.
 */

import type { VlmUsage } from '../vlm/types.js';

export type CallPurpose = 'plan' | 'decide' | 'reflect';

export interface TokenUsage {
  input: number;
  output: number;
  total: number;
  calls: number;
  byPurpose: Record<CallPurpose, number>;
}

export class TokenTracker {
  private inputTokens = 0;
  private outputTokens = 0;
  private callCount = 0;
  private byPurpose: Record<CallPurpose, number> = { plan: 0, decide: 0, reflect: 0 };

  record(purpose: CallPurpose, usage?: VlmUsage): void {
    this.callCount++;
    this.byPurpose[purpose]++;
    if (!usage) return;
    this.inputTokens += usage.prompt_tokens ?? 0;
    this.outputTokens += usage.completion_tokens ?? 0;
  }

  getUsage(): TokenUsage {
    return {
      input: this.inputTokens,
      output: this.outputTokens,
      total: this.inputTokens + this.outputTokens,
      calls: this.callCount,
      byPurpose: { ...this.byPurpose },
    };
  }
}
