import type { Decision, ScreenState } from '../types/index.js';
import type { VlmClient } from '../vlm/types.js';
import { ScreenGrid } from '../screen/ScreenGrid.js';
import { AgentError } from './errors.js';
import { SYSTEM_PROMPT, buildCorrectionPrompt, buildDecidePrompt, buildPlanPrompt } from './prompt.js';
import { parseDecision, parsePlan } from './response-parser.js';
import type { TokenTracker } from './token-tracker.js';
import type { SubGoal, Task } from './types.js';

export interface DecisionContext {
  task: Task;
  subGoal: SubGoal;
  subGoalIndex: number;
  subGoalCount: number;
  screen: ScreenState;
  /** Rendered knowledge-base context for the elements on screen */
  knowledge: string;
  history: string[];
  hint?: string;
}

export interface DecisionEngineOptions {
  maxAttempts: number;
  gridCellSize: number;
}

/**
 * Wraps the model behind two calls with fixed contracts: decompose() yields
 * sub-goals or throws PlanningFailed; decide() yields exactly one Decision or
 * throws DecisionUnparsable after maxAttempts tries.
 */
export class DecisionEngine {
  constructor(
    private vlm: VlmClient,
    private opts: DecisionEngineOptions,
    private tokens?: TokenTracker,
  ) {}

  async decompose(task: Task): Promise<SubGoal[]> {
    if (task.mode === 'explore') {
      return [{ description: `Explore the app and document what its controls do: ${task.goal}`, status: 'pending', verifyText: [] }];
    }

    const response = await this.vlm.complete({ system: SYSTEM_PROMPT, prompt: buildPlanPrompt(task) });
    this.tokens?.record('plan', response.usage);

    const parsed = parsePlan(response.text);
    if (!parsed.ok) {
      throw new AgentError('PlanningFailed', `Could not decompose task: ${parsed.error}`);
    }
    console.log(`[Decision] Plan: ${parsed.value.map((g, i) => `${i + 1}. ${g.description}`).join(' | ')}`);
    return parsed.value.map((g): SubGoal => ({ description: g.description, status: 'pending', verifyText: g.verifyText }));
  }

  async decide(ctx: DecisionContext): Promise<Decision> {
    let gridMode = ctx.screen.elements.length === 0;
    let basePrompt = this.buildPrompt(ctx, gridMode);
    let prompt = basePrompt;
    let lastError = '';

    for (let attempt = 1; attempt <= this.opts.maxAttempts; attempt++) {
      const response = await this.vlm.complete({
        system: SYSTEM_PROMPT,
        prompt,
        images: [ctx.screen.screenshotPath],
      });
      this.tokens?.record('decide', response.usage);

      const parsed = parseDecision(response.text, { gridMode });
      if (parsed.ok && parsed.value.kind !== 'grid') return parsed.value;

      if (parsed.ok && !gridMode && this.canGrid(ctx)) {
        // 模型主动请求网格：换成网格提示重问一次，不计入尝试次数
        console.log('[Decision] Model asked for grid mode');
        gridMode = true;
        basePrompt = this.buildPrompt(ctx, gridMode);
        prompt = basePrompt;
        attempt--;
        continue;
      }

      if (parsed.ok) {
        lastError = gridMode ? 'Grid mode is already on; choose an action' : 'Grid mode is not available for this screen';
      } else {
        lastError = parsed.error;
      }
      console.log(`[Decision] Unparsable response (attempt ${attempt}/${this.opts.maxAttempts}): ${lastError}`);
      prompt = buildCorrectionPrompt(basePrompt, lastError);
    }

    throw new AgentError(
      'DecisionUnparsable',
      `No usable decision after ${this.opts.maxAttempts} attempts: ${lastError}`,
    );
  }

  private canGrid(ctx: DecisionContext): boolean {
    return ScreenGrid.isValid(ctx.screen.width, ctx.screen.height, this.opts.gridCellSize);
  }

  private buildPrompt(ctx: DecisionContext, gridMode: boolean): string {
    const grid =
      gridMode && this.canGrid(ctx)
        ? new ScreenGrid(ctx.screen.width, ctx.screen.height, this.opts.gridCellSize)
        : undefined;
    return buildDecidePrompt({ ...ctx, grid });
  }
}
