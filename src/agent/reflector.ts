import type { ActionIntent, ResolvedAction, ScreenState, UIElement, Verdict } from '../types/index.js';
import type { VlmClient } from '../vlm/types.js';
import { elementLabel } from '../memory/KnowledgeInjector.js';
import { buildReflectPrompt } from './prompt.js';
import { parseReflection, type ReflectionDecision } from './response-parser.js';
import { diffScreens, summarizeDiff } from './screen-diff.js';
import type { TokenTracker } from './token-tracker.js';
import type { Reflection, SubGoal, Task } from './types.js';

export interface ReflectInput {
  task: Task;
  subGoal: SubGoal;
  before: ScreenState;
  after: ScreenState;
  action: ResolvedAction;
  intent?: ActionIntent;
  element?: UIElement;
  /** Package the session drives; leaving it counts as an error */
  appPackage?: string;
}

const CRASH_PATTERNS = [/has stopped/i, /keeps stopping/i, /isn'?t responding/i, /unfortunately,? .* has stopped/i];

// 系统界面，弹出权限框或输入法时前台包会短暂变成这些
const TRANSIENT_PACKAGES: ReadonlySet<string> = new Set([
  'com.android.permissioncontroller',
  'com.google.android.permissioncontroller',
  'com.android.packageinstaller',
  'com.google.android.inputmethod.latin',
  'com.android.inputmethod.latin',
]);

const DECISION_VERDICTS: Record<ReflectionDecision, Verdict> = {
  SUCCESS: 'success',
  CONTINUE: 'unexpected-change',
  BACK: 'unexpected-change',
  INEFFECTIVE: 'no-op',
};

function screenTexts(screen: ScreenState): string[] {
  return screen.elements.flatMap((e) => [e.text, e.contentDesc].filter((t): t is string => Boolean(t)));
}

function containsAll(haystack: string[], needles: readonly string[]): boolean {
  const lower = haystack.map((h) => h.toLowerCase());
  return needles.every((n) => lower.some((h) => h.includes(n.toLowerCase())));
}

/** Every needle appears, case-insensitively, in some text or description on screen. */
export function textsPresent(screen: ScreenState, needles: readonly string[]): boolean {
  return needles.length > 0 && containsAll(screenTexts(screen), needles);
}

export function crashText(screen: ScreenState): string | undefined {
  return screenTexts(screen).find((t) => CRASH_PATTERNS.some((re) => re.test(t)));
}

export function isIdentical(a: ScreenState, b: ScreenState): boolean {
  return a.signature === b.signature && a.fingerprint === b.fingerprint;
}

/**
 * Classifies an executed action. Cheap structural rules run first; the model
 * is only asked when they cannot decide.
 */
export class OutcomeReflector {
  constructor(
    private vlm: VlmClient,
    private opts: { minElementDist: number },
    private tokens?: TokenTracker,
  ) {}

  async reflect(input: ReflectInput): Promise<Reflection> {
    const { before, after } = input;

    const crash = crashText(after);
    if (crash) {
      return { verdict: 'error', description: `App crash dialog: "${crash}"`, pressBack: false };
    }
    if (
      input.appPackage &&
      after.foregroundPackage &&
      after.foregroundPackage !== input.appPackage &&
      !TRANSIENT_PACKAGES.has(after.foregroundPackage)
    ) {
      return {
        verdict: 'error',
        description: `Left the app: ${after.foregroundPackage} is in the foreground`,
        pressBack: false,
      };
    }

    if (isIdentical(before, after)) {
      return { verdict: 'no-op', description: 'The screen did not change.', pressBack: false };
    }

    const diff = diffScreens(before, after, this.opts.minElementDist);
    if (textsPresent(after, input.subGoal.verifyText)) {
      return { verdict: 'success', description: summarizeDiff(diff), pressBack: false };
    }
    if (input.intent?.expectedText && textsPresent(after, input.intent.expectedText)) {
      return { verdict: 'success', description: summarizeDiff(diff), pressBack: false };
    }

    const response = await this.vlm.complete({
      prompt: buildReflectPrompt({
        task: input.task,
        subGoal: input.subGoal,
        action: input.action,
        targetDescription: input.element ? `"${elementLabel(input.element)}"` : undefined,
        thought: input.intent?.thought,
      }),
      images: [before.screenshotPath, after.screenshotPath],
    });
    this.tokens?.record('reflect', response.usage);

    const parsed = parseReflection(response.text);
    if (!parsed.ok) {
      console.log(`[Reflect] ${parsed.error}; judging from the screen diff`);
      return { verdict: 'unexpected-change', description: summarizeDiff(diff), pressBack: false };
    }

    return {
      verdict: DECISION_VERDICTS[parsed.value.decision],
      description: parsed.value.documentation || summarizeDiff(diff),
      pressBack: parsed.value.decision === 'BACK',
    };
  }
}
