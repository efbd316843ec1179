import type { ResolvedAction, ScreenState, UIElement } from '../types/index.js';
import type { ScreenGrid } from '../screen/ScreenGrid.js';
import type { SubGoal, Task } from './types.js';

export const SYSTEM_PROMPT = `You are an agent operating an Android phone through screenshots.
Each turn you receive the task, the current sub-goal, a screenshot and a list of
interactive elements (or a grid when no element list is available). You choose
exactly ONE action per turn and reply with ONE JSON object and nothing else.

Actions:
- {"action": "tap", "element": <label>}
- {"action": "long_press", "element": <label>}
- {"action": "type_text", "element": <label>, "text": "<text>"}   (element optional if a field is focused)
- {"action": "swipe", "element": <label>, "direction": "up|down|left|right"}   (omit element to swipe the whole screen)
- {"action": "back"}
- {"action": "enter"}   press the keyboard's Enter key
- {"action": "delete", "count": <n>}   press backspace n times (default 1)
- {"action": "wait", "seconds": <n>}   let a loading screen settle (at most 10)
- {"action": "grid"}   show a numbered grid instead of element labels when the target is not listed
- {"action": "subgoal_complete"}   the current sub-goal is already achieved on this screen
- {"action": "task_complete"}      the whole task is achieved

Grid mode: use "cell": <n> instead of "element", optionally with
"subarea": "center|top-left|top|top-right|left|right|bottom-left|bottom|bottom-right".

Optional fields:
- "thought": one sentence on why
- "expected_text": strings you expect to see after the action
- "completes_subgoal": true when this action should finish the current sub-goal

Rules:
- Use only labels from the list you were given this turn.
- Prefer elements you have notes about when they match the goal.
- If the same action did nothing twice, try something different.`;

function elementFlags(el: UIElement): string {
  const flags: string[] = [];
  if (el.editable) flags.push('editable');
  if (el.clickable) flags.push('clickable');
  if (el.longClickable) flags.push('long-clickable');
  if (el.scrollable) flags.push('scrollable');
  if (el.checked) flags.push('checked');
  if (!el.enabled) flags.push('disabled');
  return flags.join(',');
}

export function describeElement(el: UIElement): string {
  const parts = [`[${el.index}]`, el.className.split('.').pop() || 'View'];
  if (el.text) parts.push(JSON.stringify(el.text.slice(0, 60)));
  if (el.contentDesc) parts.push(`desc=${JSON.stringify(el.contentDesc.slice(0, 60))}`);
  if (el.resourceId) parts.push(`id=${el.resourceId.split('/').pop()}`);
  parts.push(`at (${el.center.x},${el.center.y})`);
  const flags = elementFlags(el);
  if (flags) parts.push(`{${flags}}`);
  return parts.join(' ');
}

export function describeAction(action: ResolvedAction): string {
  switch (action.kind) {
    case 'tap':
      return `tap (${action.point.x},${action.point.y})`;
    case 'long_press':
      return `long_press (${action.point.x},${action.point.y})`;
    case 'swipe':
      return `swipe (${action.from.x},${action.from.y}) -> (${action.to.x},${action.to.y})`;
    case 'type_text':
      return `type_text (${action.text.length} chars)`;
    case 'back':
      return 'back';
    case 'enter':
      return 'enter';
    case 'delete':
      return `delete (${action.count} chars)`;
    case 'wait':
      return `wait ${action.durationMs}ms`;
  }
}

export function buildPlanPrompt(task: Task): string {
  return `Break this Android app task into a short ordered list of sub-goals (1 to 8).
Each sub-goal should be one screen-level step a person could verify by looking at the phone.

Task: ${task.goal}

Reply with a JSON array. Each item is either a string or
{"goal": "<sub-goal>", "verify_text": ["<text visible once it is done>", ...]}.
Only give verify_text when you are confident which words will appear.`;
}

export interface DecidePromptInput {
  task: Task;
  subGoal: SubGoal;
  subGoalIndex: number;
  subGoalCount: number;
  screen: ScreenState;
  grid?: ScreenGrid;
  knowledge: string;
  history: string[];
  hint?: string;
}

export function buildDecidePrompt(input: DecidePromptInput): string {
  const { task, subGoal, subGoalIndex, subGoalCount, screen } = input;
  const lines: string[] = [];

  lines.push(`Task (${task.mode}): ${task.goal}`);
  lines.push(`Current sub-goal (${subGoalIndex + 1}/${subGoalCount}): ${subGoal.description}`);
  if (task.mode === 'explore') {
    lines.push('You are exploring: try elements you have no notes about yet, and avoid leaving the app.');
  }
  lines.push('');

  if (input.grid) {
    lines.push(
      screen.elements.length > 0
        ? 'Grid mode is on. Element labels are hidden this turn.'
        : 'No element list is available for this screen. Grid mode is on.',
    );
    lines.push(input.grid.describe());
  } else if (screen.elements.length > 0) {
    lines.push(`Screen ${screen.width}x${screen.height}, interactive elements:`);
    for (const el of screen.elements) lines.push(describeElement(el));
  }

  if (input.knowledge) {
    lines.push('');
    lines.push(input.knowledge);
  }

  if (input.history.length > 0) {
    lines.push('');
    lines.push('Recent rounds:');
    for (const h of input.history) lines.push(`- ${h}`);
  }

  if (input.hint) {
    lines.push('');
    lines.push(`Note: ${input.hint}`);
  }

  lines.push('');
  lines.push('Reply with exactly one JSON object.');
  return lines.join('\n');
}

export function buildCorrectionPrompt(original: string, error: string): string {
  return `${original}

Your previous reply could not be used: ${error}
Reply again with exactly ONE JSON object in the documented format, nothing else.`;
}

export interface ReflectPromptInput {
  task: Task;
  subGoal: SubGoal;
  action: ResolvedAction;
  targetDescription?: string;
  thought?: string;
}

export function buildReflectPrompt(input: ReflectPromptInput): string {
  const target = input.targetDescription ? ` on ${input.targetDescription}` : '';
  return `Two screenshots follow: before and after an action on an Android app.

Task: ${input.task.goal}
Sub-goal: ${input.subGoal.description}
Action taken: ${describeAction(input.action)}${target}
${input.thought ? `Reason given for the action: ${input.thought}\n` : ''}
Judge the effect and answer with one JSON object:
{"decision": "SUCCESS|CONTINUE|INEFFECTIVE|BACK", "documentation": "<one sentence on what this element does>"}

- SUCCESS: the action moved the sub-goal forward as intended
- CONTINUE: the screen changed but not toward the sub-goal; keep going from here
- INEFFECTIVE: nothing visible changed
- BACK: the action led somewhere unhelpful and should be undone

The documentation should describe the element's general function, not this task.`;
}
