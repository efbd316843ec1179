/**
 * The single lenient boundary between free-form model output and the typed
 * Decision / plan / reflection values the rest of the agent works with.
 * Accepts JSON (bare or fenced) and the line format
 *   Thought: ...
 *   Action: tap(3)
 * including the command names swipe_element, swipe_screen, press_enter,
 * delete_multiple, wait and grid.
 */

import { z } from 'zod';
import type { ActionIntent, Decision, GridTarget, SwipeDirection, TargetRef } from '../types/index.js';
import { isGridSubarea } from '../screen/ScreenGrid.js';

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

/** The model asks to see the grid overlay before choosing */
export interface GridRequest {
  kind: 'grid';
}

export type ParsedDecision = Decision | GridRequest;

export type ReflectionDecision = 'SUCCESS' | 'CONTINUE' | 'INEFFECTIVE' | 'BACK';

export interface ParsedReflection {
  decision: ReflectionDecision;
  documentation: string;
}

export interface PlannedSubGoal {
  description: string;
  verifyText: string[];
}

// ===== JSON extraction =====

function balancedSlice(text: string, start: number): string | null {
  const open = text[start];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      if (depth === 0) return text.slice(start, i + 1);
    }
  }
  return null;
}

function tryParse(candidate: string): unknown {
  try {
    return JSON.parse(candidate);
  } catch {
    return undefined;
  }
}

/** First JSON value in the text: fenced block first, then the first balanced {...} or [...]. */
export function extractJson(text: string): unknown {
  const fenced = /```(?:json)?\s*([\s\S]*?)```/i.exec(text);
  if (fenced) {
    const value = tryParse(fenced[1].trim());
    if (value !== undefined) return value;
  }
  for (let i = 0; i < text.length; i++) {
    if (text[i] !== '{' && text[i] !== '[') continue;
    const slice = balancedSlice(text, i);
    if (!slice) continue;
    const value = tryParse(slice);
    if (value !== undefined) return value;
  }
  return undefined;
}

// ===== Decisions =====

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type Operation = ActionIntent['operation'] | 'task_complete' | 'subgoal_complete' | 'grid';

const OPERATION_ALIASES: Record<string, Operation> = {
  tap: 'tap',
  click: 'tap',
  press: 'tap',
  long_press: 'long_press',
  longpress: 'long_press',
  long_tap: 'long_press',
  long_click: 'long_press',
  swipe: 'swipe',
  scroll: 'swipe',
  swipe_element: 'swipe',
  swipe_screen: 'swipe',
  type: 'type_text',
  type_text: 'type_text',
  text: 'type_text',
  input: 'type_text',
  back: 'back',
  go_back: 'back',
  press_back: 'back',
  enter: 'enter',
  press_enter: 'enter',
  submit: 'enter',
  delete: 'delete',
  press_delete: 'delete',
  delete_multiple: 'delete',
  backspace: 'delete',
  wait: 'wait',
  sleep: 'wait',
  grid: 'grid',
  show_grid: 'grid',
  done: 'task_complete',
  finish: 'task_complete',
  task_complete: 'task_complete',
  subgoal_complete: 'subgoal_complete',
  subgoal_done: 'subgoal_complete',
  next_subgoal: 'subgoal_complete',
};

export function normalizeOperation(value: string): string {
  const key = value.trim().toLowerCase().replace(/[\s-]+/g, '_');
  return OPERATION_ALIASES[key] ?? key;
}

const numberLike = z.union([z.number(), z.string().trim().regex(/^-?\d+(\.\d+)?$/).transform(Number)]);

const rawDecisionSchema = z.object({
  action: z
    .string()
    .transform(normalizeOperation)
    .pipe(
      z.enum([
        'tap', 'long_press', 'swipe', 'type_text', 'back', 'enter', 'delete', 'wait',
        'task_complete', 'subgoal_complete', 'grid',
      ]),
    ),
  element: z.union([z.string(), z.number()]).optional(),
  cell: numberLike.optional(),
  subarea: z.string().optional(),
  x: numberLike.optional(),
  y: numberLike.optional(),
  text: z.string().optional(),
  direction: z.string().optional(),
  count: numberLike.optional(),
  seconds: numberLike.optional(),
  expected_text: z.union([z.string(), z.array(z.string())]).optional(),
  completes_subgoal: z.boolean().optional(),
  thought: z.string().optional(),
  summary: z.string().optional(),
});

type RawDecision = z.infer<typeof rawDecisionSchema>;

function normalizeDirection(value: string | undefined): SwipeDirection | undefined {
  const v = value?.trim().toLowerCase();
  return v === 'up' || v === 'down' || v === 'left' || v === 'right' ? v : undefined;
}

function gridTarget(cell: number, subarea: string | undefined): GridTarget | string {
  if (!Number.isInteger(cell) || cell < 1) return `Invalid grid cell: ${cell}`;
  if (subarea === undefined) return { type: 'grid', cell };
  const s = subarea.trim().toLowerCase().replace(/[\s_]+/g, '-');
  if (!isGridSubarea(s)) return `Invalid subarea: ${subarea}`;
  return { type: 'grid', cell, subarea: s };
}

function toDecision(raw: RawDecision, gridMode: boolean): ParseResult<ParsedDecision> {
  if (raw.action === 'grid') {
    return { ok: true, value: { kind: 'grid' } };
  }
  if (raw.action === 'task_complete') {
    return { ok: true, value: { kind: 'task_complete', summary: raw.summary ?? raw.thought } };
  }
  if (raw.action === 'subgoal_complete') {
    return { ok: true, value: { kind: 'subgoal_complete', reason: raw.summary ?? raw.thought } };
  }

  let target: TargetRef | undefined;
  let fallback: GridTarget | undefined;
  let cell = raw.cell;
  // In grid mode there are no element labels, so a bare number is a cell
  if (gridMode && cell === undefined && typeof raw.element === 'number') cell = raw.element;

  if (cell !== undefined) {
    const g = gridTarget(cell, raw.subarea);
    if (typeof g === 'string') return { ok: false, error: g };
    fallback = g;
  }
  if (raw.element !== undefined && !(gridMode && typeof raw.element === 'number')) {
    target = { type: 'element', ref: String(raw.element).trim() };
  } else if (fallback) {
    target = fallback;
    fallback = undefined;
  } else if (raw.x !== undefined && raw.y !== undefined) {
    target = { type: 'point', x: raw.x, y: raw.y };
  }

  const direction = normalizeDirection(raw.direction);
  if (raw.action === 'swipe' && !direction) {
    return { ok: false, error: `swipe needs direction up/down/left/right, got ${JSON.stringify(raw.direction)}` };
  }
  if (raw.action === 'type_text' && !raw.text) {
    return { ok: false, error: 'type_text needs a non-empty "text"' };
  }
  if (raw.action === 'delete' && raw.count !== undefined && (!Number.isInteger(raw.count) || raw.count < 1)) {
    return { ok: false, error: `delete needs a positive whole count, got ${raw.count}` };
  }
  if (raw.action === 'wait' && raw.seconds !== undefined && !(raw.seconds >= 0)) {
    return { ok: false, error: `wait needs a non-negative number of seconds, got ${raw.seconds}` };
  }

  const expected = typeof raw.expected_text === 'string' ? [raw.expected_text] : (raw.expected_text ?? []);
  const intent: ActionIntent = {
    operation: raw.action,
    target,
    fallback,
    text: raw.action === 'type_text' ? raw.text : undefined,
    direction,
    count: raw.action === 'delete' ? raw.count : undefined,
    seconds: raw.action === 'wait' ? raw.seconds : undefined,
    expectedText: expected.map((t) => t.trim()).filter(Boolean),
    completesSubgoal: raw.completes_subgoal,
    thought: raw.thought,
  };
  return { ok: true, value: { kind: 'action', intent } };
}

/** Split "3, \"up\", 'medium'" into bare values. */
function splitArgs(args: string): Array<string | number> {
  const out: Array<string | number> = [];
  const re = /"((?:[^"\\]|\\.)*)"|'((?:[^'\\]|\\.)*)'|([^,\s][^,]*)/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(args)) !== null) {
    const quoted = m[1] ?? m[2];
    if (quoted !== undefined) {
      out.push(quoted.replace(/\\(.)/g, '$1'));
      continue;
    }
    const bare = m[3].trim();
    out.push(/^-?\d+$/.test(bare) ? Number(bare) : bare);
  }
  return out;
}

function fromActionLine(text: string): Record<string, unknown> | null {
  const line = /^\s*\**Action\**\s*:\s*(.+?)\s*$/im.exec(text);
  if (!line) return null;
  const actionText = line[1].replace(/`/g, '').trim();
  const thought = /^\s*\**(?:Thought|Summary)\**\s*:\s*(.+)$/im.exec(text)?.[1]?.trim();

  const call = /^([A-Za-z_ -]+?)\s*\((.*)\)\s*\.?$/.exec(actionText);
  const name = call ? call[1] : actionText.split(/\s+/)[0];
  const args = call ? splitArgs(call[2]) : [];
  const action = normalizeOperation(name);
  const raw: Record<string, unknown> = { action, thought };

  switch (action) {
    case 'tap':
    case 'long_press':
      if (args[0] !== undefined) raw.element = args[0];
      if (typeof args[1] === 'string') raw.subarea = args[1];
      if (typeof args[0] === 'number' && typeof args[1] === 'number') {
        raw.x = args[0];
        raw.y = args[1];
        delete raw.element;
      }
      break;
    case 'type_text':
      raw.text = args.length > 0 ? String(args[args.length - 1]) : undefined;
      if (args.length > 1) raw.element = args[0];
      break;
    case 'swipe':
      if (args.length === 1) raw.direction = args[0];
      else {
        raw.element = args[0];
        raw.direction = args[1];
      }
      break;
    case 'delete':
      if (args[0] !== undefined) raw.count = args[0];
      break;
    case 'wait':
      if (args[0] !== undefined) raw.seconds = args[0];
      break;
  }
  return raw;
}

/**
 * Parse one decision. `gridMode` tells the parser the prompt offered grid
 * cells instead of element labels.
 */
export function parseDecision(text: string, opts: { gridMode?: boolean } = {}): ParseResult<ParsedDecision> {
  const gridMode = opts.gridMode ?? false;
  let candidate: unknown = extractJson(text);
  if (Array.isArray(candidate) && candidate.length === 1 && isObject(candidate[0])) {
    candidate = candidate[0];
  }
  // Bracketed numbers in prose ("labelled [2]") are not the decision
  if (!isObject(candidate)) {
    const fromLine = fromActionLine(text);
    if (fromLine) {
      candidate = fromLine;
    } else if (Array.isArray(candidate) && candidate.length > 1) {
      return { ok: false, error: `Expected exactly one action, got ${candidate.length}` };
    }
  }
  if (candidate === null || candidate === undefined) {
    return { ok: false, error: 'No JSON object or "Action:" line found' };
  }
  if (isObject(candidate) && !('action' in candidate) && 'operation' in candidate) {
    candidate = { ...candidate, action: candidate.operation };
  }

  const parsed = rawDecisionSchema.safeParse(candidate);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return { ok: false, error: `${issue.path.join('.') || 'response'}: ${issue.message}` };
  }
  return toDecision(parsed.data, gridMode);
}

// ===== Plans =====

const planItemSchema = z.union([
  z.string().trim().min(1).transform((description): PlannedSubGoal => ({ description, verifyText: [] })),
  z
    .object({
      goal: z.string().optional(),
      description: z.string().optional(),
      step: z.string().optional(),
      verify_text: z.union([z.string(), z.array(z.string())]).optional(),
    })
    .transform((o, ctx): PlannedSubGoal => {
      const description = (o.goal ?? o.description ?? o.step ?? '').trim();
      if (!description) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'sub-goal without text' });
        return z.NEVER;
      }
      const verify = typeof o.verify_text === 'string' ? [o.verify_text] : (o.verify_text ?? []);
      return { description, verifyText: verify.map((t) => t.trim()).filter(Boolean) };
    }),
]);

const planSchema = z.array(planItemSchema).min(1, 'plan is empty');

export function parsePlan(text: string): ParseResult<PlannedSubGoal[]> {
  let candidate = extractJson(text);
  if (candidate && typeof candidate === 'object' && !Array.isArray(candidate)) {
    const wrapped = Object.entries(candidate).find(([k]) => /^(sub_?goals|steps|plan)$/i.test(k));
    candidate = wrapped?.[1];
  }
  if (candidate === undefined) {
    const listed = text
      .split('\n')
      .map((l) => /^\s*(?:\d+[.)]|[-*])\s+(.+)$/.exec(l)?.[1]?.trim())
      .filter((l): l is string => Boolean(l));
    if (listed.length > 0) candidate = listed;
  }
  const parsed = planSchema.safeParse(candidate);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0]?.message ?? 'unparsable plan' };
  }
  return { ok: true, value: parsed.data };
}

// ===== Reflections =====

const reflectionSchema = z.object({
  decision: z
    .string()
    .transform((v) => v.trim().toUpperCase())
    .pipe(z.enum(['SUCCESS', 'CONTINUE', 'INEFFECTIVE', 'BACK'])),
  documentation: z.string().optional(),
  description: z.string().optional(),
  thought: z.string().optional(),
});

const NO_DOCUMENTATION = /^(?:n\/?a|none|null|-)?\.?$/i;

export function parseReflection(text: string): ParseResult<ParsedReflection> {
  let candidate = extractJson(text);
  if (candidate === undefined || Array.isArray(candidate)) {
    const decision = /^\s*\**Decision\**\s*:\s*\**\s*([A-Za-z]+)/im.exec(text)?.[1];
    const documentation = /^\s*\**Documentation\**\s*:\s*(.+)$/im.exec(text)?.[1];
    candidate = decision ? { decision, documentation } : undefined;
  }
  const parsed = reflectionSchema.safeParse(candidate);
  if (!parsed.success) {
    return { ok: false, error: 'No SUCCESS/CONTINUE/INEFFECTIVE/BACK decision found' };
  }
  const { decision, documentation, description, thought } = parsed.data;
  const doc = (documentation ?? description ?? thought ?? '').trim();
  // "N/A" 等占位符视为没有文档
  return {
    ok: true,
    value: { decision, documentation: NO_DOCUMENTATION.test(doc) ? '' : doc },
  };
}
