import type { Point } from './screen.js';

// 操作类型
export type ActionOperation = 'tap' | 'long_press' | 'swipe' | 'type_text' | 'back' | 'enter' | 'delete' | 'wait';

export type SwipeDirection = 'up' | 'down' | 'left' | 'right';

export type GridSubarea =
  | 'center'
  | 'top-left'
  | 'top'
  | 'top-right'
  | 'left'
  | 'right'
  | 'bottom-left'
  | 'bottom'
  | 'bottom-right';

export interface GridTarget {
  type: 'grid';
  cell: number;
  subarea?: GridSubarea;
}

// 目标引用：元素标识 / 坐标 / 网格
export type TargetRef =
  | { type: 'element'; ref: string }
  | { type: 'point'; x: number; y: number }
  | GridTarget;

export interface ActionIntent {
  operation: ActionOperation;
  target?: TargetRef;
  /** Grid cell to use when the element reference turns out stale */
  fallback?: GridTarget;
  text?: string;
  direction?: SwipeDirection;
  /** Characters to delete */
  count?: number;
  /** Seconds to wait */
  seconds?: number;
  /** Texts the model expects to see after the action */
  expectedText?: string[];
  /** The model believes this action finishes the active sub-goal */
  completesSubgoal?: boolean;
  thought?: string;
}

export type Decision =
  | { kind: 'action'; intent: ActionIntent }
  | { kind: 'subgoal_complete'; reason?: string }
  | { kind: 'task_complete'; summary?: string };

// 已落地的具体设备操作，不含任何符号引用
export type ResolvedAction =
  | { kind: 'tap'; point: Point }
  | { kind: 'long_press'; point: Point; durationMs: number }
  | { kind: 'swipe'; from: Point; to: Point; durationMs: number }
  | { kind: 'type_text'; text: string; focus?: Point }
  | { kind: 'back' }
  | { kind: 'enter' }
  | { kind: 'delete'; count: number }
  | { kind: 'wait'; durationMs: number };

export type GroundingSource = 'element' | 'grid' | 'point' | 'none';

export type Verdict = 'success' | 'no-op' | 'unexpected-change' | 'error';
