import type {
  ActionIntent,
  GridTarget,
  GroundingSource,
  Point,
  ResolvedAction,
  ScreenState,
  SwipeDirection,
  TargetRef,
  UIElement,
} from '../types/index.js';
import { AgentError } from '../agent/errors.js';
import { ScreenGrid } from './ScreenGrid.js';

export interface GroundedAction {
  action: ResolvedAction;
  via: GroundingSource;
  /** Present when the target was a live element on the current screen */
  element?: UIElement;
}

export type GroundingResult =
  | { ok: true; grounded: GroundedAction }
  | { ok: false; error: AgentError };

export interface GrounderOptions {
  gridCellSize: number;
  longPressMs?: number;
  swipeMs?: number;
  /** Fraction of the screen a swipe without an element target travels */
  screenSwipeRatio?: number;
}

interface Anchor {
  point: Point;
  via: GroundingSource;
  element?: UIElement;
}

const DEFAULT_LONG_PRESS_MS = 1000;
const DEFAULT_SWIPE_MS = 400;
const DEFAULT_SCREEN_SWIPE_RATIO = 0.5;
export const MAX_WAIT_SEC = 10;
export const MAX_DELETE_COUNT = 50;

function fail(message: string): GroundingResult {
  return { ok: false, error: new AgentError('UnresolvableTarget', message) };
}

function clamp(v: number, min: number, max: number): number {
  return Math.min(Math.max(v, min), max);
}

/**
 * Turns an ActionIntent into device coordinates. Live element references win;
 * stale references and unstructured screens fall back to the grid.
 */
export class ElementGrounder {
  private longPressMs: number;
  private swipeMs: number;
  private screenSwipeRatio: number;

  constructor(private opts: GrounderOptions) {
    this.longPressMs = opts.longPressMs ?? DEFAULT_LONG_PRESS_MS;
    this.swipeMs = opts.swipeMs ?? DEFAULT_SWIPE_MS;
    this.screenSwipeRatio = opts.screenSwipeRatio ?? DEFAULT_SCREEN_SWIPE_RATIO;
  }

  ground(intent: ActionIntent, screen: ScreenState): GroundingResult {
    const grid = ScreenGrid.isValid(screen.width, screen.height, this.opts.gridCellSize)
      ? new ScreenGrid(screen.width, screen.height, this.opts.gridCellSize)
      : null;
    const malformed = (): GroundingResult =>
      fail(`Malformed grid for ${screen.width}x${screen.height} with cell size ${this.opts.gridCellSize}`);

    switch (intent.operation) {
      case 'back':
        return { ok: true, grounded: { action: { kind: 'back' }, via: 'none' } };

      case 'enter':
        return { ok: true, grounded: { action: { kind: 'enter' }, via: 'none' } };

      case 'delete': {
        const count = clamp(Math.round(intent.count ?? 1), 1, MAX_DELETE_COUNT);
        return { ok: true, grounded: { action: { kind: 'delete', count }, via: 'none' } };
      }

      case 'wait': {
        const seconds = clamp(intent.seconds ?? 1, 0, MAX_WAIT_SEC);
        return { ok: true, grounded: { action: { kind: 'wait', durationMs: Math.round(seconds * 1000) }, via: 'none' } };
      }

      case 'tap':
      case 'long_press': {
        if (!grid) return malformed();
        const anchor = this.anchor(intent.target, intent.fallback, screen, grid);
        if ('error' in anchor) return fail(anchor.error);
        const action: ResolvedAction = intent.operation === 'tap'
          ? { kind: 'tap', point: anchor.point }
          : { kind: 'long_press', point: anchor.point, durationMs: this.longPressMs };
        return { ok: true, grounded: { action, via: anchor.via, element: anchor.element } };
      }

      case 'swipe': {
        const direction = intent.direction ?? 'up';
        if (!grid) return malformed();
        if (!intent.target) {
          const from = { x: Math.floor(screen.width / 2), y: Math.floor(screen.height / 2) };
          return {
            ok: true,
            grounded: { action: this.screenSwipe(from, direction, screen), via: 'none' },
          };
        }
        const anchor = this.anchor(intent.target, intent.fallback, screen, grid);
        if ('error' in anchor) return fail(anchor.error);
        const action: ResolvedAction = anchor.element
          ? { kind: 'swipe', from: anchor.point, to: this.edgePoint(anchor.element, direction), durationMs: this.swipeMs }
          : this.screenSwipe(anchor.point, direction, screen);
        return { ok: true, grounded: { action, via: anchor.via, element: anchor.element } };
      }

      case 'type_text': {
        const text = intent.text ?? '';
        if (!grid) return malformed();
        if (!intent.target) {
          return { ok: true, grounded: { action: { kind: 'type_text', text }, via: 'none' } };
        }
        const anchor = this.anchor(intent.target, intent.fallback, screen, grid);
        if ('error' in anchor) return fail(anchor.error);
        return {
          ok: true,
          grounded: { action: { kind: 'type_text', text, focus: anchor.point }, via: anchor.via, element: anchor.element },
        };
      }
    }
  }

  private anchor(
    target: TargetRef | undefined,
    fallback: GridTarget | undefined,
    screen: ScreenState,
    grid: ScreenGrid,
  ): Anchor | { error: string } {
    const unstructured = screen.elements.length === 0;
    const centerCell = (): Anchor => ({ point: grid.resolve(grid.centerCell()) ?? { x: 0, y: 0 }, via: 'grid' });
    const fromGrid = (g: GridTarget | undefined): Anchor | null => {
      if (!g) return null;
      const point = grid.resolve(g.cell, g.subarea);
      return point ? { point, via: 'grid' } : null;
    };

    if (!target) {
      return unstructured ? centerCell() : { error: 'Action needs a target on a screen with elements' };
    }

    switch (target.type) {
      case 'element': {
        const element = this.findElement(target.ref, screen.elements);
        if (element) return { point: element.center, via: 'element', element };
        const viaGrid = fromGrid(fallback);
        if (viaGrid) return viaGrid;
        return unstructured ? centerCell() : { error: `Element "${target.ref}" is not on the current screen` };
      }
      case 'grid': {
        const viaGrid = fromGrid(target) ?? fromGrid(fallback);
        if (viaGrid) return viaGrid;
        return unstructured ? centerCell() : { error: `Grid cell ${target.cell} is outside 1..${grid.cellCount}` };
      }
      case 'point': {
        if (target.x >= 0 && target.y >= 0 && target.x < screen.width && target.y < screen.height) {
          return { point: { x: Math.round(target.x), y: Math.round(target.y) }, via: 'point' };
        }
        const viaGrid = fromGrid(fallback);
        if (viaGrid) return viaGrid;
        return unstructured ? centerCell() : { error: `Point (${target.x}, ${target.y}) is off screen` };
      }
    }
  }

  /** Signature first; a bare number is the element's index in this capture. */
  private findElement(ref: string, elements: readonly UIElement[]): UIElement | undefined {
    const bySignature = elements.find((e) => e.signature === ref);
    if (bySignature) return bySignature;
    if (/^\d+$/.test(ref)) {
      const index = Number(ref);
      return elements.find((e) => e.index === index);
    }
    return undefined;
  }

  private edgePoint(el: UIElement, direction: SwipeDirection): Point {
    const { bounds, center } = el;
    switch (direction) {
      case 'up':
        return { x: center.x, y: bounds.y1 };
      case 'down':
        return { x: center.x, y: bounds.y2 - 1 };
      case 'left':
        return { x: bounds.x1, y: center.y };
      case 'right':
        return { x: bounds.x2 - 1, y: center.y };
    }
  }

  private screenSwipe(from: Point, direction: SwipeDirection, screen: ScreenState): ResolvedAction {
    const dx = Math.round(screen.width * this.screenSwipeRatio);
    const dy = Math.round(screen.height * this.screenSwipeRatio);
    const to = { ...from };
    if (direction === 'up') to.y = from.y - dy;
    if (direction === 'down') to.y = from.y + dy;
    if (direction === 'left') to.x = from.x - dx;
    if (direction === 'right') to.x = from.x + dx;
    return {
      kind: 'swipe',
      from,
      to: { x: clamp(to.x, 0, screen.width - 1), y: clamp(to.y, 0, screen.height - 1) },
      durationMs: this.swipeMs,
    };
  }
}
