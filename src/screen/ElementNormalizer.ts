import type { Bounds, Point, UIElement } from '../types/index.js';
import type { RawElement } from './UiHierarchyParser.js';
import { assignSignatures, manhattan } from './ScreenSignature.js';

function centerOf(b: Bounds): Point {
  return { x: Math.round((b.x1 + b.x2) / 2), y: Math.round((b.y1 + b.y2) / 2) };
}

interface Draft {
  bounds: Bounds;
  center: Point;
  className: string;
  text?: string;
  resourceId?: string;
  contentDesc?: string;
  clickable: boolean;
  longClickable: boolean;
  scrollable: boolean;
  editable: boolean;
  checked: boolean;
  enabled: boolean;
}

function toDraft(raw: RawElement): Draft {
  return {
    bounds: raw.bounds,
    center: centerOf(raw.bounds),
    className: raw.className,
    text: raw.text || undefined,
    resourceId: raw.resourceId || undefined,
    contentDesc: raw.contentDesc || undefined,
    clickable: raw.clickable || raw.focusable,
    longClickable: raw.longClickable,
    scrollable: raw.scrollable,
    editable: raw.editable,
    checked: raw.checked,
    enabled: raw.enabled,
  };
}

/** Fold `other` into `kept`: fill what kept lacks, union the capabilities. */
function absorb(kept: Draft, other: Draft): void {
  kept.text ??= other.text;
  kept.resourceId ??= other.resourceId;
  kept.contentDesc ??= other.contentDesc;
  kept.clickable ||= other.clickable;
  kept.longClickable ||= other.longClickable;
  kept.scrollable ||= other.scrollable;
  kept.editable ||= other.editable;
  kept.checked ||= other.checked;
}

/**
 * Merge near-duplicate nodes (a clickable container and its focusable child
 * usually share a center) and give the survivors reading-order indices and
 * signatures. Nodes whose centers are closer than `minDist` (Manhattan) to an
 * already kept node are absorbed into it.
 */
export function normalizeElements(raw: readonly RawElement[], minDist: number): UIElement[] {
  const kept: Draft[] = [];
  for (const node of raw) {
    const draft = toDraft(node);
    const near = kept.find((k) => manhattan(k.center, draft.center) < minDist);
    if (near) {
      absorb(near, draft);
    } else {
      kept.push(draft);
    }
  }

  kept.sort((a, b) => a.center.y - b.center.y || a.center.x - b.center.x);

  return assignSignatures(kept).map((el, i) => ({ ...el, index: i + 1 }));
}
