/**
 * Element-level diff between two captures. Used to describe an effect when
 * the model gives no documentation, and to tell a new screen from a tweak.
 */

import type { ScreenState, UIElement } from '../types/index.js';
import { sameElement } from '../screen/ScreenSignature.js';
import { elementLabel } from '../memory/KnowledgeInjector.js';

export interface ScreenDiff {
  isNewScreen: boolean;
  packageChanged: boolean;
  added: UIElement[];
  removed: UIElement[];
  changed: UIElement[];
  unchangedCount: number;
}

const NEW_SCREEN_THRESHOLD = 0.5; // >50% of elements changed → different screen

function hasChanged(prev: UIElement, curr: UIElement): boolean {
  return prev.text !== curr.text || prev.checked !== curr.checked || prev.enabled !== curr.enabled;
}

export function diffScreens(before: ScreenState, after: ScreenState, tolerance: number): ScreenDiff {
  const packageChanged = before.foregroundPackage !== after.foregroundPackage;
  const added: UIElement[] = [];
  const changed: UIElement[] = [];
  const matched = new Set<UIElement>();
  let unchangedCount = 0;

  for (const el of after.elements) {
    const prev = before.elements.find((p) => !matched.has(p) && sameElement(p, el, tolerance));
    if (!prev) {
      added.push(el);
      continue;
    }
    matched.add(prev);
    if (hasChanged(prev, el)) changed.push(el);
    else unchangedCount++;
  }
  const removed = before.elements.filter((p) => !matched.has(p));

  const total = Math.max(before.elements.length, 1);
  const isNewScreen =
    packageChanged ||
    (before.signature !== after.signature &&
      (added.length + removed.length + changed.length) / total > NEW_SCREEN_THRESHOLD);

  return { isNewScreen, packageChanged, added, removed, changed, unchangedCount };
}

export function summarizeDiff(diff: ScreenDiff): string {
  if (diff.packageChanged) return 'Switched to a different app or activity.';
  const parts: string[] = [];
  if (diff.isNewScreen) parts.push('Opened a different screen');
  if (diff.added.length > 0) {
    const names = diff.added.slice(0, 3).map((e) => `"${elementLabel(e)}"`).join(', ');
    parts.push(`${diff.added.length} element(s) appeared (${names})`);
  }
  if (diff.removed.length > 0) parts.push(`${diff.removed.length} element(s) disappeared`);
  if (diff.changed.length > 0) parts.push(`${diff.changed.length} element(s) changed state`);
  return parts.length > 0 ? `${parts.join('; ')}.` : 'No visible change.';
}
