import { createHash } from 'node:crypto';
import type { Point, UIElement } from '../types/index.js';

export interface IdentityFields {
  className: string;
  resourceId?: string;
  contentDesc?: string;
  text?: string;
}

const MAX_KEY_TEXT = 40;

function sha1(input: string | Buffer): string {
  return createHash('sha1').update(input).digest('hex');
}

export function hashBytes(data: Buffer): string {
  return sha1(data);
}

export function manhattan(a: Point, b: Point): number {
  return Math.abs(a.x - b.x) + Math.abs(a.y - b.y);
}

/**
 * Identity key of an element. Text only participates when the element has
 * neither a resource id nor a content description, so a labelled view whose
 * text changes (a counter, a clock) keeps its identity.
 */
export function elementKey(el: IdentityFields): string {
  const resourceId = el.resourceId ?? '';
  const contentDesc = (el.contentDesc ?? '').slice(0, MAX_KEY_TEXT);
  const text = resourceId || contentDesc ? '' : (el.text ?? '').slice(0, MAX_KEY_TEXT);
  return [el.className, resourceId, contentDesc, text].join('|');
}

/**
 * Signatures for elements already in reading order. Elements sharing a key
 * (rows of a list) are told apart by their ordinal among that key.
 * Positions are not hashed.
 */
export function assignSignatures<T extends IdentityFields>(elements: T[]): Array<T & { key: string; signature: string }> {
  const seen = new Map<string, number>();
  return elements.map((el) => {
    const key = elementKey(el);
    const ordinal = seen.get(key) ?? 0;
    seen.set(key, ordinal + 1);
    return { ...el, key, signature: sha1(`${key}#${ordinal}`).slice(0, 12) };
  });
}

/**
 * Screen signature: package plus the sorted set of element keys. Unstructured
 * screens (no elements) are keyed by their image instead.
 */
export function computeScreenSignature(
  foregroundPackage: string | null,
  elements: readonly Pick<UIElement, 'key'>[],
  imageHash: string,
): string {
  if (elements.length === 0) {
    return sha1(`${foregroundPackage ?? ''}\nimg:${imageHash}`).slice(0, 16);
  }
  const keys = [...new Set(elements.map((e) => e.key))].sort();
  return sha1(`${foregroundPackage ?? ''}\n${keys.join('\n')}`).slice(0, 16);
}

export function computeFingerprint(
  elements: readonly Pick<UIElement, 'signature' | 'text' | 'center' | 'checked'>[],
  imageHash: string,
): string {
  if (elements.length === 0) return sha1(`img:${imageHash}`);
  const parts = elements.map(
    (e) => `${e.signature}|${e.text ?? ''}|${e.center.x},${e.center.y}|${e.checked ? 1 : 0}`,
  );
  return sha1(parts.join(';'));
}

/** Same element across two captures: matching signature, centers within tolerance. */
export function sameElement(
  a: Pick<UIElement, 'signature' | 'center'>,
  b: Pick<UIElement, 'signature' | 'center'>,
  tolerance: number,
): boolean {
  return a.signature === b.signature && manhattan(a.center, b.center) < tolerance;
}
