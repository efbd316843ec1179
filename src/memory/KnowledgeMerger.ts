import type { KnowledgeEntry, KnowledgeObservation } from './types.js';

const NEAR_DUPLICATE_JACCARD = 0.8;

export interface MergeOptions {
  /** Also treat descriptions with mostly the same words as duplicates */
  refinement: boolean;
  now?: number;
}

/** Lowercase, collapse whitespace, drop trailing punctuation. */
export function normalizeDescription(text: string): string {
  return text
    .toLowerCase()
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[\s.,;:!?。，；：！？]+$/u, '');
}

function tokens(normalized: string): Set<string> {
  return new Set(normalized.split(/[^\p{L}\p{N}]+/u).filter(Boolean));
}

export function jaccard(a: Set<string>, b: Set<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  let shared = 0;
  for (const t of a) {
    if (b.has(t)) shared++;
  }
  return shared / (a.size + b.size - shared);
}

export function isDuplicateDescription(a: string, b: string, refinement: boolean): boolean {
  const na = normalizeDescription(a);
  const nb = normalizeDescription(b);
  if (na === nb) return true;
  if (!refinement) return false;
  return jaccard(tokens(na), tokens(nb)) >= NEAR_DUPLICATE_JACCARD;
}

/**
 * Fold one observation into an entry. The visit counter always moves;
 * descriptions only grow, and only with text not already recorded.
 * Returns a new entry; `existing` is left untouched.
 */
export function mergeObservation(
  app: string,
  existing: KnowledgeEntry | undefined,
  obs: KnowledgeObservation,
  opts: MergeOptions,
): KnowledgeEntry {
  const now = opts.now ?? Date.now();
  const description = obs.description.trim();

  if (!existing) {
    return {
      app,
      screenSignature: obs.screenSignature,
      elementSignature: obs.elementSignature,
      elementLabel: obs.elementLabel,
      descriptions: description ? [description] : [],
      visits: 1,
      lastAction: obs.action,
      lastVerdict: obs.verdict,
      createdAt: now,
      updatedAt: now,
    };
  }

  const duplicate = !description || existing.descriptions.some((d) => isDuplicateDescription(d, description, opts.refinement));

  return {
    ...existing,
    elementLabel: obs.elementLabel ?? existing.elementLabel,
    descriptions: duplicate ? [...existing.descriptions] : [...existing.descriptions, description],
    visits: existing.visits + 1,
    lastAction: obs.action ?? existing.lastAction,
    lastVerdict: obs.verdict ?? existing.lastVerdict,
    updatedAt: now,
  };
}
