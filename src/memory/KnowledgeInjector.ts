import type { UIElement } from '../types/index.js';
import type { KnowledgeEntry } from './types.js';

const DEFAULT_MAX_CHARS = 1500;
const MAX_DESCRIPTIONS_PER_LINE = 3;

export function elementLabel(el: Pick<UIElement, 'text' | 'contentDesc' | 'resourceId' | 'className'>): string {
  const shortId = el.resourceId?.split('/').pop();
  return el.text || el.contentDesc || shortId || el.className.split('.').pop() || 'element';
}

/**
 * Build the knowledge fragment for the decision prompt: what earlier runs
 * learned about the elements visible right now. Most visited first,
 * hard-limited to maxChars. Empty string when nothing applies.
 */
export function buildKnowledgeContext(
  entries: readonly KnowledgeEntry[],
  elements: readonly UIElement[],
  maxChars = DEFAULT_MAX_CHARS,
): string {
  const bySignature = new Map(elements.map((e) => [e.signature, e]));
  const relevant = entries
    .filter((e) => bySignature.has(e.elementSignature) && e.descriptions.length > 0)
    .sort((a, b) => b.visits - a.visits || b.updatedAt - a.updatedAt);
  if (relevant.length === 0) return '';

  const header = '## Known element behavior on this screen';
  const footer = 'Notes come from earlier runs; trust the screenshot if they disagree.';
  const lines = [header];
  let length = header.length + footer.length + 2;

  for (const entry of relevant) {
    const el = bySignature.get(entry.elementSignature);
    if (!el) continue;
    const notes = entry.descriptions.slice(-MAX_DESCRIPTIONS_PER_LINE).join(' / ');
    const line = `- [${el.index}] ${elementLabel(el)}: ${notes} (seen ${entry.visits}x)`;
    if (length + line.length + 1 > maxChars) break;
    lines.push(line);
    length += line.length + 1;
  }

  if (lines.length === 1) return '';
  lines.push(footer);
  return lines.join('\n');
}
