import { XMLParser } from 'fast-xml-parser';
import type { Bounds } from '../types/index.js';

export interface RawElement {
  bounds: Bounds;
  className: string;
  packageName: string;
  text: string;
  resourceId: string;
  contentDesc: string;
  clickable: boolean;
  focusable: boolean;
  longClickable: boolean;
  scrollable: boolean;
  editable: boolean;
  checked: boolean;
  enabled: boolean;
}

const BOUNDS_RE = /^\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]$/;

/** "[x1,y1][x2,y2]" → Bounds; null for anything else or an empty box */
export function parseBounds(value: string): Bounds | null {
  const m = BOUNDS_RE.exec(value.trim());
  if (!m) return null;
  const [x1, y1, x2, y2] = [m[1], m[2], m[3], m[4]].map(Number);
  if (x2 <= x1 || y2 <= y1) return null;
  return { x1, y1, x2, y2 };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function attr(node: Record<string, unknown>, name: string): string {
  const v = node[`@_${name}`];
  if (typeof v === 'string') return v;
  if (typeof v === 'number' || typeof v === 'boolean') return String(v);
  return '';
}

function flag(node: Record<string, unknown>, name: string): boolean {
  return attr(node, name) === 'true';
}

function isEditableClass(className: string): boolean {
  return className.includes('EditText') || className.includes('AutoCompleteTextView');
}

/**
 * Parse a uiautomator dump and return the interactive nodes in document order.
 * Malformed or empty XML yields an empty list; callers fall back to the grid.
 */
export function parseUiHierarchy(xml: string): RawElement[] {
  if (!xml.trim()) return [];

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    allowBooleanAttributes: true,
    parseAttributeValue: false,
    isArray: (name) => name === 'node',
  });

  let parsed: unknown;
  try {
    parsed = parser.parse(xml, true);
  } catch {
    console.log('[Screen] UI hierarchy dump is not valid XML, treating screen as unstructured');
    return [];
  }

  const elements: RawElement[] = [];

  const walk = (value: unknown): void => {
    if (Array.isArray(value)) {
      for (const item of value) walk(item);
      return;
    }
    if (!isRecord(value)) return;

    const boundsAttr = attr(value, 'bounds');
    if (boundsAttr) {
      const bounds = parseBounds(boundsAttr);
      const className = attr(value, 'class');
      const el: RawElement | null = bounds
        ? {
            bounds,
            className,
            packageName: attr(value, 'package'),
            text: attr(value, 'text').trim(),
            resourceId: attr(value, 'resource-id').trim(),
            contentDesc: attr(value, 'content-desc').trim(),
            clickable: flag(value, 'clickable'),
            focusable: flag(value, 'focusable'),
            longClickable: flag(value, 'long-clickable'),
            scrollable: flag(value, 'scrollable'),
            editable: isEditableClass(className) || flag(value, 'editable'),
            checked: flag(value, 'checked'),
            enabled: attr(value, 'enabled') !== 'false',
          }
        : null;
      if (el && (el.clickable || el.focusable || el.longClickable || el.scrollable || el.editable)) {
        elements.push(el);
      }
    }

    for (const [key, child] of Object.entries(value)) {
      if (key.startsWith('@_')) continue;
      walk(child);
    }
  };

  walk(parsed);
  return elements;
}
