import { z } from 'zod';
import type { ResolvedAction, Verdict } from '../types/index.js';

// 单个元素的知识条目
export interface KnowledgeEntry {
  app: string;
  screenSignature: string;
  elementSignature: string;
  /** Human-readable handle of the element when it was last seen */
  elementLabel?: string;
  descriptions: string[];
  visits: number;
  lastAction?: ResolvedAction['kind'];
  lastVerdict?: Verdict;
  createdAt: number;
  updatedAt: number;
}

// 一次观察（来自反思阶段）
export interface KnowledgeObservation {
  screenSignature: string;
  elementSignature: string;
  elementLabel?: string;
  description: string;
  action?: ResolvedAction['kind'];
  verdict?: Verdict;
}

export interface AppKnowledge {
  app: string;
  version: 1;
  updatedAt: number;
  /** screen signature → element signature → entry */
  screens: Record<string, Record<string, KnowledgeEntry>>;
}

export interface AppSummary {
  app: string;
  screens: number;
  entries: number;
  updatedAt: number;
}

const verdictSchema = z.enum(['success', 'no-op', 'unexpected-change', 'error']);

const entrySchema = z.object({
  app: z.string(),
  screenSignature: z.string(),
  elementSignature: z.string(),
  elementLabel: z.string().optional(),
  descriptions: z.array(z.string()),
  visits: z.number().int().min(0),
  lastAction: z.enum(['tap', 'long_press', 'swipe', 'type_text', 'back', 'enter', 'delete', 'wait']).optional(),
  lastVerdict: verdictSchema.optional(),
  createdAt: z.number(),
  updatedAt: z.number(),
});

export const appKnowledgeSchema = z.object({
  app: z.string(),
  version: z.literal(1),
  updatedAt: z.number(),
  screens: z.record(z.record(entrySchema)),
});
