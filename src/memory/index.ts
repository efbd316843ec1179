export { KnowledgeStore, KnowledgeBase, isSafeAppId } from './KnowledgeStore.js';
export type { KnowledgeStoreOptions } from './KnowledgeStore.js';
export { mergeObservation, normalizeDescription, isDuplicateDescription } from './KnowledgeMerger.js';
export { buildKnowledgeContext, elementLabel } from './KnowledgeInjector.js';
export { SessionLog } from './SessionLog.js';
export type { ActionRecord, SessionLogFile } from './SessionLog.js';
export type { KnowledgeEntry, KnowledgeObservation, AppKnowledge, AppSummary } from './types.js';
