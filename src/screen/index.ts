export { parseUiHierarchy, parseBounds } from './UiHierarchyParser.js';
export type { RawElement } from './UiHierarchyParser.js';
export { normalizeElements } from './ElementNormalizer.js';
export {
  elementKey,
  assignSignatures,
  computeScreenSignature,
  computeFingerprint,
  sameElement,
  manhattan,
  hashBytes,
} from './ScreenSignature.js';
export { ScreenGrid, GRID_SUBAREAS, isGridSubarea } from './ScreenGrid.js';
export { ElementGrounder } from './ElementGrounder.js';
export type { GroundedAction, GroundingResult, GrounderOptions } from './ElementGrounder.js';
export { ScreenObserver } from './ScreenObserver.js';
export type { ScreenObserverOptions } from './ScreenObserver.js';
