/**
 * @fileoverview Review engine public surface
 *
 * @module engine
 */

export {
  analyzeDocument,
  buildSummary,
  deepFreeze,
  type DeepReadonly,
  type FrozenAnalysisResult,
} from './analyze'
export { catalog, loadCatalog, type Catalog, type RawCatalog } from './catalog'
export { buildChecklist, describeFields } from './checklist'
export { classifyDocument, type ClassificationResult } from './classifier'
export { extractKeyPoints, type KeyPointDetector } from './key-points'
export { computeReadability } from './readability'
export { detectRedFlags } from './red-flags'
export { riskLevelFor, scoreRisk, type RiskScoreResult } from './risk-scorer'
export * from './types'
