/**
 * @fileoverview Review flows over the analysis engine
 * @module lib/review
 */

export {
  analyzeSource,
  loadSavedAnalysis,
  sourceFromPath,
  type AnalyzedDocument,
  type DocumentSource,
} from "./analyze-upload"

export {
  alignKeyPoints,
  compareDocuments,
  diffAnalyses,
  MATCH_TYPES,
  type CategoryAlignment,
  type ComparisonResult,
  type KeyDifference,
  type MatchType,
} from "./compare"

export {
  buildMatrix,
  compositeScore,
  MAX_RANKED_DOCUMENTS,
  MIN_RANKED_DOCUMENTS,
  rankAnalyses,
  rankDocuments,
  type MatrixCell,
  type MatrixRow,
  type MatrixState,
  type RankedDocument,
  type RankingResult,
} from "./rank"

export {
  BINARY_FORMATS,
  buildReportSections,
  exportCsv,
  renderAnalysisPdf,
  renderReviewOutput,
  REPORT_FORMATS,
  type ReportFormat,
  type ReportVariant,
} from "./export"

export { parseReviewArgs, type ReviewArgs } from "./review-args"

export { reviewPaths, type ReviewOutput } from "./review-paths"
