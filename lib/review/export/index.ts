/**
 * @fileoverview Report exports for review output
 * @module lib/review/export
 */

export {
  BINARY_FORMATS,
  renderReviewOutput,
  REPORT_FORMATS,
  reportFormatSchema,
  type ReportFormat,
} from "./render"
export { analysisCsvRecords, exportCsv, type CsvRecord } from "./csv"
export { renderAnalysisPdf } from "./pdf"
export { buildReportSections, type ReportSection, type ReportVariant } from "./report-sections"
