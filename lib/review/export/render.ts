/**
 * @fileoverview Review output rendering
 *
 * JSON covers every review mode. CSV and the two PDF layouts describe a
 * single analyzed document.
 *
 * @module lib/review/export/render
 */

import { z } from "zod"
import { ValidationError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import type { ReviewOutput } from "../review-paths"
import { exportCsv } from "./csv"
import { renderAnalysisPdf } from "./pdf"

export const REPORT_FORMATS = ["json", "csv", "pdf", "summary-pdf"] as const
export type ReportFormat = (typeof REPORT_FORMATS)[number]
export const reportFormatSchema = z.enum(REPORT_FORMATS)

/** Formats that produce bytes rather than text */
export const BINARY_FORMATS: readonly ReportFormat[] = ["pdf", "summary-pdf"]

export async function renderReviewOutput(
  output: ReviewOutput,
  format: ReportFormat
): Promise<string | Buffer> {
  if (format === "json") return `${JSON.stringify(output, null, 2)}\n`

  if (output.mode !== "analysis") {
    const message = `The ${format} format covers a single document; got a ${output.mode}`
    throw new ValidationError(message, [{ field: "format", message }])
  }

  const { name, result } = output.document
  const report =
    format === "csv"
      ? exportCsv(result)
      : await renderAnalysisPdf(name, result, format === "pdf" ? "full" : "summary")

  logger.info("Report rendered", { name, format, bytes: report.length })
  return report
}
