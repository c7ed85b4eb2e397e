/**
 * @fileoverview Command-line arguments for the review script
 *
 *   review-documents [--format json|csv|pdf|summary-pdf] [--out file] <path...>
 *
 * @module lib/review/review-args
 */

import { ValidationError } from "@/lib/errors"
import { BINARY_FORMATS, REPORT_FORMATS, reportFormatSchema, type ReportFormat } from "./export"

export interface ReviewArgs {
  paths: string[]
  format: ReportFormat
  /** Write the report here instead of stdout */
  out?: string
}

function invalid(field: string, message: string): ValidationError {
  return new ValidationError(message, [{ field, message }])
}

export function parseReviewArgs(argv: readonly string[]): ReviewArgs {
  const paths: string[] = []
  let format: ReportFormat = "json"
  let out: string | undefined

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    const [flag, inline] = arg.startsWith("--") ? arg.split(/=(.*)/s, 2) : [arg, undefined]

    if (flag === "--format" || flag === "-f") {
      const value = inline ?? argv[++i]
      const parsed = reportFormatSchema.safeParse(value)
      if (!parsed.success) {
        throw invalid(
          "format",
          `Unknown format: ${value ?? "(missing)"}. Use one of ${REPORT_FORMATS.join(", ")}`
        )
      }
      format = parsed.data
    } else if (flag === "--out" || flag === "-o") {
      out = inline ?? argv[++i]
      if (!out) throw invalid("out", "--out needs a file path")
    } else if (flag.startsWith("-") && flag !== "-") {
      throw invalid("args", `Unknown option: ${flag}`)
    } else {
      paths.push(arg)
    }
  }

  if (BINARY_FORMATS.includes(format) && out === undefined) {
    throw invalid("out", `The ${format} format writes a file; pass --out <file>`)
  }
  return { paths, format, out }
}
