#!/usr/bin/env npx tsx
/**
 * Document Review CLI
 *
 * Analyzes one document, compares two, or ranks three to eight. Reports
 * are JSON by default; a single document can also be exported as CSV or as
 * a full or summary PDF. Accepts .txt, .md, .pdf and .docx files, plus
 * .json files holding a previously saved analysis.
 *
 * Usage: npx tsx scripts/review-documents.ts [--format json|csv|pdf|summary-pdf] [--out file] <path> [path...]
 */

import { writeFile } from "node:fs/promises"
import { config } from "dotenv"
config()

import { catalog } from "../engine"
import { flushInstrumentation, initInstrumentation } from "../instrument"
import { engineSettings, loadConfig } from "../lib/config"
import { toAppError } from "../lib/errors"
import { logger } from "../lib/logger"
import { parseReviewArgs, renderReviewOutput, reviewPaths } from "../lib/review"

async function main() {
  const appConfig = loadConfig()
  initInstrumentation(appConfig)

  const { paths, format, out } = parseReviewArgs(process.argv.slice(2))
  logger.info("Review started", {
    catalogVersion: catalog.version,
    documentCount: paths.length,
    format,
  })

  try {
    const output = await reviewPaths(paths, engineSettings(appConfig))
    const report = await renderReviewOutput(output, format)

    if (out) {
      await writeFile(out, report)
      logger.info("Report written", { path: out, format })
    } else {
      process.stdout.write(report)
    }
  } finally {
    await flushInstrumentation()
  }
}

main().catch((e) => {
  console.error(JSON.stringify(toAppError(e).toJSON(), null, 2))
  process.exit(1)
})
