/**
 * @fileoverview CSV export of a single analysis
 *
 * One sheet with blank-row separated blocks: summary fields, readability,
 * key points, red flags and the checklist. Blocks after the summary carry
 * their own title row and column header.
 *
 * @module lib/review/export/csv
 */

import { createArrayCsvStringifier } from "csv-writer"
import type { FrozenAnalysisResult } from "@/engine"
import { RISK_LABELS, SEVERITY_LABELS } from "./report-sections"

export type CsvRecord = Array<string | number>

const CSV_HEADER = ["SECTION", "FIELD", "VALUE"]

export function analysisCsvRecords(result: FrozenAnalysisResult): CsvRecord[] {
  const records: CsvRecord[] = [
    ["Summary", "Document Type", result.documentType],
    ["Summary", "Risk Level", RISK_LABELS[result.riskLevel]],
    ["Summary", "Risk Score", result.riskScore],
    ["Summary", "Risk Reason", result.riskReason],
    ["Summary", "Word Count", result.wordCount],
    ["Summary", "Char Count", result.charCount],
    ["Summary", "Summary", result.summary],
    [],
  ]

  const rd = result.readability
  if (rd !== null) {
    records.push(
      ["Readability", "Grade Label", rd.gradeLabel],
      ["Readability", "Flesch Ease", rd.fleschEase],
      ["Readability", "Flesch Grade", rd.fleschGrade],
      ["Readability", "Gunning Fog", rd.gunningFog],
      ["Readability", "Avg Sentence Len", rd.avgSentenceLength],
      ["Readability", "Avg Word Len", rd.avgWordLength],
      ["Readability", "Complex Word %", rd.complexWordPct],
      []
    )
  }

  records.push(["KEY POINTS"], ["Category", "Title", "Detail", "Watch Out", "Evidence"])
  for (const kp of result.keyPoints) {
    records.push([
      kp.category,
      kp.title,
      kp.detail,
      kp.watchOut ? "Yes" : "No",
      kp.evidence.map((e) => e.text).join(" | "),
    ])
  }
  records.push([])

  records.push(["RED FLAGS"], ["Severity", "Description", "Evidence"])
  for (const flag of result.redFlags) {
    records.push([SEVERITY_LABELS[flag.severity], flag.description, flag.evidence.text])
  }
  records.push([])

  records.push(["BEFORE SIGNING CHECKLIST"], ["#", "Action"])
  result.checklist.forEach((item, index) => records.push([index + 1, item]))

  return records
}

export function exportCsv(result: FrozenAnalysisResult): string {
  const stringifier = createArrayCsvStringifier({ header: CSV_HEADER })
  return (
    (stringifier.getHeaderString() ?? "") +
    stringifier.stringifyRecords(analysisCsvRecords(result))
  )
}
