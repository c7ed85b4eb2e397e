/**
 * @fileoverview Report layout shared by the PDF renderers
 *
 * Turns an analysis into titled sections of plain lines. The full report
 * quotes evidence and lists every finding; the summary keeps the first few
 * of each and drops the quotes.
 *
 * @module lib/review/export/report-sections
 */

import type { FrozenAnalysisResult, RiskLevel, Severity } from "@/engine"

export const REPORT_VARIANTS = ["full", "summary"] as const
export type ReportVariant = (typeof REPORT_VARIANTS)[number]

export interface ReportSection {
  heading: string
  lines: string[]
}

const SUMMARY_LIMITS = { keyPoints: 5, redFlags: 4, checklist: 3 } as const
const QUOTE_CHARS = 200

export const NO_KEY_POINTS = "No key points were found."
export const NO_RED_FLAGS = "No major red flags detected."
export const DISCLAIMER =
  "This report is for informational purposes only and does not constitute legal advice."

export const RISK_LABELS: Record<RiskLevel, string> = {
  low: "Low",
  medium: "Medium",
  high: "High",
}

export const SEVERITY_LABELS: Record<Severity, string> = {
  low: "Low",
  medium: "Medium",
  high: "High",
}

export function riskHeadline(result: FrozenAnalysisResult): string {
  return `${RISK_LABELS[result.riskLevel]} Risk: ${result.riskScore}/100`
}

function quote(text: string): string {
  const clipped = text.length > QUOTE_CHARS ? `${text.slice(0, QUOTE_CHARS)}...` : text
  return `"${clipped}"`
}

function keyPointLines(result: FrozenAnalysisResult, summary: boolean): string[] {
  const keyPoints = summary
    ? result.keyPoints.slice(0, SUMMARY_LIMITS.keyPoints)
    : result.keyPoints
  if (keyPoints.length === 0) return [NO_KEY_POINTS]

  return keyPoints.flatMap((kp) => {
    const line = `${kp.title}${kp.watchOut ? " (watch out)" : ""}: ${kp.detail}`
    return summary || kp.evidence.length === 0 ? [line] : [line, quote(kp.evidence[0].text)]
  })
}

function redFlagLines(result: FrozenAnalysisResult, summary: boolean): string[] {
  const flags = summary ? result.redFlags.slice(0, SUMMARY_LIMITS.redFlags) : result.redFlags
  if (flags.length === 0) return [NO_RED_FLAGS]

  return flags.flatMap((flag) => {
    const line = `${SEVERITY_LABELS[flag.severity]}: ${flag.description}`
    return summary ? [line] : [line, quote(flag.evidence.text)]
  })
}

function readabilityLines(result: FrozenAnalysisResult, summary: boolean): string[] {
  const rd = result.readability
  if (rd === null) return []
  if (summary) {
    return [
      `${rd.gradeLabel}, Flesch ease ${rd.fleschEase}/100, grade ${rd.fleschGrade}, average sentence ${rd.avgSentenceLength} words`,
    ]
  }
  return [
    `${rd.gradeLabel}: ${rd.easeLabel}`,
    `Flesch reading ease: ${rd.fleschEase}/100`,
    `Flesch-Kincaid grade: ${rd.fleschGrade}`,
    `Gunning fog index: ${rd.gunningFog}`,
    `Average sentence length: ${rd.avgSentenceLength} words`,
    `Complex words: ${rd.complexWordPct}%`,
  ]
}

/**
 * Sections in report order: overview, key points, red flags, checklist and,
 * when the text was long enough to score, readability.
 */
export function buildReportSections(
  result: FrozenAnalysisResult,
  variant: ReportVariant = "full"
): ReportSection[] {
  const summary = variant === "summary"
  const checklist = summary
    ? result.checklist.slice(0, SUMMARY_LIMITS.checklist)
    : result.checklist

  const overview = [
    `Document type: ${result.documentType}`,
    result.summary,
    riskHeadline(result),
    result.riskReason,
  ]
  if (!summary) {
    overview.push(`Words: ${result.wordCount}. Characters: ${result.charCount}.`)
  }

  const sections: ReportSection[] = [
    { heading: "Overview", lines: overview },
    { heading: "Key Points to Know", lines: keyPointLines(result, summary) },
    { heading: "Red Flags", lines: redFlagLines(result, summary) },
    {
      heading: "Before You Sign",
      lines: checklist.map((item, index) => `${index + 1}. ${item}`),
    },
  ]

  const readability = readabilityLines(result, summary)
  if (readability.length > 0) {
    sections.push({ heading: "Readability", lines: readability })
  }
  return sections
}
