/**
 * @fileoverview PDF report of a single analysis
 *
 * Rendered in memory with pdfkit's built-in Helvetica faces. The full
 * variant quotes evidence; the summary fits the essentials on one page.
 *
 * @module lib/review/export/pdf
 */

import PDFDocument from "pdfkit"
import type { FrozenAnalysisResult, RiskLevel } from "@/engine"
import {
  buildReportSections,
  DISCLAIMER,
  riskHeadline,
  type ReportVariant,
} from "./report-sections"

const RISK_COLORS: Record<RiskLevel, string> = {
  low: "#4caf84",
  medium: "#c9a227",
  high: "#d9534f",
}

const ACCENT = "#d4af37"
const MUTED = "#666666"
const TEXT = "#000000"

const REPORT_TITLES: Record<ReportVariant, string> = {
  full: "Fine Print Report",
  summary: "Fine Print Summary",
}

function sectionHeader(doc: PDFKit.PDFDocument, title: string) {
  doc.moveDown(0.8)
  doc.fontSize(13).font("Helvetica-Bold").fillColor(ACCENT).text(title)
  doc.moveDown(0.3)
  doc.fontSize(10).font("Helvetica").fillColor(TEXT)
}

export function renderAnalysisPdf(
  name: string,
  result: FrozenAnalysisResult,
  variant: ReportVariant = "full"
): Promise<Buffer> {
  const title = REPORT_TITLES[variant]

  return new Promise((resolve, reject) => {
    try {
      const chunks: Buffer[] = []
      const doc = new PDFDocument({
        size: "A4",
        margins: { top: 56, bottom: 56, left: 56, right: 56 },
        info: {
          Title: `${title}: ${name}`,
          Subject: result.documentType,
          Creator: "fine-print-review",
        },
      })

      doc.on("data", (chunk: Buffer) => chunks.push(chunk))
      doc.on("end", () => resolve(Buffer.concat(chunks)))
      doc.on("error", reject)

      doc.fontSize(20).font("Helvetica-Bold").fillColor(TEXT).text(title)
      doc.fontSize(10).font("Helvetica").fillColor(MUTED).text(name)
      doc.text(`Generated ${new Date().toISOString()}`)
      doc.moveDown(0.5)
      doc
        .fontSize(14)
        .font("Helvetica-Bold")
        .fillColor(RISK_COLORS[result.riskLevel])
        .text(riskHeadline(result))

      for (const section of buildReportSections(result, variant)) {
        sectionHeader(doc, section.heading)
        for (const line of section.lines) {
          doc.text(line, { lineGap: 2 })
        }
      }

      doc.moveDown(1.5)
      doc.fontSize(8).font("Helvetica-Oblique").fillColor(MUTED).text(DISCLAIMER)

      doc.end()
    } catch (error) {
      reject(error)
    }
  })
}
