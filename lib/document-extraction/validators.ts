/**
 * @fileoverview Extraction quality validation utilities
 * @module lib/document-extraction/validators
 */

import type { QualityMetrics, ExtractionWarning } from './types'

export const MIN_TEXT_LENGTH = 100
const MIN_TEXT_TO_SIZE_RATIO = 0.001 // Very low = likely scanned

/**
 * Quality metrics for extracted text. Only PDFs are checked for OCR need:
 * short plain text and Word files are still real text.
 */
export function validateExtractionQuality(
  text: string,
  fileSize: number,
  { checkOcr = false }: { checkOcr?: boolean } = {}
): QualityMetrics {
  const charCount = text.length
  const wordCount = text.split(/\s+/).filter(Boolean).length
  const ratio = fileSize > 0 ? charCount / fileSize : 0
  const warnings: ExtractionWarning[] = []

  const requiresOcr = checkOcr && text.trim().length < MIN_TEXT_LENGTH

  if (requiresOcr) {
    warnings.push({
      type: 'ocr_required',
      message: 'Document has almost no text layer and looks scanned',
    })
  } else if (ratio < MIN_TEXT_TO_SIZE_RATIO && fileSize > 100_000) {
    // Large file with very little text
    warnings.push({
      type: 'low_confidence',
      message: 'Document has unusually low text density',
    })
  }

  const confidence = requiresOcr ? 0 : Math.min(1, ratio * 100)

  return {
    charCount,
    wordCount,
    pageCount: 1,
    confidence,
    warnings,
    requiresOcr,
  }
}

/**
 * Script-based language heuristic: share of Latin letters among the
 * letters of the first 5000 characters.
 */
export function detectLanguage(text: string): {
  isEnglish: boolean
  confidence: number
} {
  const sample = text.slice(0, 5000)

  const latinChars = (sample.match(/[a-zA-Z]/g) || []).length
  // CJK, Cyrillic, Arabic and other non-ASCII characters
  const nonAsciiChars = (sample.match(/[^\x00-\x7F]/g) || []).length

  const latinRatio = latinChars / (latinChars + nonAsciiChars + 1)

  return { isEnglish: latinRatio > 0.5, confidence: latinRatio }
}
