/**
 * @fileoverview Document extraction type definitions
 * @module lib/document-extraction/types
 */

export const SUPPORTED_MIME_TYPES = [
  'application/pdf',
  'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  'text/plain',
  'text/markdown',
] as const

export type SupportedMimeType = (typeof SUPPORTED_MIME_TYPES)[number]

export interface ExtractionWarning {
  type:
    | 'ocr_required'
    | 'docx_warning'
    | 'embedded_images'
    | 'low_confidence'
    | 'non_english'
  message: string
}

export interface QualityMetrics {
  /** Total character count after normalization */
  charCount: number
  /** Estimated word count */
  wordCount: number
  /** Number of pages (PDF only, 1 otherwise) */
  pageCount: number
  /** Extraction confidence 0-1 based on text density */
  confidence: number
  warnings: ExtractionWarning[]
  /** True when a PDF has too little text and would need OCR */
  requiresOcr: boolean
}

export interface DocumentMetadata {
  title?: string
  author?: string
  creationDate?: string
  modificationDate?: string
}

export interface ExtractionResult {
  /** Extracted text, NFC-normalized */
  text: string
  quality: QualityMetrics
  pageCount: number
  metadata: DocumentMetadata
}
