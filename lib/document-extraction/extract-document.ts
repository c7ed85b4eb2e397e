/**
 * @fileoverview Unified document extraction entry point
 *
 * Single function for extracting text from PDF, DOCX or plain text with
 * validation gates (OCR need, language) and structured output. Outcomes are
 * returned as a `Result` so a batch can report each file separately.
 *
 * @module lib/document-extraction/extract-document
 */

import { extname } from 'node:path'
import {
  ExtractionFailedError,
  OcrRequiredError,
  UnsupportedFileTypeError,
  ValidationError,
  isAppError,
  type AppError,
} from '@/lib/errors'
import { logger } from '@/lib/logger'
import { tryCatchWith, type Result } from '@/lib/result'
import { extractPdf } from './pdf-extractor'
import { extractDocx } from './docx-extractor'
import { detectLanguage, validateExtractionQuality } from './validators'
import { SUPPORTED_MIME_TYPES, type ExtractionResult, type SupportedMimeType } from './types'

// ============================================================================
// Types
// ============================================================================

export interface ExtractDocumentOptions {
  /** File size in bytes for quality metrics */
  fileSize?: number
  /** Skip language validation */
  skipLanguageCheck?: boolean
  /** Return scanned PDFs with `requiresOcr` set instead of failing */
  skipOcrRouting?: boolean
}

type ExtractionOutcome = 'success' | 'ocr_required' | 'non_english'

const EXTENSION_MIME_TYPES: Record<string, string> = {
  '.pdf': 'application/pdf',
  '.docx': 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  '.txt': 'text/plain',
  '.text': 'text/plain',
  '.md': 'text/markdown',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.tif': 'image/tiff',
  '.tiff': 'image/tiff',
}

/** MIME type for a file path, `application/octet-stream` when unknown */
export function mimeTypeForPath(path: string): string {
  return EXTENSION_MIME_TYPES[extname(path).toLowerCase()] ?? 'application/octet-stream'
}

export function isSupportedMimeType(mimeType: string): mimeType is SupportedMimeType {
  return SUPPORTED_MIME_TYPES.some((supported) => supported === mimeType)
}

// ============================================================================
// Main Extraction Function
// ============================================================================

/**
 * Extracts text from a document buffer.
 *
 * Validation flow:
 * 1. Format detection and raw extraction
 * 2. OCR gate (PDF only)
 * 3. Language gate (English only)
 *
 * Error results: `UnsupportedFileTypeError` (images included),
 * `EncryptedDocumentError`, `CorruptDocumentError`, `OcrRequiredError`,
 * `ValidationError` for non-English text and `ExtractionFailedError` for
 * anything the parsers throw.
 */
export async function extractDocument(
  buffer: Buffer,
  mimeType: string,
  options: ExtractDocumentOptions = {}
): Promise<Result<ExtractionResult, AppError>> {
  return tryCatchWith(
    () => runExtraction(buffer, mimeType, options),
    (error) => {
      const appError = isAppError(error)
        ? error
        : new ExtractionFailedError(error instanceof Error ? error.message : String(error))
      logger.warn('Document extraction failed', { mimeType, code: appError.code })
      return appError
    }
  )
}

async function runExtraction(
  buffer: Buffer,
  mimeType: string,
  options: ExtractDocumentOptions
): Promise<ExtractionResult> {
  const { fileSize = buffer.length, skipLanguageCheck = false, skipOcrRouting = false } = options

  let result: ExtractionResult
  switch (mimeType) {
    case 'application/pdf':
      result = await extractPdf(buffer, fileSize)
      break
    case 'application/vnd.openxmlformats-officedocument.wordprocessingml.document':
      result = await extractDocx(buffer, fileSize)
      break
    case 'text/plain':
    case 'text/markdown':
      result = extractPlainText(buffer, fileSize)
      break
    default:
      throw new UnsupportedFileTypeError(mimeType)
  }

  if (result.quality.requiresOcr && !skipOcrRouting) {
    logExtractionMetrics(mimeType, result, 'ocr_required')
    throw new OcrRequiredError()
  }

  if (!skipLanguageCheck && result.text.length > 100) {
    const lang = detectLanguage(result.text)

    if (!lang.isEnglish) {
      logExtractionMetrics(mimeType, result, 'non_english')
      throw new ValidationError(
        'This document appears to be in a non-English language. Analysis supports English documents only.'
      )
    }

    if (lang.confidence < 0.7) {
      result.quality.warnings.push({
        type: 'non_english',
        message: `Document may contain non-English text (confidence: ${(lang.confidence * 100).toFixed(0)}%)`,
      })
    }
  }

  logExtractionMetrics(mimeType, result, 'success')
  return result
}

// ============================================================================
// Plain Text Extraction
// ============================================================================

function extractPlainText(buffer: Buffer, fileSize: number): ExtractionResult {
  const text = buffer.toString('utf-8').normalize('NFC')

  return {
    text,
    quality: validateExtractionQuality(text, fileSize),
    pageCount: 1,
    metadata: {},
  }
}

// ============================================================================
// Logging
// ============================================================================

function logExtractionMetrics(
  mimeType: string,
  result: ExtractionResult,
  outcome: ExtractionOutcome
): void {
  logger.info('Document extracted', {
    mimeType,
    outcome,
    charCount: result.quality.charCount,
    wordCount: result.quality.wordCount,
    pageCount: result.pageCount,
    confidence: result.quality.confidence,
    requiresOcr: result.quality.requiresOcr,
    warningCount: result.quality.warnings.length,
    warnings: result.quality.warnings.map((w) => w.type).join(','),
    hasTitle: !!result.metadata.title,
    hasAuthor: !!result.metadata.author,
  })
}
