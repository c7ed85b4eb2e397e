/**
 * @fileoverview DOCX text extraction with warnings capture
 * @module lib/document-extraction/docx-extractor
 */

import mammoth from 'mammoth'
import { CorruptDocumentError } from '@/lib/errors'
import type { ExtractionResult, ExtractionWarning } from './types'
import { validateExtractionQuality } from './validators'

/**
 * Extracts text from a DOCX buffer. mammoth returns the final text with
 * tracked changes accepted.
 *
 * @throws CorruptDocumentError - Invalid or corrupt DOCX
 */
export async function extractDocx(
  buffer: Buffer,
  fileSize?: number
): Promise<ExtractionResult> {
  let extracted: Awaited<ReturnType<typeof mammoth.extractRawText>>
  try {
    extracted = await mammoth.extractRawText({ buffer })
  } catch {
    throw new CorruptDocumentError(
      'Could not process this Word document. Try saving it again or use a different format.'
    )
  }

  const text = extracted.value.normalize('NFC')
  const quality = validateExtractionQuality(text, fileSize ?? buffer.length)

  const docxWarnings: ExtractionWarning[] = extracted.messages
    .filter((m) => m.type === 'warning')
    .map((m) => ({
      type: 'docx_warning' as const,
      message: m.message,
    }))

  const hasImages = docxWarnings.some(
    (w) => w.message.includes('image') || w.message.includes('picture')
  )

  if (hasImages) {
    docxWarnings.push({
      type: 'embedded_images',
      message: 'Document contains images that may have text',
    })
    quality.confidence = Math.min(quality.confidence, 0.8)
  }

  quality.warnings.push(...docxWarnings)

  return {
    text,
    quality,
    pageCount: 1,
    metadata: {},
  }
}
