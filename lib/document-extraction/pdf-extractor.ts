/**
 * @fileoverview PDF text extraction with error handling
 *
 * unpdf (a serverless build of PDF.js) is loaded with a dynamic import so
 * plain-text runs never pay for it.
 *
 * @module lib/document-extraction/pdf-extractor
 */

import { EncryptedDocumentError, CorruptDocumentError } from '@/lib/errors'
import type { DocumentMetadata, ExtractionResult } from './types'
import { validateExtractionQuality } from './validators'

function stringField(info: unknown, key: string): string | undefined {
  if (typeof info !== 'object' || info === null) return undefined
  const value: unknown = Reflect.get(info, key)
  return typeof value === 'string' && value.length > 0 ? value : undefined
}

/**
 * Extracts text from a PDF buffer. Pages are merged into one string in
 * content-stream order, which linearizes multi-column layouts.
 *
 * @throws EncryptedDocumentError - Password-protected PDF
 * @throws CorruptDocumentError - Invalid or corrupt PDF
 */
export async function extractPdf(
  buffer: Buffer,
  fileSize?: number
): Promise<ExtractionResult> {
  const { extractText, getMeta, getDocumentProxy } = await import('unpdf')

  let pdf: Awaited<ReturnType<typeof getDocumentProxy>> | undefined
  try {
    pdf = await getDocumentProxy(new Uint8Array(buffer))

    const { totalPages, text: rawText } = await extractText(pdf, { mergePages: true })
    const text = (Array.isArray(rawText) ? rawText.join('\n') : rawText).normalize('NFC')

    const quality = validateExtractionQuality(text, fileSize ?? buffer.length, {
      checkOcr: true,
    })
    quality.pageCount = totalPages

    let metadata: DocumentMetadata = {}
    try {
      const { info } = await getMeta(pdf)
      metadata = {
        title: stringField(info, 'Title'),
        author: stringField(info, 'Author'),
        creationDate: stringField(info, 'CreationDate'),
        modificationDate: stringField(info, 'ModDate'),
      }
    } catch (error) {
      // Metadata is optional; keep the text
      quality.warnings.push({
        type: 'low_confidence',
        message: `PDF metadata unreadable: ${error instanceof Error ? error.message : String(error)}`,
      })
    }

    return {
      text,
      quality,
      pageCount: totalPages,
      metadata,
    }
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : String(error)

    if (/password|encrypted/i.test(errorMessage)) {
      throw new EncryptedDocumentError()
    }
    if (/invalid pdf|not a pdf/i.test(errorMessage)) {
      throw new CorruptDocumentError()
    }
    throw error
  } finally {
    await pdf?.destroy()
  }
}
