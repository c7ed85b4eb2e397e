import { describe, it, expect, vi, beforeEach } from 'vitest'
import mammoth from 'mammoth'
import { logger } from '@/lib/logger'
import { SAMPLE_LEASE } from '@/engine/testing/fixtures'
import { extractDocument, isSupportedMimeType, mimeTypeForPath } from './extract-document'

const pdf = vi.hoisted(() => ({
  getDocumentProxy: vi.fn(),
  extractText: vi.fn(),
  getMeta: vi.fn(),
}))

vi.mock('unpdf', () => pdf)

vi.mock('mammoth', () => ({
  default: { extractRawText: vi.fn() },
}))

const DOCX = 'application/vnd.openxmlformats-officedocument.wordprocessingml.document'

function mockPdf(text: string, info: Record<string, string> = {}) {
  const destroy = vi.fn().mockResolvedValue(undefined)
  pdf.getDocumentProxy.mockResolvedValue({ destroy })
  pdf.extractText.mockResolvedValue({ totalPages: 2, text })
  pdf.getMeta.mockResolvedValue({ info })
  return destroy
}

describe('mimeTypeForPath', () => {
  it.each([
    ['lease.PDF', 'application/pdf'],
    ['contract.docx', DOCX],
    ['terms.txt', 'text/plain'],
    ['terms.md', 'text/markdown'],
    ['scan.png', 'image/png'],
    ['archive.zip', 'application/octet-stream'],
  ])('%s is %s', (path, mimeType) => {
    expect(mimeTypeForPath(path)).toBe(mimeType)
  })
})

describe('isSupportedMimeType', () => {
  it('accepts text formats and rejects images', () => {
    expect(isSupportedMimeType('text/plain')).toBe(true)
    expect(isSupportedMimeType('image/jpeg')).toBe(false)
  })
})

describe('extractDocument', () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  describe('plain text', () => {
    it('returns normalized text with metrics', async () => {
      const result = await extractDocument(Buffer.from(SAMPLE_LEASE), 'text/plain')

      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.value.text).toBe(SAMPLE_LEASE)
      expect(result.value.pageCount).toBe(1)
      expect(result.value.quality.requiresOcr).toBe(false)
      expect(result.value.quality.warnings).toEqual([])
      expect(logger.info).toHaveBeenCalledWith(
        'Document extracted',
        expect.objectContaining({ mimeType: 'text/plain', outcome: 'success' })
      )
    })

    it('keeps short text instead of routing it to OCR', async () => {
      const result = await extractDocument(Buffer.from('Short note.'), 'text/plain')

      expect(result.ok && result.value.text).toBe('Short note.')
    })

    it('rejects non-English text', async () => {
      const text = 'Настоящий договор аренды заключен между арендодателем и арендатором. '.repeat(3)
      const result = await extractDocument(Buffer.from(text), 'text/plain')

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('VALIDATION_ERROR')
    })

    it('skips the language gate when asked', async () => {
      const text = 'Настоящий договор аренды заключен между арендодателем и арендатором. '.repeat(3)
      const result = await extractDocument(Buffer.from(text), 'text/plain', {
        skipLanguageCheck: true,
      })

      expect(result.ok).toBe(true)
    })
  })

  describe('unsupported types', () => {
    it('reports images as unsupported', async () => {
      const result = await extractDocument(Buffer.from([0x89, 0x50]), 'image/png')

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('UNSUPPORTED_FILE_TYPE')
      expect(result.error.message).toBe('Unsupported file type: image/png')
      expect(logger.warn).toHaveBeenCalledWith('Document extraction failed', {
        mimeType: 'image/png',
        code: 'UNSUPPORTED_FILE_TYPE',
      })
    })
  })

  describe('PDF', () => {
    it('merges pages and reads metadata', async () => {
      const destroy = mockPdf(SAMPLE_LEASE, { Title: 'Lease', Author: '' })

      const result = await extractDocument(Buffer.from('%PDF-1.7'), 'application/pdf')

      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.value.text).toBe(SAMPLE_LEASE)
      expect(result.value.pageCount).toBe(2)
      expect(result.value.quality.pageCount).toBe(2)
      expect(result.value.metadata).toEqual({
        title: 'Lease',
        author: undefined,
        creationDate: undefined,
        modificationDate: undefined,
      })
      expect(pdf.extractText).toHaveBeenCalledWith(expect.anything(), { mergePages: true })
      expect(destroy).toHaveBeenCalledOnce()
    })

    it('requires OCR for scanned PDFs', async () => {
      mockPdf('  ')

      const result = await extractDocument(Buffer.from('%PDF-1.7'), 'application/pdf')

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('OCR_REQUIRED')
    })

    it('returns scanned PDFs flagged when OCR routing is skipped', async () => {
      mockPdf('  ')

      const result = await extractDocument(Buffer.from('%PDF-1.7'), 'application/pdf', {
        skipOcrRouting: true,
      })

      expect(result.ok && result.value.quality.requiresOcr).toBe(true)
    })

    it('maps password errors to EncryptedDocumentError', async () => {
      pdf.getDocumentProxy.mockRejectedValue(new Error('No password given'))

      const result = await extractDocument(Buffer.from('%PDF-1.7'), 'application/pdf')

      expect(!result.ok && result.error.code).toBe('ENCRYPTED_DOCUMENT')
    })

    it('maps parse errors to CorruptDocumentError', async () => {
      pdf.getDocumentProxy.mockRejectedValue(new Error('Invalid PDF structure.'))

      const result = await extractDocument(Buffer.from('nope'), 'application/pdf')

      expect(!result.ok && result.error.code).toBe('CORRUPT_DOCUMENT')
    })

    it('releases the document when text extraction fails', async () => {
      const destroy = mockPdf(SAMPLE_LEASE)
      pdf.extractText.mockRejectedValue(new Error('Invalid PDF structure.'))

      const result = await extractDocument(Buffer.from('%PDF-1.7'), 'application/pdf')

      expect(!result.ok && result.error.code).toBe('CORRUPT_DOCUMENT')
      expect(destroy).toHaveBeenCalledOnce()
    })

    it('wraps unexpected parser errors', async () => {
      pdf.getDocumentProxy.mockRejectedValue(new Error('Out of memory'))

      const result = await extractDocument(Buffer.from('%PDF-1.7'), 'application/pdf')

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('EXTRACTION_FAILED')
      expect(result.error.message).toBe('Out of memory')
    })
  })

  describe('DOCX', () => {
    it('captures mammoth warnings and embedded images', async () => {
      vi.mocked(mammoth.extractRawText).mockResolvedValue({
        value: SAMPLE_LEASE,
        messages: [{ type: 'warning', message: 'Unrecognised image format' }],
      })

      const result = await extractDocument(Buffer.from(SAMPLE_LEASE), DOCX)

      expect(result.ok).toBe(true)
      if (!result.ok) return
      expect(result.value.text).toBe(SAMPLE_LEASE)
      expect(result.value.quality.warnings.map((w) => w.type)).toEqual([
        'docx_warning',
        'embedded_images',
      ])
      expect(result.value.quality.confidence).toBe(0.8)
    })

    it('maps mammoth failures to CorruptDocumentError', async () => {
      vi.mocked(mammoth.extractRawText).mockRejectedValue(new Error('End of data'))

      const result = await extractDocument(Buffer.from('PK'), DOCX)

      expect(result.ok).toBe(false)
      if (result.ok) return
      expect(result.error.code).toBe('CORRUPT_DOCUMENT')
    })
  })
})
