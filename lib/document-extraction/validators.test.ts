import { describe, it, expect } from 'vitest'
import { detectLanguage, validateExtractionQuality } from './validators'

describe('validateExtractionQuality', () => {
  it('counts characters and words', () => {
    const quality = validateExtractionQuality('Rent is due monthly.', 20)

    expect(quality.charCount).toBe(20)
    expect(quality.wordCount).toBe(4)
    expect(quality.confidence).toBe(1)
    expect(quality.requiresOcr).toBe(false)
    expect(quality.warnings).toEqual([])
  })

  it('does not route short text to OCR unless asked', () => {
    expect(validateExtractionQuality('Tiny.', 5).requiresOcr).toBe(false)
  })

  it('routes near-empty PDF text to OCR', () => {
    const quality = validateExtractionQuality('  Page 1  ', 250_000, { checkOcr: true })

    expect(quality.requiresOcr).toBe(true)
    expect(quality.confidence).toBe(0)
    expect(quality.warnings.map((w) => w.type)).toEqual(['ocr_required'])
  })

  it('warns about low text density in large files', () => {
    const text = 'a'.repeat(150)
    const quality = validateExtractionQuality(text, 200_000, { checkOcr: true })

    expect(quality.requiresOcr).toBe(false)
    expect(quality.warnings.map((w) => w.type)).toEqual(['low_confidence'])
  })
})

describe('detectLanguage', () => {
  it('accepts Latin script text', () => {
    const { isEnglish, confidence } = detectLanguage('The tenant pays rent.')

    expect(isEnglish).toBe(true)
    // 17 letters, no non-ASCII characters
    expect(confidence).toBeCloseTo(17 / 18)
  })

  it('rejects Cyrillic text', () => {
    expect(detectLanguage('Договор аренды квартиры').isEnglish).toBe(false)
  })
})
