import { describe, it, expect } from 'vitest'
import { computeReadability, countSyllables, easeBand } from './readability'

describe('countSyllables', () => {
  it.each([
    ['the', 1],
    ['cake', 1],
    ['beautiful', 3],
    ['123', 1],
  ] as const)('counts %s as %i', (word, expected) => {
    expect(countSyllables(word)).toBe(expected)
  })
})

describe('easeBand', () => {
  it('labels by the lower bound of each band', () => {
    expect(easeBand(80).gradeLabel).toBe('Very Easy')
    expect(easeBand(79.9).gradeLabel).toBe('Easy')
    expect(easeBand(35).gradeLabel).toBe('Difficult')
    expect(easeBand(0).gradeLabel).toBe('Very Confusing')
  })
})

describe('computeReadability', () => {
  it('scores short plain sentences', () => {
    expect(computeReadability('The cat sat. The dog ran.')).toEqual({
      fleschEase: 100,
      fleschGrade: 0,
      gunningFog: 1.2,
      avgSentenceLength: 3,
      avgWordLength: 3,
      complexWordPct: 0,
      gradeLabel: 'Very Easy',
      easeLabel: 'Plain English that anyone can understand.',
    })
  })

  it('rates dense legal prose as harder than plain prose', () => {
    const legal = computeReadability(
      'Notwithstanding the foregoing, the indemnifying party shall indemnify, defend and hold harmless the indemnified party from any and all liabilities arising hereunder.'
    )
    const plain = computeReadability('We keep your data safe. You can ask us to delete it.')

    expect(legal.fleschEase).toBeLessThan(plain.fleschEase)
    expect(legal.fleschGrade).toBeGreaterThan(plain.fleschGrade)
    expect(legal.complexWordPct).toBeGreaterThan(0)
  })

  it('handles text without words', () => {
    const result = computeReadability('...')

    expect(result.avgWordLength).toBe(0)
    expect(Number.isFinite(result.fleschEase)).toBe(true)
  })
})
