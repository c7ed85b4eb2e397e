/**
 * @fileoverview Readability metrics
 *
 * Flesch reading ease, Flesch-Kincaid grade and Gunning fog, computed with
 * a vowel-group syllable heuristic. Good enough to compare documents with
 * each other, not to certify reading level.
 *
 * @module engine/readability
 */

import type { ReadabilityScore } from './types'

const WORD = /[a-zA-Z']+/g
const SENTENCE_BREAK = /[.!?]+/
const VOWEL_GROUP = /[aeiouy]+/g
const ION_SUFFIX = /[^aeiouy]ion/g

interface EaseBand {
  min: number
  gradeLabel: string
  easeLabel: string
}

/** Highest band first */
const EASE_BANDS: readonly EaseBand[] = [
  { min: 80, gradeLabel: 'Very Easy', easeLabel: 'Plain English that anyone can understand.' },
  { min: 65, gradeLabel: 'Easy', easeLabel: 'Accessible language most adults can follow.' },
  { min: 50, gradeLabel: 'Moderate', easeLabel: 'Needs some concentration, like a magazine article.' },
  { min: 35, gradeLabel: 'Difficult', easeLabel: 'Academic language that needs careful reading.' },
  { min: 20, gradeLabel: 'Very Difficult', easeLabel: 'Dense legal or technical writing that most people find hard to follow.' },
  { min: -Infinity, gradeLabel: 'Very Confusing', easeLabel: 'Extremely complex. Consider asking a professional to explain it.' },
]

const round1 = (n: number) => Math.round(n * 10) / 10

export function countSyllables(word: string): number {
  const w = word.toLowerCase().replace(/[^a-z]/g, '')
  if (!w) return 1

  let count = w.match(VOWEL_GROUP)?.length ?? 0
  if (w.endsWith('e') && w.length > 2 && !'aeiou'.includes(w[w.length - 2])) count--
  count += w.match(ION_SUFFIX)?.length ?? 0
  return Math.max(1, count)
}

export function easeBand(fleschEase: number): EaseBand {
  return EASE_BANDS.find((band) => fleschEase >= band.min) ?? EASE_BANDS[EASE_BANDS.length - 1]
}

export function computeReadability(text: string): ReadabilityScore {
  const sentences = text.split(SENTENCE_BREAK).filter((s) => s.trim().length > 0)
  const words = text.match(WORD) ?? []

  const sentenceCount = Math.max(sentences.length, 1)
  const wordCount = Math.max(words.length, 1)

  const syllables = words.map(countSyllables)
  const syllableCount = syllables.reduce((sum, n) => sum + n, 0)
  const complexCount = syllables.filter((n) => n >= 3).length
  const letterCount = words.reduce((sum, w) => sum + w.length, 0)

  const wordsPerSentence = wordCount / sentenceCount
  const syllablesPerWord = syllableCount / wordCount

  const avgSentenceLength = round1(wordsPerSentence)
  const complexWordPct = round1((complexCount / wordCount) * 100)
  const fleschEase = Math.min(
    100,
    Math.max(0, round1(206.835 - 1.015 * wordsPerSentence - 84.6 * syllablesPerWord))
  )
  const { gradeLabel, easeLabel } = easeBand(fleschEase)

  return {
    fleschEase,
    fleschGrade: Math.max(0, round1(0.39 * wordsPerSentence + 11.8 * syllablesPerWord - 15.59)),
    gunningFog: round1(0.4 * (avgSentenceLength + complexWordPct)),
    avgSentenceLength,
    avgWordLength: round1(letterCount / wordCount),
    complexWordPct,
    gradeLabel,
    easeLabel,
  }
}
