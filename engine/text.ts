/**
 * @fileoverview Text matching helpers shared by the engine stages
 *
 * All matching goes through `String.prototype.matchAll`, which works on a
 * copy of the pattern. Catalog patterns are shared across calls, so their
 * `lastIndex` must never be touched directly (no `exec`/`test` on them).
 *
 * @module engine/text
 */

import type { Evidence } from './types'

/** Upper bound on matches collected for a single pattern */
export const MAX_MATCHES_PER_PATTERN = 500

/** Longest evidence window kept for a key point */
const MAX_EVIDENCE_CHARS = 400

/** Characters kept on each side of a match when its sentence is too long */
const EVIDENCE_CONTEXT_CHARS = 150

const SENTENCE_END = /[.!?]/

export interface TextMatch {
  text: string
  start: number
  end: number
  groups: Array<string | undefined>
}

function asGlobal(pattern: RegExp): RegExp {
  return pattern.global ? pattern : new RegExp(pattern.source, `${pattern.flags}g`)
}

/**
 * Collects non-overlapping matches of `pattern` in document order.
 * Empty matches are skipped.
 */
export function findAll(
  text: string,
  pattern: RegExp,
  limit = MAX_MATCHES_PER_PATTERN
): TextMatch[] {
  const matches: TextMatch[] = []
  if (limit <= 0 || text.length === 0) return matches

  for (const m of text.matchAll(asGlobal(pattern))) {
    if (m[0].length === 0) continue
    const start = m.index ?? 0
    matches.push({
      text: m[0],
      start,
      end: start + m[0].length,
      groups: m.slice(1),
    })
    if (matches.length >= limit) break
  }
  return matches
}

/** Number of non-overlapping matches, capped at {@link MAX_MATCHES_PER_PATTERN} */
export function countMatches(text: string, pattern: RegExp): number {
  return findAll(text, pattern).length
}

export function hasMatch(text: string, ...patterns: RegExp[]): boolean {
  return patterns.some((p) => findAll(text, p, 1).length > 0)
}

/** First match across `patterns`, earliest pattern wins */
export function firstMatch(text: string, ...patterns: RegExp[]): TextMatch | null {
  for (const p of patterns) {
    const [m] = findAll(text, p, 1)
    if (m) return m
  }
  return null
}

/**
 * Builds an evidence window for a match: the containing sentence, trimmed.
 * Sentences longer than the window limit are cut to a fixed context around
 * the match instead.
 */
export function sentenceAround(text: string, start: number, end: number): Evidence {
  let left = start
  while (left > 0) {
    const prev = text[left - 1]
    if (prev === '\n' && text[left - 2] === '\n') break
    if (SENTENCE_END.test(prev) && /\s/.test(text[left] ?? '')) break
    left--
  }

  let right = end
  while (right < text.length) {
    const ch = text[right]
    if (SENTENCE_END.test(ch)) {
      right++
      break
    }
    if (ch === '\n' && text[right + 1] === '\n') break
    right++
  }

  if (right - left > MAX_EVIDENCE_CHARS) {
    left = Math.max(left, start - EVIDENCE_CONTEXT_CHARS)
    right = Math.min(right, end + EVIDENCE_CONTEXT_CHARS)
  }

  return trimSpan(text, left, right)
}

/** Narrows `[start, end)` so it neither begins nor ends with whitespace */
export function trimSpan(text: string, start: number, end: number): Evidence {
  let s = start
  let e = end
  while (s < e && /\s/.test(text[s])) s++
  while (e > s && /\s/.test(text[e - 1])) e--
  return { text: text.slice(s, e), start: s, end: e }
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length
}
