/**
 * @fileoverview Analysis Report Assembler
 *
 * Runs the engine stages in order and composes one immutable report:
 *
 * 1. Classifier picks the document type
 * 2. Risk scorer, key point extractor and red flag detector scan the text
 * 3. Checklist synthesizer turns their findings into actions
 *
 * Stages are pure and share no state, so the same text always yields an
 * equal report.
 *
 * @module engine/analyze
 */

import { catalog } from './catalog'
import { buildChecklist, baselineChecklist } from './checklist'
import { classifyDocument, summaryFor } from './classifier'
import { extractKeyPoints } from './key-points'
import { computeReadability } from './readability'
import { detectRedFlags } from './red-flags'
import { riskLevelFor, scoreRisk } from './risk-scorer'
import { countWords } from './text'
import {
  DEFAULT_ENGINE_SETTINGS,
  FALLBACK_DOCUMENT_TYPE,
  type AnalysisResult,
  type DocumentType,
  type EngineSettings,
} from './types'

/** Documents above this word count get an extra note in the summary */
export const LONG_DOCUMENT_WORDS = 3000

const LONG_DOCUMENT_NOTE =
  ' The document is long. Take time to read the key sections carefully.'

export type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T

export type FrozenAnalysisResult = DeepReadonly<AnalysisResult>

/** Freezes a value and everything reachable from it */
export function deepFreeze<T>(value: T): DeepReadonly<T>
export function deepFreeze(value: unknown): unknown {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value)
    for (const child of Object.values(value)) deepFreeze(child)
  }
  return value
}

export function buildSummary(documentType: DocumentType, wordCount: number): string {
  const base = summaryFor(documentType)
  return wordCount > LONG_DOCUMENT_WORDS ? base + LONG_DOCUMENT_NOTE : base
}

function degenerateResult(trimmed: string): AnalysisResult {
  return {
    catalogVersion: catalog.version,
    documentType: FALLBACK_DOCUMENT_TYPE,
    classificationScore: 0,
    summary: summaryFor(FALLBACK_DOCUMENT_TYPE),
    riskScore: 0,
    ...riskFields(0),
    riskEvidence: [],
    keyPoints: [],
    redFlags: [],
    checklist: baselineChecklist(),
    readability: null,
    wordCount: countWords(trimmed),
    charCount: trimmed.length,
  }
}

function riskFields(score: number): Pick<AnalysisResult, 'riskLevel' | 'riskReason'> {
  const { level, reason } = riskLevelFor(score)
  return { riskLevel: level, riskReason: reason }
}

/**
 * Analyzes one document. Never throws for any string input; inputs shorter
 * than `minAnalyzableLength` after trimming yield the degenerate report.
 *
 * @example
 * ```typescript
 * const report = analyzeDocument(text)
 * report.documentType   // 'Insurance Policy'
 * report.riskLevel      // 'high'
 * report.checklist[0]   // 'Read the full document carefully before signing.'
 * ```
 */
export function analyzeDocument(
  text: string,
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS
): FrozenAnalysisResult {
  const trimmed = text.trim()
  if (trimmed.length < settings.minAnalyzableLength) {
    return deepFreeze(degenerateResult(trimmed))
  }

  const classification = classifyDocument(text, settings)
  const { documentType } = classification
  const risk = scoreRisk(text, settings)
  const keyPoints = extractKeyPoints(text, documentType)
  const redFlags = detectRedFlags(text)
  const checklist = buildChecklist(documentType, risk.categories, keyPoints, redFlags)
  const wordCount = countWords(trimmed)

  return deepFreeze({
    catalogVersion: catalog.version,
    documentType,
    classificationScore: classification.score,
    summary: buildSummary(documentType, wordCount),
    riskScore: risk.score,
    ...riskFields(risk.score),
    riskEvidence: risk.evidence,
    keyPoints,
    redFlags,
    checklist,
    readability: computeReadability(text),
    wordCount,
    charCount: trimmed.length,
  })
}
