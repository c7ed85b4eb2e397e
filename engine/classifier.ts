/**
 * @fileoverview Document Classifier
 *
 * First stage of the review engine. Picks one document type by summing
 * weighted keyword occurrences per type.
 *
 * Ties go to the type listed first in the catalog, which lists specific
 * types before the generic ones they overlap with. A best total below
 * `minClassificationScore` falls back to General Terms & Conditions.
 *
 * @module engine/classifier
 */

import { catalog as defaultCatalog, type Catalog } from './catalog'
import { countMatches } from './text'
import {
  DEFAULT_ENGINE_SETTINGS,
  FALLBACK_DOCUMENT_TYPE,
  type ClassifiedDocumentType,
  type DocumentType,
  type EngineSettings,
} from './types'

// ============================================================================
// Types
// ============================================================================

export interface TypeScore {
  documentType: ClassifiedDocumentType
  score: number
}

export interface ClassificationResult {
  documentType: DocumentType
  /** Total of the winning type, 0 for an empty document */
  score: number
  /** Every type's total, in catalog order */
  scores: TypeScore[]
}

// ============================================================================
// Classification
// ============================================================================

export function scoreDocumentTypes(
  text: string,
  rules: Catalog['classification'] = defaultCatalog.classification
): TypeScore[] {
  return rules.map((rule) => ({
    documentType: rule.documentType,
    score: rule.keywords.reduce(
      (total, keyword) => total + countMatches(text, keyword.pattern) * keyword.weight,
      0
    ),
  }))
}

/**
 * Classifies a document. Total for every input, never throws.
 *
 * @example
 * ```typescript
 * classifyDocument('The insurer pays the policyholder after the deductible...')
 * // { documentType: 'Insurance Policy', score: 10, scores: [...] }
 * ```
 */
export function classifyDocument(
  text: string,
  settings: Pick<EngineSettings, 'minClassificationScore'> = DEFAULT_ENGINE_SETTINGS,
  catalog: Catalog = defaultCatalog
): ClassificationResult {
  const scores = scoreDocumentTypes(text, catalog.classification)

  // Strict comparison keeps the earliest type on ties
  let best: TypeScore | null = null
  for (const entry of scores) {
    if (best === null || entry.score > best.score) best = entry
  }

  if (best === null || best.score < settings.minClassificationScore) {
    return {
      documentType: FALLBACK_DOCUMENT_TYPE,
      score: best?.score ?? 0,
      scores,
    }
  }

  return { documentType: best.documentType, score: best.score, scores }
}

/** Summary template for a document type */
export function summaryFor(
  documentType: DocumentType,
  catalog: Catalog = defaultCatalog
): string {
  const rule = catalog.classification.find((r) => r.documentType === documentType)
  return rule?.summary ?? catalog.fallbackSummary
}
