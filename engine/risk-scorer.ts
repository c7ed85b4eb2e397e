/**
 * @fileoverview Risk Scorer
 *
 * Scores how aggressive a document is toward the reader. Every match of
 * every risk pattern adds the pattern's weight to a raw total, which is
 * mapped onto 0-100 with a saturating curve:
 *
 *   score = min(100, round(100 * (1 - e^(-raw / K))))
 *
 * The curve is monotone in the raw total, so adding a matching clause can
 * never lower the score. Evidence is truncated after scoring; truncation
 * never changes the score or the matched categories.
 *
 * @module engine/risk-scorer
 */

import { catalog as defaultCatalog, type Catalog } from './catalog'
import { findAll } from './text'
import {
  DEFAULT_ENGINE_SETTINGS,
  type EngineSettings,
  type RiskEvidence,
  type RiskLevel,
} from './types'

// ============================================================================
// Types
// ============================================================================

export interface RiskScoreResult {
  /** 0-100 */
  score: number
  /** Sum of matched pattern weights before saturation */
  rawScore: number
  /** Weight desc, offset asc, catalog order; capped at `maxRiskEvidence` */
  evidence: RiskEvidence[]
  /** Every matched category in catalog order, taken before the cap */
  categories: string[]
}

export interface RiskLevelAssessment {
  level: RiskLevel
  reason: string
}

// ============================================================================
// Constants
// ============================================================================

/** Scores at or above these bounds move to the next level */
const MEDIUM_RISK_FROM = 25
const HIGH_RISK_FROM = 50

const RISK_REASONS: Record<RiskLevel, string> = {
  low: 'The document contains mostly standard terms with few clauses that work against you.',
  medium: 'The document contains some terms that limit your rights or favor the provider.',
  high: 'The document contains multiple clauses that significantly limit your rights or expose you to costs.',
}

const SNIPPET_CHARS = 120

// ============================================================================
// Scoring
// ============================================================================

export function saturate(rawScore: number, saturation: number): number {
  if (rawScore <= 0) return 0
  return Math.min(100, Math.round(100 * (1 - Math.exp(-rawScore / saturation))))
}

export function scoreRisk(
  text: string,
  settings: Pick<EngineSettings, 'riskSaturation' | 'maxRiskEvidence'> = DEFAULT_ENGINE_SETTINGS,
  catalog: Catalog = defaultCatalog
): RiskScoreResult {
  let rawScore = 0
  const categories = new Set<string>()
  const collected: Array<RiskEvidence & { order: number }> = []

  catalog.riskPatterns.forEach((pattern, order) => {
    for (const match of findAll(text, pattern.pattern)) {
      rawScore += pattern.weight
      categories.add(pattern.category)
      collected.push({
        patternId: pattern.id,
        category: pattern.category,
        description: pattern.description,
        weight: pattern.weight,
        snippet: match.text.slice(0, SNIPPET_CHARS),
        offset: match.start,
        order,
      })
    }
  })

  collected.sort(
    (a, b) => b.weight - a.weight || a.offset - b.offset || a.order - b.order
  )

  const evidence = collected
    .slice(0, Math.max(0, settings.maxRiskEvidence))
    .map(({ order: _order, ...entry }) => entry)

  return {
    score: saturate(rawScore, settings.riskSaturation),
    rawScore,
    evidence,
    categories: [...categories],
  }
}

/**
 * Maps a 0-100 score onto a level with a one-line explanation.
 * low < 25 ≤ medium < 50 ≤ high
 */
export function riskLevelFor(score: number): RiskLevelAssessment {
  const level: RiskLevel =
    score >= HIGH_RISK_FROM ? 'high' : score >= MEDIUM_RISK_FROM ? 'medium' : 'low'
  return { level, reason: RISK_REASONS[level] }
}
