/**
 * @fileoverview Multi-document ranking
 *
 * Orders 2-8 analyses from riskiest to safest and builds the material for a
 * side-by-side view: a composite score per document, strengths and
 * weaknesses relative to the peer average, a category matrix and a
 * plain-English recommendation.
 *
 * Ranking order: risk score descending, then red flag count descending,
 * then name. Position 1 is the riskiest document, the last is the safest.
 *
 * @module lib/review/rank
 */

import {
  DEFAULT_ENGINE_SETTINGS,
  KEY_POINT_CATEGORIES,
  type EngineSettings,
  type KeyPointCategory,
} from "@/engine"
import { ValidationError, type SerializedError } from "@/lib/errors"
import { logger } from "@/lib/logger"
import { analyzeSource, type AnalyzedDocument, type DocumentSource } from "./analyze-upload"

export const MIN_RANKED_DOCUMENTS = 2
export const MAX_RANKED_DOCUMENTS = 8

const DETAIL_LENGTH = 120
const CLOSE_SECOND_GAP = 5

// ============================================================================
// Types
// ============================================================================

export type MatrixState = "good" | "warn" | "missing"

export interface MatrixCell {
  documentName: string
  state: MatrixState
  detail: string
}

export interface MatrixRow {
  category: KeyPointCategory
  title: string
  /** One cell per document, in ranking order */
  cells: MatrixCell[]
}

export interface RankedDocument {
  /** 1 is the riskiest */
  rank: number
  name: string
  result: AnalyzedDocument["result"]
  /** risk × 0.5 + red flags × 1.2 + watch-out key points × 0.6, lower is safer */
  compositeScore: number
  watchOutCount: number
  strengths: string[]
  weaknesses: string[]
  extractionError?: SerializedError
}

export interface RankingResult {
  rankings: RankedDocument[]
  matrix: MatrixRow[]
  safest: { name: string; reason: string }
  recommendation: string
}

// ============================================================================
// Scoring
// ============================================================================

const round1 = (n: number) => Math.round(n * 10) / 10

function watchOutCount({ result }: AnalyzedDocument): number {
  return result.keyPoints.filter((kp) => kp.watchOut).length
}

export function compositeScore(document: AnalyzedDocument): number {
  const { riskScore, redFlags } = document.result
  return round1(riskScore * 0.5 + redFlags.length * 1.2 + watchOutCount(document) * 0.6)
}

function compareRisk(a: AnalyzedDocument, b: AnalyzedDocument): number {
  return (
    b.result.riskScore - a.result.riskScore ||
    b.result.redFlags.length - a.result.redFlags.length ||
    (a.name < b.name ? -1 : a.name > b.name ? 1 : 0)
  )
}

interface PeerAverages {
  riskScore: number
  redFlags: number
}

function peerAverages(documents: readonly AnalyzedDocument[]): PeerAverages {
  const total = documents.reduce(
    (sum, { result }) => ({
      riskScore: sum.riskScore + result.riskScore,
      redFlags: sum.redFlags + result.redFlags.length,
    }),
    { riskScore: 0, redFlags: 0 }
  )
  return {
    riskScore: total.riskScore / documents.length,
    redFlags: total.redFlags / documents.length,
  }
}

function titlesOf(document: AnalyzedDocument, watchOut: boolean): string[] {
  return document.result.keyPoints
    .filter((kp) => kp.watchOut === watchOut)
    .slice(0, 3)
    .map((kp) => kp.title)
}

function strengthsOf(document: AnalyzedDocument, averages: PeerAverages): string[] {
  const { riskScore, redFlags, readability } = document.result
  const items: string[] = []

  if (riskScore < averages.riskScore - 10) {
    items.push(`Risk score (${riskScore}/100) is well below average`)
  }
  if (redFlags.length < averages.redFlags) {
    items.push("Fewer red flags than most alternatives")
  }
  const favourable = titlesOf(document, false)
  if (favourable.length > 0) {
    items.push(`Favourable terms on: ${favourable.join(", ")}`)
  }
  if (readability && readability.fleschEase >= 50) {
    items.push("Written in relatively plain language")
  }
  return items.length > 0 ? items.slice(0, 3) : ["No particular strengths identified"]
}

function weaknessesOf(document: AnalyzedDocument, averages: PeerAverages): string[] {
  const { riskScore, redFlags, readability } = document.result
  const items: string[] = []

  if (document.extractionError) {
    items.push(`Text could not be extracted: ${document.extractionError.message}`)
  }
  if (riskScore > averages.riskScore + 10) {
    items.push(`Risk score (${riskScore}/100) is above average`)
  }
  if (redFlags.length > 0) {
    items.push(`${redFlags.length} red flag(s) detected`)
  }
  const concerning = titlesOf(document, true)
  if (concerning.length > 0) {
    items.push(`Concerning clauses: ${concerning.join(", ")}`)
  }
  if (readability && readability.fleschEase < 35) {
    items.push("Complex, hard-to-follow language")
  }
  return items.slice(0, 3)
}

// ============================================================================
// Category Matrix
// ============================================================================

export function buildMatrix(rankings: readonly RankedDocument[]): MatrixRow[] {
  return KEY_POINT_CATEGORIES.flatMap((category): MatrixRow[] => {
    const title = rankings
      .flatMap(({ result }) => result.keyPoints)
      .find((kp) => kp.category === category)?.title
    if (title === undefined) return []

    const cells = rankings.map(({ name, result }): MatrixCell => {
      const kp = result.keyPoints.find((point) => point.category === category)
      if (!kp) return { documentName: name, state: "missing", detail: "Not mentioned" }
      return {
        documentName: name,
        state: kp.watchOut ? "warn" : "good",
        detail: kp.detail.slice(0, DETAIL_LENGTH),
      }
    })
    return [{ category, title, cells }]
  })
}

// ============================================================================
// Recommendation
// ============================================================================

function safestReason(safest: RankedDocument, rankings: readonly RankedDocument[]): string {
  const flagCounts = rankings.map((r) => r.result.redFlags.length)
  const ownFlags = safest.result.redFlags.length
  const parts: string[] = []

  if (safest.result.riskScore < 30) {
    parts.push(`low risk score of ${safest.result.riskScore}/100`)
  }
  if (ownFlags === 0) {
    parts.push("no red flags")
  } else if (ownFlags === Math.min(...flagCounts) && ownFlags < Math.max(...flagCounts)) {
    parts.push(`fewest red flags (${ownFlags})`)
  }
  if (safest.watchOutCount === 0) {
    parts.push("no concerning clauses")
  }

  return parts.length > 0
    ? `Ranked safest due to its ${parts.join(", ")}.`
    : `Ranked safest with the lowest risk score among all ${rankings.length} documents.`
}

function buildRecommendation(rankings: readonly RankedDocument[]): string {
  const riskiest = rankings[0]
  const safest = rankings[rankings.length - 1]
  const count = rankings.length

  const gap = riskiest.result.riskScore - safest.result.riskScore
  const strength = gap >= 30 ? "significantly" : gap >= 15 ? "meaningfully" : "slightly"
  const sentences = [
    `Based on the analysis of ${count} documents, ${safest.name} is ${strength} the safest choice.`,
  ]

  const [standout] = safest.strengths
  if (standout && standout !== "No particular strengths identified") {
    sentences.push(`It stands out for: ${standout.toLowerCase()}.`)
  }

  if (count > 2) {
    const runnerUp = rankings[count - 2]
    if (runnerUp.compositeScore - safest.compositeScore < CLOSE_SECOND_GAP) {
      sentences.push(`${runnerUp.name} is a close second and also a reasonable option.`)
    }
  }

  const riskiestFlags = riskiest.result.redFlags.length
  if (riskiestFlags > 0) {
    sentences.push(
      `Avoid ${riskiest.name} if possible. It carries ${riskiestFlags} red flag(s) and scored ${riskiest.result.riskScore}/100 on risk.`
    )
  }
  return sentences.join(" ")
}

// ============================================================================
// Ranking
// ============================================================================

function assertRankable(count: number): void {
  if (count < MIN_RANKED_DOCUMENTS || count > MAX_RANKED_DOCUMENTS) {
    const message = `Ranking needs between ${MIN_RANKED_DOCUMENTS} and ${MAX_RANKED_DOCUMENTS} documents, got ${count}`
    throw new ValidationError(message, [{ field: "documents", message }])
  }
}

/**
 * Ranks finished analyses. Pure.
 *
 * @throws ValidationError for fewer than 2 or more than 8 documents
 */
export function rankAnalyses(documents: readonly AnalyzedDocument[]): RankingResult {
  assertRankable(documents.length)

  const averages = peerAverages(documents)
  const rankings = [...documents].sort(compareRisk).map(
    (document, index): RankedDocument => ({
      rank: index + 1,
      name: document.name,
      result: document.result,
      compositeScore: compositeScore(document),
      watchOutCount: watchOutCount(document),
      strengths: strengthsOf(document, averages),
      weaknesses: weaknessesOf(document, averages),
      ...(document.extractionError && { extractionError: document.extractionError }),
    })
  )

  const safest = rankings[rankings.length - 1]
  return {
    rankings,
    matrix: buildMatrix(rankings),
    safest: { name: safest.name, reason: safestReason(safest, rankings) },
    recommendation: buildRecommendation(rankings),
  }
}

/**
 * Analyzes 2-8 documents concurrently and ranks them.
 *
 * @throws ValidationError before any analysis when the count is out of range
 */
export async function rankDocuments(
  sources: readonly DocumentSource[],
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS
): Promise<RankingResult> {
  assertRankable(sources.length)

  const documents = await Promise.all(sources.map((source) => analyzeSource(source, settings)))
  const ranking = rankAnalyses(documents)

  logger.info("Documents ranked", {
    count: ranking.rankings.length,
    riskiest: ranking.rankings[0].name,
    safest: ranking.safest.name,
  })
  return ranking
}
