/**
 * @fileoverview Two-document comparison
 *
 * Aligns the key points of two analyses category by category, lists the red
 * flags only one side carries and explains the differences that matter.
 *
 * @module lib/review/compare
 */

import {
  DEFAULT_ENGINE_SETTINGS,
  KEY_POINT_CATEGORIES,
  describeFields,
  type DeepReadonly,
  type EngineSettings,
  type KeyPoint,
  type KeyPointCategory,
  type RedFlag,
  type Severity,
} from "@/engine"
import { logger } from "@/lib/logger"
import { analyzeSource, type AnalyzedDocument, type DocumentSource } from "./analyze-upload"

// ============================================================================
// Types
// ============================================================================

export const MATCH_TYPES = ["identical", "different", "missing_in_a", "missing_in_b"] as const

export type MatchType = (typeof MATCH_TYPES)[number]

type ReadonlyKeyPoint = DeepReadonly<KeyPoint>

export interface CategoryAlignment {
  category: KeyPointCategory
  title: string
  matchType: MatchType
  a: ReadonlyKeyPoint | null
  b: ReadonlyKeyPoint | null
}

export interface KeyDifference {
  /** Key point or red flag category */
  category: string
  description: string
  riskImplication: string
}

export interface ComparisonResult {
  documentA: AnalyzedDocument
  documentB: AnalyzedDocument
  alignment: CategoryAlignment[]
  /** Red flag categories found in A but not in B, most severe first */
  uniqueRedFlagsA: string[]
  uniqueRedFlagsB: string[]
  /** Risk score of B minus risk score of A */
  riskDelta: number
  saferDocument: "a" | "b" | "equal"
  /** Name of the safer document, null when neither is safer */
  saferName: string | null
  keyDifferences: KeyDifference[]
}

const RED_FLAG_IMPLICATIONS: Record<Severity, string> = {
  high: "Serious concern that weighs strongly against this document.",
  medium: "Worth clarifying or negotiating before signing.",
  low: "Minor concern to keep in mind.",
}

// ============================================================================
// Alignment
// ============================================================================

function sameTerms(a: ReadonlyKeyPoint, b: ReadonlyKeyPoint): boolean {
  if (a.watchOut !== b.watchOut) return false
  const fieldsA = describeFields(a.fields)
  const fieldsB = describeFields(b.fields)
  return fieldsA.length === fieldsB.length && fieldsA.every((value, i) => value === fieldsB[i])
}

export function alignKeyPoints(
  keyPointsA: readonly ReadonlyKeyPoint[],
  keyPointsB: readonly ReadonlyKeyPoint[]
): CategoryAlignment[] {
  return KEY_POINT_CATEGORIES.flatMap((category): CategoryAlignment[] => {
    const a = keyPointsA.find((kp) => kp.category === category) ?? null
    const b = keyPointsB.find((kp) => kp.category === category) ?? null
    if (a && b) {
      return [{ category, title: a.title, matchType: sameTerms(a, b) ? "identical" : "different", a, b }]
    }
    if (a) return [{ category, title: a.title, matchType: "missing_in_b", a, b: null }]
    if (b) return [{ category, title: b.title, matchType: "missing_in_a", a: null, b }]
    return []
  })
}

/** Distinct red flags whose category the other side lacks, in input order */
function uniqueRedFlags(
  own: readonly DeepReadonly<RedFlag>[],
  other: readonly DeepReadonly<RedFlag>[]
): DeepReadonly<RedFlag>[] {
  const otherCategories = new Set(other.map((flag) => flag.category))
  const seen = new Set<string>()
  return own.filter((flag) => {
    if (otherCategories.has(flag.category) || seen.has(flag.category)) return false
    seen.add(flag.category)
    return true
  })
}

// ============================================================================
// Differences
// ============================================================================

function termsOf(kp: ReadonlyKeyPoint): string {
  const fields = describeFields(kp.fields)
  return fields.length > 0 ? fields.join(", ") : kp.detail
}

function describeAlignment(
  row: CategoryAlignment,
  nameA: string,
  nameB: string
): KeyDifference | null {
  const { category, title, a, b } = row

  if (a && b) {
    if (row.matchType === "identical") return null
    if (a.watchOut !== b.watchOut) {
      const [worse, better] = a.watchOut ? [nameA, nameB] : [nameB, nameA]
      return {
        category,
        description: `${worse} has less favourable ${title} terms than ${better}.`,
        riskImplication: `Prefer ${better} on this point.`,
      }
    }
    return {
      category,
      description: `${title} terms differ: ${termsOf(a)} vs ${termsOf(b)}.`,
      riskImplication: "Compare the exact wording before choosing.",
    }
  }

  const present = a ?? b
  if (!present) return null
  const [owner, other] = a ? [nameA, nameB] : [nameB, nameA]
  return {
    category,
    description: `Only ${owner} covers ${title}.`,
    riskImplication: present.watchOut
      ? `${owner} carries an extra concern here: ${present.detail}`
      : `${other} is silent on this point. Check whether that leaves you unprotected.`,
  }
}

function describeRedFlag(flag: DeepReadonly<RedFlag>, owner: string): KeyDifference {
  return {
    category: flag.category,
    description: `Only ${owner} contains: ${flag.description}`,
    riskImplication: RED_FLAG_IMPLICATIONS[flag.severity],
  }
}

// ============================================================================
// Comparison
// ============================================================================

/** Compares two finished analyses. Pure. */
export function diffAnalyses(documentA: AnalyzedDocument, documentB: AnalyzedDocument): ComparisonResult {
  const a = documentA.result
  const b = documentB.result

  const alignment = alignKeyPoints(a.keyPoints, b.keyPoints)
  const flagsA = uniqueRedFlags(a.redFlags, b.redFlags)
  const flagsB = uniqueRedFlags(b.redFlags, a.redFlags)

  const riskDelta = b.riskScore - a.riskScore
  const flagDelta = b.redFlags.length - a.redFlags.length
  const saferDocument =
    riskDelta > 0 || (riskDelta === 0 && flagDelta > 0)
      ? "a"
      : riskDelta < 0 || flagDelta < 0
        ? "b"
        : "equal"

  const keyDifferences = [
    ...alignment.flatMap((row) => describeAlignment(row, documentA.name, documentB.name) ?? []),
    ...flagsA.map((flag) => describeRedFlag(flag, documentA.name)),
    ...flagsB.map((flag) => describeRedFlag(flag, documentB.name)),
  ]

  return {
    documentA,
    documentB,
    alignment,
    uniqueRedFlagsA: flagsA.map((flag) => flag.category),
    uniqueRedFlagsB: flagsB.map((flag) => flag.category),
    riskDelta,
    saferDocument,
    saferName:
      saferDocument === "a" ? documentA.name : saferDocument === "b" ? documentB.name : null,
    keyDifferences,
  }
}

/**
 * Analyzes two documents concurrently and compares them.
 *
 * @example
 * ```ts
 * const comparison = await compareDocuments(
 *   { kind: "file", name: "current.pdf", path: "./current.pdf" },
 *   { kind: "file", name: "offer.docx", path: "./offer.docx" }
 * )
 * comparison.saferName // "offer.docx"
 * ```
 */
export async function compareDocuments(
  sourceA: DocumentSource,
  sourceB: DocumentSource,
  settings: EngineSettings = DEFAULT_ENGINE_SETTINGS
): Promise<ComparisonResult> {
  const [documentA, documentB] = await Promise.all([
    analyzeSource(sourceA, settings),
    analyzeSource(sourceB, settings),
  ])
  const comparison = diffAnalyses(documentA, documentB)

  logger.info("Documents compared", {
    documentA: documentA.name,
    documentB: documentB.name,
    riskDelta: comparison.riskDelta,
    saferDocument: comparison.saferDocument,
    differenceCount: comparison.keyDifferences.length,
  })
  return comparison
}
