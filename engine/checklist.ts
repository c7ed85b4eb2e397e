/**
 * @fileoverview Checklist Synthesizer
 *
 * Turns findings into pre-signing actions. Rules are evaluated in catalog
 * order against the findings only, never the raw text, so every item can
 * be traced back to a key point, red flag or risk match.
 *
 * @module engine/checklist
 */

import { catalog as defaultCatalog, type Catalog, type ChecklistRule } from './catalog'
import {
  SEVERITY_RANK,
  type DocumentType,
  type KeyPoint,
  type KeyPointFields,
  type RedFlag,
} from './types'

export interface ChecklistFindings {
  documentType: DocumentType
  /** Categories of every risk match, before evidence truncation */
  riskCategories: readonly string[]
  keyPoints: readonly KeyPoint[]
  redFlags: readonly RedFlag[]
}

const PLACEHOLDER = /\{(\w+)\}/g

// ============================================================================
// Rule Evaluation
// ============================================================================

export function ruleApplies(rule: ChecklistRule, findings: ChecklistFindings): boolean {
  if (rule.baseline) return true

  const { when } = rule
  if (when.documentTypes && !when.documentTypes.includes(findings.documentType)) {
    return false
  }

  const keyPointHit = (when.keyPoints ?? []).some((category) =>
    findings.keyPoints.some(
      (kp) => kp.category === category && (!when.watchOut || kp.watchOut)
    )
  )
  const redFlagHit = (when.redFlags ?? []).some((category) =>
    findings.redFlags.some((flag) => flag.category === category)
  )
  const severity = when.redFlagSeverity
  const severityHit =
    severity !== undefined &&
    findings.redFlags.some((flag) => SEVERITY_RANK[flag.severity] >= SEVERITY_RANK[severity])
  const riskHit = (when.riskCategories ?? []).some((category) =>
    findings.riskCategories.includes(category)
  )

  return keyPointHit || redFlagHit || severityHit || riskHit
}

/** Display form of one structured field, undefined when absent */
export function formatField(fields: KeyPointFields, name: string): string | undefined {
  switch (name) {
    case 'jurisdiction':
      return fields.jurisdiction
    case 'minimumAge':
      return fields.minimumAge === undefined ? undefined : String(fields.minimumAge)
    case 'percentage':
      return fields.percentage === undefined ? undefined : `${fields.percentage}%`
    case 'duration': {
      const d = fields.duration
      return d && `${d.value} ${d.unit}${d.value === 1 ? '' : 's'}`
    }
    case 'amount': {
      const a = fields.amount
      return (
        a &&
        new Intl.NumberFormat('en-US', { style: 'currency', currency: a.currency }).format(
          a.value
        )
      )
    }
    default:
      return undefined
  }
}

/**
 * Fills `{field}` placeholders from key point fields, preferring the key
 * points the rule itself references. Returns null when any placeholder has
 * no value.
 */
export function renderItem(rule: ChecklistRule, keyPoints: readonly KeyPoint[]): string | null {
  const preferred = rule.when.keyPoints ?? []
  const candidates = [
    ...keyPoints.filter((kp) => preferred.includes(kp.category)),
    ...keyPoints.filter((kp) => !preferred.includes(kp.category)),
  ]

  let unresolved = false
  const rendered = rule.item.replace(PLACEHOLDER, (placeholder, name: string) => {
    for (const kp of candidates) {
      const value = formatField(kp.fields, name)
      if (value !== undefined) return value
    }
    unresolved = true
    return placeholder
  })
  return unresolved ? null : rendered
}

export const FIELD_NAMES = ['amount', 'percentage', 'duration', 'jurisdiction', 'minimumAge'] as const

/** All present fields in display form, in a fixed order */
export function describeFields(fields: KeyPointFields): string[] {
  return FIELD_NAMES.flatMap((name) => formatField(fields, name) ?? [])
}

// ============================================================================
// Checklist
// ============================================================================

/**
 * Pre-signing checklist for a set of findings. Never empty: the baseline
 * rule always fires. `riskCategories` must come from every risk match, not
 * the truncated evidence list. Items are deduplicated by their final text.
 */
export function buildChecklist(
  documentType: DocumentType,
  riskCategories: readonly string[],
  keyPoints: readonly KeyPoint[],
  redFlags: readonly RedFlag[],
  catalog: Catalog = defaultCatalog
): string[] {
  const findings: ChecklistFindings = { documentType, riskCategories, keyPoints, redFlags }
  const items: string[] = []

  for (const rule of catalog.checklist) {
    if (!ruleApplies(rule, findings)) continue
    const item = renderItem(rule, keyPoints)
    if (item !== null && !items.includes(item)) items.push(item)
  }
  return items
}

/** Items of the baseline rules, used for degenerate input */
export function baselineChecklist(catalog: Catalog = defaultCatalog): string[] {
  return catalog.checklist.filter((rule) => rule.baseline).map((rule) => rule.item)
}
