/**
 * @fileoverview Pattern catalog
 *
 * Loads the versioned JSON pattern tables, validates them, and compiles every
 * regex once. Any misconfiguration throws {@link CatalogError} while the
 * module loads, so a broken table never reaches a document.
 *
 * Compiled patterns carry the `g` and `i` flags. Stages consume them only
 * through `matchAll` (see `engine/text`), never through `exec`/`test`.
 *
 * @module engine/catalog
 */

import type { ZodError } from 'zod'
import { CatalogError, type ErrorDetail } from '@/lib/errors'
import { DOCUMENT_TYPES, type KeyPointFields } from '../types'
import documentTypesData from './data/document-types.json'
import riskPatternsData from './data/risk-patterns.json'
import redFlagsData from './data/red-flags.json'
import checklistData from './data/checklist-rules.json'
import {
  checklistTableSchema,
  documentTypesTableSchema,
  redFlagsTableSchema,
  riskPatternsTableSchema,
  type Catalog,
  type ChecklistRule,
  type ChecklistTable,
  type ClassificationRule,
  type DocumentTypesTable,
  type RawCatalog,
  type RedFlagPattern,
  type RedFlagsTable,
  type RiskPattern,
  type RiskPatternsTable,
} from './schema'

export type {
  Catalog,
  ChecklistCondition,
  ChecklistRule,
  ClassificationRule,
  RawCatalog,
  RedFlagPattern,
  RiskPattern,
  WeightedPattern,
} from './schema'

const PATTERN_FLAGS = 'gi'

/** Field names a checklist item may interpolate */
const TEMPLATE_FIELDS: ReadonlyArray<keyof KeyPointFields> = [
  'amount',
  'percentage',
  'duration',
  'jurisdiction',
  'minimumAge',
]

const PLACEHOLDER = /\{(\w+)\}/g

// ============================================================================
// Validation Helpers
// ============================================================================

function zodIssues(table: string, error: ZodError): ErrorDetail[] {
  return error.issues.map((issue) => ({
    field: [table, ...issue.path].join('.'),
    message: issue.message,
  }))
}

/**
 * Compiles a regex source, recording a problem instead of throwing so that
 * every broken entry is reported at once.
 */
function compilePattern(
  source: string,
  field: string,
  problems: ErrorDetail[]
): RegExp | null {
  let compiled: RegExp
  try {
    compiled = new RegExp(source, PATTERN_FLAGS)
  } catch (error) {
    problems.push({
      field,
      message: `Invalid pattern: ${error instanceof Error ? error.message : String(error)}`,
      code: 'INVALID_PATTERN',
    })
    return null
  }

  // Separate regex for the check; the compiled one must keep lastIndex at 0
  if (new RegExp(source, 'i').test('')) {
    problems.push({
      field,
      message: 'Pattern matches the empty string',
      code: 'EMPTY_MATCH',
    })
    return null
  }
  return compiled
}

function findDuplicates(values: readonly string[]): string[] {
  const seen = new Set<string>()
  const duplicates = new Set<string>()
  for (const value of values) {
    if (seen.has(value)) duplicates.add(value)
    seen.add(value)
  }
  return [...duplicates]
}

function freezeAll<T extends object>(items: T[]): readonly T[] {
  return Object.freeze(items.map((item) => Object.freeze(item)))
}

// ============================================================================
// Table Compilers
// ============================================================================

function compileClassification(
  table: DocumentTypesTable,
  problems: ErrorDetail[]
): ClassificationRule[] {
  const listed = table.types.map((t) => t.type)
  for (const dup of findDuplicates(listed)) {
    problems.push({
      field: 'documentTypes.types',
      message: `Duplicate document type: ${dup}`,
      code: 'DUPLICATE',
    })
  }
  for (const type of DOCUMENT_TYPES) {
    if (!listed.includes(type)) {
      problems.push({
        field: 'documentTypes.types',
        message: `Missing classification rule for: ${type}`,
        code: 'MISSING',
      })
    }
  }

  return table.types.map((entry, i) => ({
    documentType: entry.type,
    summary: entry.summary,
    keywords: freezeAll(
      entry.keywords.flatMap((keyword, j) => {
        const pattern = compilePattern(
          keyword.pattern,
          `documentTypes.types.${i}.keywords.${j}.pattern`,
          problems
        )
        return pattern ? [{ pattern, weight: keyword.weight }] : []
      })
    ),
  }))
}

function compileRiskPatterns(
  table: RiskPatternsTable,
  problems: ErrorDetail[]
): RiskPattern[] {
  for (const dup of findDuplicates(table.patterns.map((p) => p.id))) {
    problems.push({
      field: 'riskPatterns.patterns',
      message: `Duplicate risk pattern id: ${dup}`,
      code: 'DUPLICATE',
    })
  }

  return table.patterns.flatMap((entry, i) => {
    const pattern = compilePattern(
      entry.pattern,
      `riskPatterns.patterns.${i}.pattern`,
      problems
    )
    return pattern ? [{ ...entry, pattern }] : []
  })
}

function compileRedFlags(
  table: RedFlagsTable,
  problems: ErrorDetail[]
): RedFlagPattern[] {
  for (const dup of findDuplicates(table.flags.map((f) => f.category))) {
    problems.push({
      field: 'redFlags.flags',
      message: `Duplicate red flag category: ${dup}`,
      code: 'DUPLICATE',
    })
  }

  return table.flags.flatMap((entry, i) => {
    const pattern = compilePattern(
      entry.pattern,
      `redFlags.flags.${i}.pattern`,
      problems
    )
    return pattern ? [{ ...entry, pattern }] : []
  })
}

function compileChecklist(
  table: ChecklistTable,
  known: { redFlags: Set<string>; riskCategories: Set<string> },
  problems: ErrorDetail[]
): ChecklistRule[] {
  for (const dup of findDuplicates(table.rules.map((r) => r.id))) {
    problems.push({
      field: 'checklist.rules',
      message: `Duplicate checklist rule id: ${dup}`,
      code: 'DUPLICATE',
    })
  }

  if (!table.rules.some((r) => r.baseline)) {
    problems.push({
      field: 'checklist.rules',
      message: 'At least one baseline rule is required',
      code: 'MISSING',
    })
  }

  table.rules.forEach((rule, i) => {
    const field = `checklist.rules.${i}`
    const { when } = rule
    const referencesFinding =
      (when.keyPoints?.length ?? 0) > 0 ||
      (when.redFlags?.length ?? 0) > 0 ||
      (when.riskCategories?.length ?? 0) > 0 ||
      when.redFlagSeverity !== undefined

    if (!rule.baseline && !referencesFinding) {
      problems.push({
        field,
        message: `Rule "${rule.id}" references no finding`,
        code: 'NO_CONDITION',
      })
    }

    for (const category of when.redFlags ?? []) {
      if (!known.redFlags.has(category)) {
        problems.push({
          field: `${field}.when.redFlags`,
          message: `Unknown red flag category: ${category}`,
          code: 'UNKNOWN_REFERENCE',
        })
      }
    }
    for (const category of when.riskCategories ?? []) {
      if (!known.riskCategories.has(category)) {
        problems.push({
          field: `${field}.when.riskCategories`,
          message: `Unknown risk category: ${category}`,
          code: 'UNKNOWN_REFERENCE',
        })
      }
    }
    for (const [, name] of rule.item.matchAll(PLACEHOLDER)) {
      if (!TEMPLATE_FIELDS.some((f) => f === name)) {
        problems.push({
          field: `${field}.item`,
          message: `Unknown placeholder: {${name}}`,
          code: 'UNKNOWN_REFERENCE',
        })
      }
    }
  })

  return table.rules.map((rule) => ({
    id: rule.id,
    item: rule.item,
    baseline: rule.baseline ?? false,
    when: Object.freeze({ ...rule.when }),
  }))
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Validates and compiles the four pattern tables.
 *
 * @throws CatalogError listing every problem found
 */
export function loadCatalog(raw: RawCatalog): Catalog {
  const documentTypes = documentTypesTableSchema.safeParse(raw.documentTypes)
  const riskPatterns = riskPatternsTableSchema.safeParse(raw.riskPatterns)
  const redFlags = redFlagsTableSchema.safeParse(raw.redFlags)
  const checklist = checklistTableSchema.safeParse(raw.checklist)

  if (
    !documentTypes.success ||
    !riskPatterns.success ||
    !redFlags.success ||
    !checklist.success
  ) {
    throw new CatalogError('Pattern catalog failed schema validation', [
      ...(documentTypes.success ? [] : zodIssues('documentTypes', documentTypes.error)),
      ...(riskPatterns.success ? [] : zodIssues('riskPatterns', riskPatterns.error)),
      ...(redFlags.success ? [] : zodIssues('redFlags', redFlags.error)),
      ...(checklist.success ? [] : zodIssues('checklist', checklist.error)),
    ])
  }

  const problems: ErrorDetail[] = []

  const versions = new Set([
    documentTypes.data.version,
    riskPatterns.data.version,
    redFlags.data.version,
    checklist.data.version,
  ])
  if (versions.size > 1) {
    problems.push({
      field: 'version',
      message: `Tables disagree on version: ${[...versions].join(', ')}`,
      code: 'VERSION_MISMATCH',
    })
  }

  const classification = compileClassification(documentTypes.data, problems)
  const compiledRisk = compileRiskPatterns(riskPatterns.data, problems)
  const compiledFlags = compileRedFlags(redFlags.data, problems)
  const compiledChecklist = compileChecklist(
    checklist.data,
    {
      redFlags: new Set(redFlags.data.flags.map((f) => f.category)),
      riskCategories: new Set(riskPatterns.data.patterns.map((p) => p.category)),
    },
    problems
  )

  if (problems.length > 0) {
    throw new CatalogError(
      `Pattern catalog has ${problems.length} problem(s)`,
      problems
    )
  }

  return Object.freeze({
    version: documentTypes.data.version,
    classification: freezeAll(classification),
    fallbackSummary: documentTypes.data.fallback.summary,
    riskPatterns: freezeAll(compiledRisk),
    redFlags: freezeAll(compiledFlags),
    checklist: freezeAll(compiledChecklist),
  })
}

/** The shipped catalog, compiled once at module load */
export const catalog: Catalog = loadCatalog({
  documentTypes: documentTypesData,
  riskPatterns: riskPatternsData,
  redFlags: redFlagsData,
  checklist: checklistData,
})
