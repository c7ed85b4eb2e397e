/**
 * @fileoverview Schemas for the JSON pattern tables and the compiled catalog types
 *
 * The raw tables under `data/` hold regex sources as strings. They are parsed
 * with these schemas, then compiled by {@link loadCatalog} into the
 * read-only structures the engine stages consume.
 *
 * @module engine/catalog/schema
 */

import { z } from 'zod'
import {
  DOCUMENT_TYPES,
  FALLBACK_DOCUMENT_TYPE,
  keyPointCategorySchema,
  documentTypeSchema,
  severitySchema,
  type ClassifiedDocumentType,
  type DocumentType,
  type KeyPointCategory,
  type Severity,
} from '../types'

// ============================================================================
// Raw Table Schemas
// ============================================================================

const patternSource = z.string().min(1, 'Pattern must not be empty')

const weight = z.number().int().positive()

export const documentTypesTableSchema = z.object({
  version: z.string().min(1),
  fallback: z.object({
    type: z.literal(FALLBACK_DOCUMENT_TYPE),
    summary: z.string().min(1),
  }),
  types: z
    .array(
      z.object({
        type: z.enum(DOCUMENT_TYPES),
        summary: z.string().min(1),
        keywords: z
          .array(z.object({ pattern: patternSource, weight }))
          .min(1),
      })
    )
    .min(1),
})

export const riskPatternsTableSchema = z.object({
  version: z.string().min(1),
  patterns: z.array(
    z.object({
      id: z.string().min(1),
      category: z.string().min(1),
      description: z.string().min(1),
      weight,
      pattern: patternSource,
    })
  ),
})

export const redFlagsTableSchema = z.object({
  version: z.string().min(1),
  flags: z.array(
    z.object({
      category: z.string().min(1),
      description: z.string().min(1),
      severity: severitySchema,
      pattern: patternSource,
    })
  ),
})

export const checklistConditionSchema = z.object({
  keyPoints: z.array(keyPointCategorySchema).optional(),
  /** Key points only count when flagged as working against the reader */
  watchOut: z.boolean().optional(),
  redFlags: z.array(z.string().min(1)).optional(),
  /** Any red flag at or above this severity */
  redFlagSeverity: severitySchema.optional(),
  riskCategories: z.array(z.string().min(1)).optional(),
  /** Restricts the rule to these document types */
  documentTypes: z.array(documentTypeSchema).optional(),
})

export const checklistTableSchema = z.object({
  version: z.string().min(1),
  rules: z.array(
    z.object({
      id: z.string().min(1),
      item: z.string().min(1),
      baseline: z.boolean().optional(),
      when: checklistConditionSchema,
    })
  ),
})

export type DocumentTypesTable = z.infer<typeof documentTypesTableSchema>
export type RiskPatternsTable = z.infer<typeof riskPatternsTableSchema>
export type RedFlagsTable = z.infer<typeof redFlagsTableSchema>
export type ChecklistTable = z.infer<typeof checklistTableSchema>

/** The four tables as read from disk, before validation */
export interface RawCatalog {
  documentTypes: unknown
  riskPatterns: unknown
  redFlags: unknown
  checklist: unknown
}

// ============================================================================
// Compiled Catalog
// ============================================================================

export interface WeightedPattern {
  pattern: RegExp
  weight: number
}

export interface ClassificationRule {
  documentType: ClassifiedDocumentType
  summary: string
  keywords: readonly WeightedPattern[]
}

export interface RiskPattern {
  id: string
  category: string
  description: string
  weight: number
  pattern: RegExp
}

export interface RedFlagPattern {
  category: string
  description: string
  severity: Severity
  pattern: RegExp
}

export interface ChecklistCondition {
  keyPoints?: readonly KeyPointCategory[]
  watchOut?: boolean
  redFlags?: readonly string[]
  redFlagSeverity?: Severity
  riskCategories?: readonly string[]
  documentTypes?: readonly DocumentType[]
}

export interface ChecklistRule {
  id: string
  /** May reference key point fields as `{jurisdiction}` */
  item: string
  baseline: boolean
  when: ChecklistCondition
}

export interface Catalog {
  version: string
  /** Classification rules in tie-break priority order */
  classification: readonly ClassificationRule[]
  fallbackSummary: string
  riskPatterns: readonly RiskPattern[]
  redFlags: readonly RedFlagPattern[]
  checklist: readonly ChecklistRule[]
}
