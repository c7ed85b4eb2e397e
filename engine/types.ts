import { z } from 'zod'

// ============================================================================
// Document Types
// ============================================================================

/**
 * Recognized document categories, in classification priority order.
 * More specific categories come before the generic ones they overlap with
 * (Mortgage before Loan, Healthcare before Privacy Policy).
 */
export const DOCUMENT_TYPES = [
  'Mortgage Agreement',
  'Loan / Credit Agreement',
  'Insurance Policy',
  'Healthcare / Medical',
  'Investment / Securities',
  'Financial Advisory',
  'Lease / Rental Agreement',
  'Employment Contract',
  'Open Source License',
  'Cloud Services Agreement',
  'SaaS / Software License',
  'Mobile App Terms',
  'Streaming / Media',
  'Telecommunications',
  'Travel & Hospitality',
  'E-Commerce / Shopping',
  'Subscription Service',
  'Privacy Policy',
  'Social Media Platform',
  'Website Terms of Use',
] as const

export const FALLBACK_DOCUMENT_TYPE = 'General Terms & Conditions' as const

export type ClassifiedDocumentType = (typeof DOCUMENT_TYPES)[number]

export type DocumentType =
  | ClassifiedDocumentType
  | typeof FALLBACK_DOCUMENT_TYPE

export const ALL_DOCUMENT_TYPES = [
  ...DOCUMENT_TYPES,
  FALLBACK_DOCUMENT_TYPE,
] as const

export const documentTypeSchema = z.enum(ALL_DOCUMENT_TYPES)

// ============================================================================
// Severity & Risk Levels
// ============================================================================

export const SEVERITIES = ['low', 'medium', 'high'] as const

export type Severity = (typeof SEVERITIES)[number]

export const severitySchema = z.enum(SEVERITIES)

/** Ordering weight: higher sorts first */
export const SEVERITY_RANK: Record<Severity, number> = {
  high: 3,
  medium: 2,
  low: 1,
}

export const RISK_LEVELS = ['low', 'medium', 'high'] as const

export type RiskLevel = (typeof RISK_LEVELS)[number]

export const riskLevelSchema = z.enum(RISK_LEVELS)

// ============================================================================
// Key Point Categories
// ============================================================================

/** Key point categories in report order */
export const KEY_POINT_CATEGORIES = [
  'privacy-data',
  'dispute-resolution',
  'account-termination',
  'auto-renewal',
  'cancellation',
  'refunds',
  'payment-billing',
  'liability',
  'intellectual-property',
  'terms-changes',
  'cookies-tracking',
  'non-compete',
  'health-data',
  'default-consequences',
  'security-deposit',
  'network-roaming',
  'service-level',
  'force-majeure',
  'age-restriction',
  'governing-law',
] as const

export type KeyPointCategory = (typeof KEY_POINT_CATEGORIES)[number]

export const keyPointCategorySchema = z.enum(KEY_POINT_CATEGORIES)

// ============================================================================
// Findings
// ============================================================================

/** A literal span of the analyzed text. `text === input.slice(start, end)` */
export interface Evidence {
  text: string
  start: number
  end: number
}

export const evidenceSchema = z.object({
  text: z.string(),
  start: z.number().int().min(0),
  end: z.number().int().min(0),
})

export const DURATION_UNITS = ['day', 'month', 'year'] as const

export type DurationUnit = (typeof DURATION_UNITS)[number]

export interface Duration {
  value: number
  unit: DurationUnit
}

export interface MoneyAmount {
  value: number
  currency: 'USD' | 'EUR' | 'GBP'
}

/** Structured values pulled out of a key point's evidence */
export interface KeyPointFields {
  amount?: MoneyAmount
  percentage?: number
  duration?: Duration
  jurisdiction?: string
  minimumAge?: number
}

export const keyPointFieldsSchema = z.object({
  amount: z
    .object({
      value: z.number(),
      currency: z.enum(['USD', 'EUR', 'GBP']),
    })
    .optional(),
  percentage: z.number().optional(),
  duration: z
    .object({
      value: z.number(),
      unit: z.enum(DURATION_UNITS),
    })
    .optional(),
  jurisdiction: z.string().optional(),
  minimumAge: z.number().optional(),
})

export interface KeyPoint {
  category: KeyPointCategory
  title: string
  detail: string
  /** True when the clause works against the reader */
  watchOut: boolean
  evidence: Evidence[]
  fields: KeyPointFields
}

export const keyPointSchema = z.object({
  category: keyPointCategorySchema,
  title: z.string(),
  detail: z.string(),
  watchOut: z.boolean(),
  evidence: z.array(evidenceSchema),
  fields: keyPointFieldsSchema,
})

export interface RedFlag {
  category: string
  description: string
  severity: Severity
  evidence: Evidence
}

export const redFlagSchema = z.object({
  category: z.string(),
  description: z.string(),
  severity: severitySchema,
  evidence: evidenceSchema,
})

export interface RiskEvidence {
  patternId: string
  category: string
  description: string
  weight: number
  snippet: string
  offset: number
}

export const riskEvidenceSchema = z.object({
  patternId: z.string(),
  category: z.string(),
  description: z.string(),
  weight: z.number().int().positive(),
  snippet: z.string(),
  offset: z.number().int().min(0),
})

// ============================================================================
// Readability
// ============================================================================

export interface ReadabilityScore {
  /** 0-100, higher is easier */
  fleschEase: number
  /** US school grade */
  fleschGrade: number
  gunningFog: number
  avgSentenceLength: number
  avgWordLength: number
  complexWordPct: number
  gradeLabel: string
  easeLabel: string
}

export const readabilitySchema = z.object({
  fleschEase: z.number(),
  fleschGrade: z.number(),
  gunningFog: z.number(),
  avgSentenceLength: z.number(),
  avgWordLength: z.number(),
  complexWordPct: z.number(),
  gradeLabel: z.string(),
  easeLabel: z.string(),
})

// ============================================================================
// Analysis Result
// ============================================================================

export interface AnalysisResult {
  catalogVersion: string
  documentType: DocumentType
  /** Weighted keyword total that selected the document type */
  classificationScore: number
  summary: string
  /** 0-100 aggressiveness score */
  riskScore: number
  riskLevel: RiskLevel
  riskReason: string
  riskEvidence: RiskEvidence[]
  keyPoints: KeyPoint[]
  redFlags: RedFlag[]
  checklist: string[]
  readability: ReadabilityScore | null
  wordCount: number
  charCount: number
}

/**
 * Validates analysis results handed back by callers, e.g. serialized
 * results submitted for comparison or ranking.
 */
export const analysisResultSchema = z.object({
  catalogVersion: z.string(),
  documentType: documentTypeSchema,
  classificationScore: z.number().min(0),
  summary: z.string(),
  riskScore: z.number().min(0).max(100),
  riskLevel: riskLevelSchema,
  riskReason: z.string(),
  riskEvidence: z.array(riskEvidenceSchema),
  keyPoints: z.array(keyPointSchema),
  redFlags: z.array(redFlagSchema),
  checklist: z.array(z.string()).min(1),
  readability: readabilitySchema.nullable(),
  wordCount: z.number().int().min(0),
  charCount: z.number().int().min(0),
})

// ============================================================================
// Engine Settings
// ============================================================================

/** Tunable constants; calibrated against labeled documents, not fixed facts */
export interface EngineSettings {
  /** Saturation constant K in `100 * (1 - e^(-raw / K))` */
  riskSaturation: number
  /** Best classification total below this falls back to the general type */
  minClassificationScore: number
  /** Maximum risk evidence entries kept in a report */
  maxRiskEvidence: number
  /** Trimmed inputs shorter than this yield the degenerate result */
  minAnalyzableLength: number
}

export const DEFAULT_ENGINE_SETTINGS: Readonly<EngineSettings> = Object.freeze({
  riskSaturation: 60,
  minClassificationScore: 4,
  maxRiskEvidence: 20,
  minAnalyzableLength: 20,
})
