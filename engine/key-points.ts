/**
 * @fileoverview Key Point Extractor
 *
 * Detectors are pure functions `(text, documentType) => KeyPoint | null`,
 * registered per document type on top of a universal set that runs for
 * every document. Each detector emits at most one key point whose evidence
 * is built from the sentences around its trigger matches.
 *
 * Structured values (amounts, percentages, durations, jurisdiction,
 * minimum age) are read from the evidence windows only, never from the
 * document at large.
 *
 * @module engine/key-points
 */

import { findAll, firstMatch, hasMatch, sentenceAround } from './text'
import {
  FALLBACK_DOCUMENT_TYPE,
  KEY_POINT_CATEGORIES,
  type DocumentType,
  type DurationUnit,
  type Evidence,
  type KeyPoint,
  type KeyPointCategory,
  type KeyPointFields,
  type MoneyAmount,
} from './types'

// ============================================================================
// Types
// ============================================================================

export type KeyPointDetector = (
  text: string,
  documentType: DocumentType
) => KeyPoint | null

export type FieldName = keyof KeyPointFields

export interface DetectorContext {
  documentType: DocumentType
  /** Values read from this key point's evidence windows */
  fields: KeyPointFields
  /** Whether any pattern matches anywhere in the document */
  has: (...patterns: RegExp[]) => boolean
}

export interface Assessment {
  detail: string
  watchOut: boolean
}

export interface DetectorDefinition {
  category: KeyPointCategory
  title: string
  /** The detector fires when any of these match */
  triggers: RegExp[]
  /** Patterns used to locate evidence. Defaults to `triggers` */
  evidence?: RegExp[]
  fields?: FieldName[]
  assess: (ctx: DetectorContext) => Assessment
}

/** Evidence windows kept per key point */
export const MAX_EVIDENCE_PER_KEY_POINT = 3

// ============================================================================
// Field Extraction
// ============================================================================

const CURRENCY_SYMBOLS: Record<string, MoneyAmount['currency']> = {
  $: 'USD',
  '€': 'EUR',
  '£': 'GBP',
}

const AMOUNT = /([$€£])\s?(\d{1,3}(?:,\d{3})+|\d+)(\.\d{1,2})?/g
const PERCENTAGE = /(\d{1,3}(?:\.\d+)?)\s?%/g
const DURATION = /(?:\((\d{1,3})\)|\b(\d{1,3}))[\s-]*(day|month|year)s?\b/gi
// Case-sensitive: the capture relies on the capitalized place name
const JURISDICTION =
  /\b[Ll]aws?\s+of\s+(?:the\s+)?(?:(?:State|Commonwealth|Province)\s+of\s+)?([A-Z][a-z]+(?:\s+[A-Z][a-z]+)?)/g
const MINIMUM_AGE =
  /\b(\d{1,2})\s*(?:\+\s*)?years?\s+(?:of\s+age|old)\b|\bmust\s+be\s+(?:at\s+least\s+)?(\d{1,2})\b/gi

function isDurationUnit(unit: string): unit is DurationUnit {
  return unit === 'day' || unit === 'month' || unit === 'year'
}

const FIELD_READERS: {
  [K in FieldName]: (window: string) => KeyPointFields[K] | undefined
} = {
  amount: (window) => {
    const m = firstMatch(window, AMOUNT)
    if (!m) return undefined
    const [symbol, whole, cents] = m.groups
    const currency = symbol === undefined ? undefined : CURRENCY_SYMBOLS[symbol]
    if (!currency || whole === undefined) return undefined
    return { value: Number(whole.replace(/,/g, '') + (cents ?? '')), currency }
  },
  percentage: (window) => {
    const m = firstMatch(window, PERCENTAGE)
    return m?.groups[0] === undefined ? undefined : Number(m.groups[0])
  },
  duration: (window) => {
    const m = firstMatch(window, DURATION)
    if (!m) return undefined
    const [parenthesized, plain, unit] = m.groups
    const value = parenthesized ?? plain
    const normalized = unit?.toLowerCase()
    if (value === undefined || normalized === undefined || !isDurationUnit(normalized)) {
      return undefined
    }
    return { value: Number(value), unit: normalized }
  },
  jurisdiction: (window) => firstMatch(window, JURISDICTION)?.groups[0],
  minimumAge: (window) => {
    const m = firstMatch(window, MINIMUM_AGE)
    const age = m?.groups[0] ?? m?.groups[1]
    return age === undefined ? undefined : Number(age)
  },
}

function readField<K extends FieldName>(
  name: K,
  windows: Evidence[]
): KeyPointFields[K] | undefined {
  for (const window of windows) {
    const value = FIELD_READERS[name](window.text)
    if (value !== undefined) return value
  }
  return undefined
}

export function extractFields(
  windows: Evidence[],
  names: readonly FieldName[]
): KeyPointFields {
  const fields: KeyPointFields = {}
  for (const name of names) {
    switch (name) {
      case 'amount':
        fields.amount = readField('amount', windows)
        break
      case 'percentage':
        fields.percentage = readField('percentage', windows)
        break
      case 'duration':
        fields.duration = readField('duration', windows)
        break
      case 'jurisdiction':
        fields.jurisdiction = readField('jurisdiction', windows)
        break
      case 'minimumAge':
        fields.minimumAge = readField('minimumAge', windows)
        break
    }
  }
  // Drop unset keys so results compare cleanly
  for (const name of names) {
    if (fields[name] === undefined) delete fields[name]
  }
  return fields
}

// ============================================================================
// Evidence
// ============================================================================

/**
 * Sentence windows around every match of `patterns`, in document order,
 * deduplicated by span and capped at {@link MAX_EVIDENCE_PER_KEY_POINT}.
 */
export function collectEvidence(text: string, patterns: readonly RegExp[]): Evidence[] {
  const matches = patterns
    .flatMap((p) => findAll(text, p))
    .sort((a, b) => a.start - b.start || a.end - b.end)

  const windows: Evidence[] = []
  const seen = new Set<string>()
  for (const match of matches) {
    const window = sentenceAround(text, match.start, match.end)
    const key = `${window.start}:${window.end}`
    if (seen.has(key)) continue
    seen.add(key)
    windows.push(window)
    if (windows.length >= MAX_EVIDENCE_PER_KEY_POINT) break
  }
  return windows
}

// ============================================================================
// Detector Factory
// ============================================================================

export function defineDetector(definition: DetectorDefinition): KeyPointDetector {
  const evidencePatterns = definition.evidence ?? definition.triggers
  const fieldNames = definition.fields ?? []

  return (text, documentType) => {
    if (!hasMatch(text, ...definition.triggers)) return null

    const evidence = collectEvidence(text, evidencePatterns)
    const fields = extractFields(evidence, fieldNames)
    const { detail, watchOut } = definition.assess({
      documentType,
      fields,
      has: (...patterns) => hasMatch(text, ...patterns),
    })

    return {
      category: definition.category,
      title: definition.title,
      detail,
      watchOut,
      evidence,
      fields,
    }
  }
}

// ============================================================================
// Detectors
// ============================================================================

const BINDING_ARBITRATION =
  /\b(?:binding|mandatory)\s+(?:individual\s+)?arbitration\b|\barbitration\s+(?:is|shall\s+be)\s+(?:mandatory|binding|final)\b/gi
const CLASS_ACTION_WAIVER =
  /\bclass\s+action\b[^.!?]{0,40}\bwaive\w*|\bwaive\w*\b[^.!?]{0,40}\bclass\s+action/gi
const NO_REFUNDS = /\bno\s+refunds?\b|\bnon-?refundable\b|\ball\s+sales\s+(?:are\s+)?final\b/gi
const WITHOUT_NOTICE = /\bwithout\s+(?:prior\s+|any\s+|advance\s+)?notice\b/gi

export const paymentBilling = defineDetector({
  category: 'payment-billing',
  title: 'Payment Terms',
  triggers: [/\bpayments?\b/gi, /\bbilling\b/gi, /\bcharges?\b/gi, /\bfees?\b/gi, /\bprices?\b/gi],
  evidence: [/\bpayments?\b/gi, /\bbilling\b/gi, /\bcharges?\b/gi, /\bfees?\b/gi],
  fields: ['amount'],
  assess: ({ has }) => {
    if (has(/\bautomatic\w*\s+(?:charg|bill|renew)\w*/gi)) {
      return { detail: 'Payments may be charged automatically.', watchOut: true }
    }
    if (
      has(
        /\bprices?\b[^.!?]{0,60}\bchang\w*/gi,
        /\badjust\w*[^.!?]{0,40}\bprices?\b/gi,
        /\bmodif\w*[^.!?]{0,40}\bfees?\b/gi
      )
    ) {
      return { detail: 'Prices can change. Check how much notice you get.', watchOut: true }
    }
    if (has(/\blate\b[^.!?]{0,30}\bfees?\b/gi, /\bpenalt\w*[^.!?]{0,40}\bpayments?\b/gi)) {
      return { detail: 'Late payment fees or penalties may apply.', watchOut: true }
    }
    return { detail: 'The document includes payment or billing terms.', watchOut: false }
  },
})

export const autoRenewal = defineDetector({
  category: 'auto-renewal',
  title: 'Automatic Renewal',
  triggers: [
    /\bauto(?:matic(?:ally)?)?[\s-]?renew\w*/gi,
    /\brenew\w*[^.!?]{0,30}\bsubscriptions?\b/gi,
  ],
  fields: ['duration'],
  assess: () => ({
    detail:
      'Your subscription may renew automatically. Check how far in advance you must cancel.',
    watchOut: true,
  }),
})

export const cancellation = defineDetector({
  category: 'cancellation',
  title: 'Cancellation Policy',
  triggers: [/\bcancel\w*/gi, /\bterminat\w*/gi, /\bend\w*[^.!?]{0,20}\bsubscriptions?\b/gi],
  evidence: [/\bcancel\w*/gi, /\bterminat\w*/gi],
  fields: ['duration'],
  assess: ({ has }) => {
    if (has(NO_REFUNDS)) {
      return { detail: 'Cancelling may not get you a refund.', watchOut: true }
    }
    if (has(/\bcancel\w*[^.!?]{0,40}\bany\s*time\b/gi)) {
      return {
        detail: 'You can cancel at any time. Check whether unused periods are refunded.',
        watchOut: false,
      }
    }
    if (has(/\bnotice\b[^.!?]{0,60}\bcancel\w*/gi, /\bcancel\w*[^.!?]{0,60}\bnotice\b/gi)) {
      return {
        detail: 'Cancellation may only take effect after a notice period.',
        watchOut: true,
      }
    }
    return { detail: 'The document defines how the agreement can be cancelled.', watchOut: false }
  },
})

export const refunds = defineDetector({
  category: 'refunds',
  title: 'Refund Policy',
  triggers: [/\brefund\w*/gi, /\bmoney[\s-]back\b/gi, /\bchargebacks?\b/gi],
  evidence: [/\brefund\w*/gi, /\bmoney[\s-]back\b/gi],
  fields: ['duration'],
  assess: ({ has, fields }) => {
    if (has(NO_REFUNDS)) {
      return { detail: 'No refunds are available. All purchases are final.', watchOut: true }
    }
    if (fields.duration?.unit === 'day') {
      return {
        detail: `A ${fields.duration.value}-day refund window is offered. Check the conditions.`,
        watchOut: false,
      }
    }
    return { detail: 'Refund terms are addressed.', watchOut: false }
  },
})

export const privacyData = defineDetector({
  category: 'privacy-data',
  title: 'Data & Privacy',
  triggers: [
    /\bpersonal\s+(?:data|information)\b/gi,
    /\bprivacy\b/gi,
    /\bcollect\w*[^.!?]{0,40}\bdata\b/gi,
  ],
  evidence: [
    /\bpersonal\s+(?:data|information)\b/gi,
    /\bcollect\w*[^.!?]{0,40}\bdata\b/gi,
    /\bshar\w*[^.!?]{0,40}\bdata\b/gi,
  ],
  assess: ({ has }) => {
    if (has(/\bsells?\b[^.!?]{0,60}\bdata\b/gi, /\bthird[\s-]part\w*[^.!?]{0,40}\bsell\w*/gi)) {
      return { detail: 'Your personal data may be sold to third parties.', watchOut: true }
    }
    if (
      has(
        /\bshar\w*[^.!?]{0,60}\bthird[\s-]part\w*/gi,
        /\bthird[\s-]part\w*[^.!?]{0,40}\bshar\w*/gi
      )
    ) {
      return {
        detail: 'Your data may be shared with third parties. Check which ones and why.',
        watchOut: true,
      }
    }
    if (has(/\bgdpr\b/gi, /\bccpa\b/gi)) {
      return { detail: 'GDPR or CCPA data handling is referenced.', watchOut: false }
    }
    return {
      detail: 'The document describes how your personal data is handled.',
      watchOut: false,
    }
  },
})

export const cookiesTracking = defineDetector({
  category: 'cookies-tracking',
  title: 'Cookies & Tracking',
  triggers: [/\bcookies?\b/gi, /\btracking\b/gi, /\bweb\s+beacons?\b/gi, /\bpixels?\b/gi],
  evidence: [/\bcookies?\b/gi, /\btracking\b/gi, /\bweb\s+beacons?\b/gi],
  assess: ({ has }) =>
    has(
      /\bthird[\s-]part\w*[^.!?]{0,40}\bcookies?\b/gi,
      /\badvertis\w*[^.!?]{0,40}\bcookies?\b/gi
    )
      ? {
          detail: 'Third-party and advertising cookies may be placed on your device.',
          watchOut: true,
        }
      : { detail: 'Cookies and tracking technologies are used.', watchOut: false },
})

export const liability = defineDetector({
  category: 'liability',
  title: 'Liability & Indemnification',
  triggers: [/\bliabilit\w*/gi, /\bliable\b/gi, /\bindemnif\w*/gi],
  evidence: [/\bliabilit\w*/gi, /\bindemnif\w*/gi],
  fields: ['amount'],
  assess: ({ has }) => {
    let assessment: Assessment
    if (has(/\bunlimited\s+liability\b/gi)) {
      assessment = {
        detail: 'You may be exposed to unlimited financial liability.',
        watchOut: true,
      }
    } else if (has(/\blimitation\s+of\s+liability\b/gi, /\bnot\s+(?:be\s+)?liable\b/gi)) {
      assessment = {
        detail:
          'The provider limits its own liability, so your recourse for damages may be limited.',
        watchOut: true,
      }
    } else {
      assessment = { detail: 'The document includes liability clauses.', watchOut: false }
    }

    if (has(/\bindemnif\w*/gi)) {
      return {
        detail: `${assessment.detail} You may have to indemnify the provider against third-party claims.`,
        watchOut: true,
      }
    }
    return assessment
  },
})

export const disputeResolution = defineDetector({
  category: 'dispute-resolution',
  title: 'Disputes & Arbitration',
  triggers: [
    /\barbitrat\w*/gi,
    /\bclass\s+action\b/gi,
    /\bdispute\s+resolution\b/gi,
    /\bjurisdiction\b/gi,
  ],
  evidence: [/\barbitrat\w*/gi, /\bclass\s+action\b/gi, /\bdisputes?\b/gi],
  assess: ({ has }) => {
    let assessment: Assessment = {
      detail: 'The document sets out how disputes are resolved.',
      watchOut: false,
    }
    if (has(BINDING_ARBITRATION)) {
      assessment = {
        detail: 'Disputes must go to binding arbitration instead of court.',
        watchOut: true,
      }
    }
    if (has(CLASS_ACTION_WAIVER)) {
      assessment = {
        detail: `${assessment.detail} Class action lawsuits are waived.`,
        watchOut: true,
      }
    }
    return assessment
  },
})

export const intellectualProperty = defineDetector({
  category: 'intellectual-property',
  title: 'Content & IP Rights',
  triggers: [
    /\bintellectual\s+property\b/gi,
    /\bcopyrights?\b/gi,
    /\btrademarks?\b/gi,
    /\bcontent\b[^.!?]{0,40}\blicen[cs]e\w*/gi,
    /\buser[\s-]generated\b/gi,
  ],
  evidence: [
    /\bintellectual\s+property\b/gi,
    /\bcopyrights?\b/gi,
    /\blicen[cs]e\w*[^.!?]{0,40}\bcontent\b/gi,
  ],
  assess: ({ has }) =>
    has(
      /\bgrant\w*[^.!?]{0,60}\blicen[cs]e\b[^.!?]{0,60}\bcontent\b/gi,
      /\broyalty[\s-]free\b/gi,
      /\bperpetual\b[^.!?]{0,60}\blicen[cs]e\b/gi
    )
      ? { detail: 'You grant the provider a broad license to use your content.', watchOut: true }
      : { detail: 'The document addresses who owns intellectual property.', watchOut: false },
})

export const accountTermination = defineDetector({
  category: 'account-termination',
  title: 'Account Suspension / Termination',
  triggers: [
    /\bterminat\w*[^.!?]{0,40}\baccounts?\b/gi,
    /\bsuspen\w*[^.!?]{0,40}\baccounts?\b/gi,
    /\bsole\s+discretion\b/gi,
  ],
  assess: ({ has }) =>
    has(WITHOUT_NOTICE) && has(/\bterminat\w*/gi)
      ? {
          detail:
            "Your account may be terminated at the provider's discretion without prior notice.",
          watchOut: true,
        }
      : {
          detail: 'The provider can suspend or terminate accounts under defined conditions.',
          watchOut: false,
        },
})

export const termsChanges = defineDetector({
  category: 'terms-changes',
  title: 'Right to Modify Terms',
  triggers: [
    /\bmodif\w*[^.!?]{0,40}\bterms\b/gi,
    /\bchang\w*[^.!?]{0,40}\bterms\b/gi,
    /\bamend\w*[^.!?]{0,40}\bagreement\b/gi,
    /\bupdat\w*[^.!?]{0,40}\bterms\b/gi,
  ],
  assess: ({ has }) =>
    has(/\bwithout\b[^.!?]{0,20}\bnotice\b/gi, /\bat\s+any\s+time\b[^.!?]{0,40}\bmodif\w*/gi)
      ? {
          detail:
            'The terms can change at any time without notice, and continued use counts as acceptance.',
          watchOut: true,
        }
      : { detail: 'The provider can update these terms over time.', watchOut: false },
})

export const governingLaw = defineDetector({
  category: 'governing-law',
  title: 'Applicable Law & Jurisdiction',
  triggers: [/\bgoverning\s+law\b/gi, /\bjurisdiction\b/gi, /\blaws\s+of\s+the\s+state\b/gi],
  evidence: [
    /\bgoverning\s+law\b/gi,
    /\bgoverned\s+by\b/gi,
    /\bjurisdiction\b/gi,
    /\blaws?\s+of\b/gi,
  ],
  fields: ['jurisdiction'],
  assess: ({ fields }) => ({
    detail: `This agreement is governed by the laws of ${fields.jurisdiction ?? 'a specific jurisdiction'}. Disputes may need to be resolved there.`,
    watchOut: false,
  }),
})

export const nonCompete = defineDetector({
  category: 'non-compete',
  title: 'Non-Compete Clause',
  triggers: [/\bnon[\s-]?compet\w*/gi, /\bnon[\s-]?solicit\w*/gi, /\brestraint\s+of\s+trade\b/gi],
  fields: ['duration'],
  assess: ({ fields }) => {
    const detail =
      'A non-compete or non-solicitation clause may restrict you from working for competitors.'
    const period = fields.duration
    if (period && period.unit !== 'day') {
      return {
        detail: `${detail} The restriction appears to last ${period.value} ${period.unit}${period.value === 1 ? '' : 's'}.`,
        watchOut: true,
      }
    }
    return { detail, watchOut: true }
  },
})

export const defaultConsequences = defineDetector({
  category: 'default-consequences',
  title: 'Default Provisions',
  triggers: [/\bdefaults?\b/gi, /\baccelerat\w*/gi, /\bforeclos\w*/gi, /\brepossess\w*/gi],
  fields: ['amount', 'percentage'],
  assess: () => ({
    detail:
      'Missing payments can have serious consequences, such as immediate repayment of the full balance or loss of the property.',
    watchOut: true,
  }),
})

export const healthData = defineDetector({
  category: 'health-data',
  title: 'Health & Medical Data',
  triggers: [
    /\bhipaa\b/gi,
    /\bhealth\b[^.!?]{0,30}\b(?:data|information)\b/gi,
    /\bmedical\s+records?\b/gi,
    /\bprotected\s+health\b/gi,
    /\bphi\b/gi,
  ],
  evidence: [
    /\bhipaa\b/gi,
    /\bhealth\b[^.!?]{0,30}\b(?:data|information)\b/gi,
    /\bmedical\s+records?\b/gi,
  ],
  assess: ({ has }) =>
    has(/\b(?:shar\w*|disclos\w*)\b[^.!?]{0,40}\bhealth\b/gi)
      ? {
          detail: 'Your health data may be shared with third parties. Check the scope and purpose.',
          watchOut: true,
        }
      : {
          detail: 'Health data is involved. HIPAA or equivalent protections may apply.',
          watchOut: false,
        },
})

export const networkRoaming = defineDetector({
  category: 'network-roaming',
  title: 'Data Limits & Roaming',
  triggers: [
    /\broaming\b/gi,
    /\bdata\s+caps?\b/gi,
    /\bfair\s+use\b/gi,
    /\bthrottl\w*/gi,
    /\bnetwork\s+management\b/gi,
  ],
  evidence: [/\broaming\b/gi, /\bthrottl\w*/gi, /\bdata\s+caps?\b/gi],
  assess: ({ has }) => {
    let assessment: Assessment = {
      detail: 'The document sets network usage policies.',
      watchOut: false,
    }
    if (has(/\bthrottl\w*/gi, /\bspeeds?\b[^.!?]{0,30}\breduc\w*/gi)) {
      assessment = {
        detail: 'Your data speed may be reduced after you pass a usage threshold.',
        watchOut: true,
      }
    }
    if (has(/\broaming\b/gi)) {
      assessment = {
        detail: `${assessment.detail} Roaming charges may apply outside your home network.`,
        watchOut: true,
      }
    }
    return assessment
  },
})

export const securityDeposit = defineDetector({
  category: 'security-deposit',
  title: 'Security Deposit',
  triggers: [/\bsecurity\s+deposits?\b/gi, /\bbond\b/gi, /\bdamage\s+deposits?\b/gi],
  evidence: [/\bsecurity\s+deposits?\b/gi, /\bdamage\s+deposits?\b/gi, /\bbond\b/gi],
  fields: ['amount'],
  assess: () => ({
    detail: 'A security deposit is required. Check when it can be withheld or deducted.',
    watchOut: true,
  }),
})

export const forceMajeure = defineDetector({
  category: 'force-majeure',
  title: 'Force Majeure',
  triggers: [
    /\bforce\s+majeure\b/gi,
    /\bacts?\s+of\s+god\b/gi,
    /\bbeyond\b[^.!?]{0,30}\bcontrol\b/gi,
    /\bunforeseeable\b/gi,
  ],
  assess: () => ({
    detail:
      "A force majeure clause suspends the provider's obligations during extraordinary events such as natural disasters.",
    watchOut: false,
  }),
})

export const serviceLevel = defineDetector({
  category: 'service-level',
  title: 'Uptime & SLA Guarantee',
  triggers: [
    /\bsla\b/gi,
    /\bservice\s+levels?\b/gi,
    /\buptime\b/gi,
    /\bavailability\b[^.!?]{0,30}%/gi,
    /\bdowntime\b/gi,
  ],
  evidence: [/\buptime\b/gi, /\bservice\s+levels?\b/gi, /\bdowntime\b/gi, /\bsla\b/gi],
  fields: ['percentage'],
  assess: ({ has, fields }) => {
    const commitment =
      fields.percentage === undefined
        ? 'The provider commits to a defined level of uptime.'
        : `The provider commits to ${fields.percentage}% uptime.`
    if (
      has(
        /\bno\s+credits?\b/gi,
        /\bsole\s+(?:and\s+exclusive\s+)?remedy\b[^.!?]{0,60}\bcredits?\b/gi,
        /\bnot\s+liable\b[^.!?]{0,60}\bdowntime\b/gi
      )
    ) {
      return {
        detail: `${commitment} Compensation for downtime may be limited to service credits.`,
        watchOut: true,
      }
    }
    return { detail: commitment, watchOut: false }
  },
})

export const ageRestriction = defineDetector({
  category: 'age-restriction',
  title: 'Age Requirement',
  triggers: [
    /\b\d{1,2}\s*years?\s+(?:of\s+age|old)\b/gi,
    /\bmust\s+be\s+(?:at\s+least\s+)?\d{1,2}\b/gi,
    /\bage\b[^.!?]{0,30}\brequirements?\b/gi,
    /\bminors?\b/gi,
  ],
  fields: ['minimumAge'],
  assess: ({ fields }) => ({
    detail:
      fields.minimumAge === undefined
        ? 'The service sets a minimum age. Minors may need parental consent.'
        : `Users must be at least ${fields.minimumAge} years old. Minors may need parental consent.`,
    watchOut: false,
  }),
})

// ============================================================================
// Registry
// ============================================================================

export type RegistryKey = DocumentType | 'universal'

const GENERIC_DETECTORS = [autoRenewal, refunds, cookiesTracking, intellectualProperty]

/**
 * Detectors per document type. `universal` runs for every document,
 * the fallback type gets a generic consumer set.
 */
export const DETECTOR_REGISTRY: Readonly<Record<RegistryKey, readonly KeyPointDetector[]>> =
  Object.freeze({
    universal: [
      paymentBilling,
      cancellation,
      privacyData,
      liability,
      disputeResolution,
      accountTermination,
      termsChanges,
      governingLaw,
      forceMajeure,
    ],
    'Mortgage Agreement': [defaultConsequences, securityDeposit],
    'Loan / Credit Agreement': [defaultConsequences],
    'Insurance Policy': [autoRenewal, refunds, healthData],
    'Healthcare / Medical': [healthData, refunds],
    'Investment / Securities': [defaultConsequences, refunds],
    'Financial Advisory': [autoRenewal, refunds],
    'Lease / Rental Agreement': [securityDeposit, autoRenewal, defaultConsequences],
    'Employment Contract': [nonCompete, intellectualProperty],
    'Open Source License': [intellectualProperty],
    'Cloud Services Agreement': [serviceLevel, autoRenewal, refunds, intellectualProperty],
    'SaaS / Software License': [serviceLevel, autoRenewal, refunds, intellectualProperty],
    'Mobile App Terms': [cookiesTracking, ageRestriction, refunds, intellectualProperty],
    'Streaming / Media': [autoRenewal, refunds, ageRestriction, intellectualProperty],
    Telecommunications: [networkRoaming, autoRenewal, serviceLevel],
    'Travel & Hospitality': [refunds, securityDeposit],
    'E-Commerce / Shopping': [refunds, cookiesTracking],
    'Subscription Service': [autoRenewal, refunds],
    'Privacy Policy': [cookiesTracking, healthData, ageRestriction],
    'Social Media Platform': [intellectualProperty, cookiesTracking, ageRestriction],
    'Website Terms of Use': [intellectualProperty, cookiesTracking, ageRestriction],
    [FALLBACK_DOCUMENT_TYPE]: GENERIC_DETECTORS,
  })

export function detectorsFor(documentType: DocumentType): readonly KeyPointDetector[] {
  return [...DETECTOR_REGISTRY.universal, ...DETECTOR_REGISTRY[documentType]]
}

const CATEGORY_ORDER = new Map<KeyPointCategory, number>(
  KEY_POINT_CATEGORIES.map((category, i) => [category, i])
)

/**
 * Runs the universal and type-specific detectors.
 * At most one key point per category, in {@link KEY_POINT_CATEGORIES} order.
 */
export function extractKeyPoints(text: string, documentType: DocumentType): KeyPoint[] {
  const byCategory = new Map<KeyPointCategory, KeyPoint>()
  for (const detect of detectorsFor(documentType)) {
    const point = detect(text, documentType)
    if (point && !byCategory.has(point.category)) byCategory.set(point.category, point)
  }
  return [...byCategory.values()].sort(
    (a, b) => (CATEGORY_ORDER.get(a.category) ?? 0) - (CATEGORY_ORDER.get(b.category) ?? 0)
  )
}
