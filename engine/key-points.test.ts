import { describe, it, expect } from 'vitest'
import {
  DETECTOR_REGISTRY,
  MAX_EVIDENCE_PER_KEY_POINT,
  ageRestriction,
  collectEvidence,
  defineDetector,
  detectorsFor,
  extractFields,
  extractKeyPoints,
  serviceLevel,
} from './key-points'
import { FALLBACK_DOCUMENT_TYPE } from './types'
import {
  GOVERNING_LAW_CLAUSE,
  INSURANCE_CLAUSE,
  SAMPLE_CLOUD_TERMS,
  SAMPLE_EMPLOYMENT_CONTRACT,
  SAMPLE_LEASE,
  SAMPLE_PLAIN_TERMS,
} from './testing/fixtures'

describe('extractKeyPoints', () => {
  it('finds the arbitration clause in the insurance scenario', () => {
    const points = extractKeyPoints(INSURANCE_CLAUSE, 'Insurance Policy')

    expect(points).toEqual([
      {
        category: 'dispute-resolution',
        title: 'Disputes & Arbitration',
        detail: 'Disputes must go to binding arbitration instead of court.',
        watchOut: true,
        evidence: [
          {
            text: 'Arbitration is mandatory and you waive your right to a jury trial.',
            start: 104,
            end: 170,
          },
        ],
        fields: {},
      },
    ])
  })

  it('orders key points by category priority', () => {
    const points = extractKeyPoints(SAMPLE_CLOUD_TERMS, 'Cloud Services Agreement')

    expect(points.map((p) => p.category)).toEqual([
      'privacy-data',
      'account-termination',
      'auto-renewal',
      'cancellation',
      'refunds',
      'payment-billing',
      'service-level',
      'governing-law',
    ])
  })

  it('assesses each clause of the cloud terms', () => {
    const points = extractKeyPoints(SAMPLE_CLOUD_TERMS, 'Cloud Services Agreement')
    const byCategory = new Map(points.map((p) => [p.category, p]))

    expect(byCategory.get('privacy-data')).toMatchObject({
      detail: 'Your data may be shared with third parties. Check which ones and why.',
      watchOut: true,
    })
    expect(byCategory.get('account-termination')).toMatchObject({
      detail: 'The provider can suspend or terminate accounts under defined conditions.',
      watchOut: false,
      evidence: [
        { text: 'We may suspend your account at our sole discretion.', start: 504, end: 555 },
      ],
    })
    expect(byCategory.get('cancellation')).toMatchObject({
      detail: 'Cancelling may not get you a refund.',
      watchOut: true,
      fields: { duration: { value: 30, unit: 'day' } },
    })
    expect(byCategory.get('refunds')?.detail).toBe(
      'No refunds are available. All purchases are final.'
    )
    expect(byCategory.get('payment-billing')?.detail).toBe('Payments may be charged automatically.')
    expect(byCategory.get('payment-billing')?.evidence.map((e) => e.start)).toEqual([123, 251])
    expect(byCategory.get('governing-law')).toMatchObject({
      detail:
        'This agreement is governed by the laws of Delaware. Disputes may need to be resolved there.',
      fields: { jurisdiction: 'Delaware' },
    })
  })

  it('runs type-specific detectors only for their type', () => {
    const asEmployment = extractKeyPoints(SAMPLE_EMPLOYMENT_CONTRACT, 'Employment Contract')
    const asFallback = extractKeyPoints(SAMPLE_EMPLOYMENT_CONTRACT, FALLBACK_DOCUMENT_TYPE)

    expect(asEmployment.map((p) => p.category)).toEqual([
      'cancellation',
      'intellectual-property',
      'non-compete',
      'governing-law',
    ])
    expect(asFallback.map((p) => p.category)).toEqual([
      'cancellation',
      'intellectual-property',
      'governing-law',
    ])
  })

  it('reads the non-compete period from its evidence', () => {
    const nonCompete = extractKeyPoints(SAMPLE_EMPLOYMENT_CONTRACT, 'Employment Contract').find(
      (p) => p.category === 'non-compete'
    )

    expect(nonCompete).toMatchObject({
      detail:
        'A non-compete or non-solicitation clause may restrict you from working for competitors. The restriction appears to last 2 years.',
      watchOut: true,
      fields: { duration: { value: 2, unit: 'year' } },
    })
  })

  it('reads the deposit amount', () => {
    const [deposit] = extractKeyPoints(SAMPLE_LEASE, 'Lease / Rental Agreement')

    expect(deposit.category).toBe('security-deposit')
    expect(deposit.fields).toEqual({ amount: { value: 1500, currency: 'USD' } })
    expect(deposit.evidence).toHaveLength(2)
  })

  it('returns nothing for text without clauses', () => {
    expect(extractKeyPoints(SAMPLE_PLAIN_TERMS, FALLBACK_DOCUMENT_TYPE)).toEqual([])
    expect(extractKeyPoints('', FALLBACK_DOCUMENT_TYPE)).toEqual([])
  })

  it('keeps evidence as literal spans of the input', () => {
    for (const point of extractKeyPoints(SAMPLE_CLOUD_TERMS, 'Cloud Services Agreement')) {
      for (const e of point.evidence) {
        expect(SAMPLE_CLOUD_TERMS.slice(e.start, e.end)).toBe(e.text)
      }
    }
  })
})

describe('detectors', () => {
  it('reads the uptime commitment and credit-only remedy', () => {
    expect(serviceLevel(SAMPLE_CLOUD_TERMS, 'Cloud Services Agreement')).toMatchObject({
      detail:
        'The provider commits to 99.9% uptime. Compensation for downtime may be limited to service credits.',
      watchOut: true,
      fields: { percentage: 99.9 },
    })
  })

  it('reads the minimum age', () => {
    const point = ageRestriction(
      'You must be at least 13 years old to use the app.',
      'Mobile App Terms'
    )

    expect(point?.fields).toEqual({ minimumAge: 13 })
    expect(point?.detail).toBe(
      'Users must be at least 13 years old. Minors may need parental consent.'
    )
  })

  it('builds detectors that stay silent without a trigger', () => {
    const detector = defineDetector({
      category: 'refunds',
      title: 'Refunds',
      triggers: [/\brefund\b/gi],
      assess: ({ documentType }) => ({ detail: documentType, watchOut: false }),
    })

    expect(detector('No mention here.', 'Subscription Service')).toBeNull()
    expect(detector('Ask for a refund.', 'Subscription Service')?.detail).toBe(
      'Subscription Service'
    )
  })
})

describe('collectEvidence', () => {
  it('caps and deduplicates windows', () => {
    const text = 'Fee one. Fee two fee. Fee three. Fee four.'
    const windows = collectEvidence(text, [/\bfee\b/gi])

    expect(windows.map((w) => w.text)).toEqual(['Fee one.', 'Fee two fee.', 'Fee three.'])
    expect(windows).toHaveLength(MAX_EVIDENCE_PER_KEY_POINT)
  })
})

describe('extractFields', () => {
  it('reads fields from the first window that has them', () => {
    const windows = [
      { text: 'No numbers here.', start: 0, end: 16 },
      { text: GOVERNING_LAW_CLAUSE, start: 17, end: 17 + GOVERNING_LAW_CLAUSE.length },
    ]

    expect(extractFields(windows, ['jurisdiction', 'amount'])).toEqual({
      jurisdiction: 'California',
    })
  })

  it('parses currency amounts with cents', () => {
    const windows = [{ text: 'A fee of £49.99 applies.', start: 0, end: 24 }]
    expect(extractFields(windows, ['amount'])).toEqual({ amount: { value: 49.99, currency: 'GBP' } })
  })
})

describe('registry', () => {
  it('maps the fallback type to the generic set', () => {
    expect(DETECTOR_REGISTRY[FALLBACK_DOCUMENT_TYPE]).toHaveLength(4)
    expect(detectorsFor(FALLBACK_DOCUMENT_TYPE)).toHaveLength(
      DETECTOR_REGISTRY.universal.length + 4
    )
  })
})
