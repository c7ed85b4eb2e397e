/**
 * Sample documents and clauses shared by the engine and review tests.
 * All text is invented for testing.
 */

import type { AnalysisResult } from '../types'

// ============================================================================
// Sample Clauses
// ============================================================================

export const INSURANCE_CLAUSE =
  "This insurance policy's premium may be unilaterally modified by the Insurer at any time without notice. " +
  'Arbitration is mandatory and you waive your right to a jury trial.'

export const GOVERNING_LAW_CLAUSE =
  'This Agreement shall be governed by the laws of the State of California, without regard to its conflict of law provisions.'

export const NON_COMPETE_CLAUSE =
  'For a period of two (2) years after termination, the Employee shall be bound by a non-compete covenant covering the same industry.'

export const FORECLOSURE_CLAUSE =
  'If the Borrower fails to pay, the Lender may begin foreclosure proceedings on the property.'

// ============================================================================
// Sample Documents
// ============================================================================

export const SAMPLE_CLOUD_TERMS = [
  'Acme Cloud Software Terms of Service.',
  'These terms govern your access to the software and the subscription plan you select.',
  'Your subscription will automatically renew at the end of each billing period unless you cancel at least 30 days before renewal.',
  'All fees are non-refundable.',
  'We provide the service with 99.9% uptime as described in our service level agreement.',
  'Your sole and exclusive remedy for downtime is a service credit.',
  'We may share your personal information with third parties for analytics.',
  'We may suspend your account at our sole discretion.',
  'This Agreement is governed by the laws of the State of Delaware.',
].join(' ')

export const SAMPLE_LEASE = [
  'Residential Lease Agreement.',
  'The Landlord agrees to rent the premises to the Tenant for a term of twelve months.',
  'Rent of $1,500 is due on the first day of each month.',
  'The Tenant shall pay a security deposit of $1,500 before moving in.',
  'The Landlord may withhold the security deposit to cover damage beyond normal wear and tear.',
  'The Tenant may not sublet the premises without written consent.',
].join(' ')

export const SAMPLE_EMPLOYMENT_CONTRACT = [
  'Employment Agreement between the Employer and the Employee.',
  'The Employee will receive an annual salary of $85,000 and standard benefits.',
  'Employment is at-will and either party may end it with two weeks notice.',
  NON_COMPETE_CLAUSE,
  'All work product created by the Employee belongs to the Employer as intellectual property.',
  GOVERNING_LAW_CLAUSE,
].join(' ')

export const SAMPLE_PLAIN_TERMS = [
  'Welcome to our community garden newsletter.',
  'Members receive a monthly email with planting tips.',
  'You can unsubscribe whenever you like by replying to any email.',
].join(' ')

// ============================================================================
// Sample Results
// ============================================================================

/** A small hand-built analysis with one finding of each kind */
export function sampleAnalysis(overrides: Partial<AnalysisResult> = {}): AnalysisResult {
  return {
    catalogVersion: '2026.10',
    documentType: 'Lease / Rental Agreement',
    classificationScore: 9,
    summary: 'A lease, with terms.',
    riskScore: 30,
    riskLevel: 'medium',
    riskReason: 'Some terms favor the landlord.',
    riskEvidence: [],
    keyPoints: [
      {
        category: 'security-deposit',
        title: 'Security Deposit',
        detail: 'Deposit of $500.',
        watchOut: true,
        evidence: [
          { text: 'Tenant pays a "deposit".', start: 0, end: 24 },
          { text: 'Second.', start: 30, end: 37 },
        ],
        fields: {},
      },
    ],
    redFlags: [
      {
        category: 'no-refunds',
        description: 'No refunds.',
        severity: 'medium',
        evidence: { text: 'No refunds', start: 40, end: 50 },
      },
    ],
    checklist: ['Read it.'],
    readability: null,
    wordCount: 12,
    charCount: 80,
    ...overrides,
  }
}
