/**
 * @fileoverview Red Flag Detector
 *
 * Type-agnostic scan for clauses that warrant attention before signing.
 * One red flag per match span per pattern. Overlapping matches from
 * different patterns are all kept.
 *
 * @module engine/red-flags
 */

import { catalog as defaultCatalog, type Catalog } from './catalog'
import { findAll } from './text'
import { SEVERITY_RANK, type RedFlag } from './types'

/**
 * Ordered by severity (high first), then offset, then catalog order.
 * Each flag's evidence is exactly the matched span of `text`.
 */
export function detectRedFlags(
  text: string,
  catalog: Catalog = defaultCatalog
): RedFlag[] {
  const found: Array<RedFlag & { order: number }> = []

  catalog.redFlags.forEach((flag, order) => {
    for (const match of findAll(text, flag.pattern)) {
      found.push({
        category: flag.category,
        description: flag.description,
        severity: flag.severity,
        evidence: { text: match.text, start: match.start, end: match.end },
        order,
      })
    }
  })

  return found
    .sort(
      (a, b) =>
        SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
        a.evidence.start - b.evidence.start ||
        a.order - b.order
    )
    .map(({ order: _order, ...flag }) => flag)
}
