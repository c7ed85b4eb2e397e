import { describe, it, expect, vi, beforeEach } from "vitest"
import { analyzeDocument } from "@/engine"
import {
  GOVERNING_LAW_CLAUSE,
  INSURANCE_CLAUSE,
  SAMPLE_CLOUD_TERMS,
} from "@/engine/testing/fixtures"
import { logger } from "@/lib/logger"
import { compareDocuments, diffAnalyses } from "./compare"

const insurance = { name: "Insurance", result: analyzeDocument(INSURANCE_CLAUSE) }
const cloud = { name: "Cloud", result: analyzeDocument(SAMPLE_CLOUD_TERMS) }

describe("diffAnalyses", () => {
  const comparison = diffAnalyses(insurance, cloud)

  it("aligns key points by category", () => {
    expect(comparison.alignment.map((row) => [row.category, row.matchType])).toEqual([
      ["privacy-data", "missing_in_a"],
      ["dispute-resolution", "missing_in_b"],
      ["account-termination", "missing_in_a"],
      ["auto-renewal", "missing_in_a"],
      ["cancellation", "missing_in_a"],
      ["refunds", "missing_in_a"],
      ["payment-billing", "missing_in_a"],
      ["service-level", "missing_in_a"],
      ["governing-law", "missing_in_a"],
    ])
  })

  it("lists red flags unique to each side", () => {
    expect(comparison.uniqueRedFlagsA).toEqual([
      "unilateral-modification",
      "changes-without-notice",
      "mandatory-arbitration",
      "jury-trial-waiver",
      "waiver-of-rights",
    ])
    expect(comparison.uniqueRedFlagsB).toEqual(["no-refunds", "data-sharing", "sole-discretion"])
  })

  it("picks the document with the lower risk score", () => {
    expect(comparison.riskDelta).toBe(-10)
    expect(comparison.saferDocument).toBe("b")
    expect(comparison.saferName).toBe("Cloud")
  })

  it("explains the differences", () => {
    expect(comparison.keyDifferences).toHaveLength(17)
    expect(comparison.keyDifferences).toContainEqual({
      category: "dispute-resolution",
      description: "Only Insurance covers Disputes & Arbitration.",
      riskImplication:
        "Insurance carries an extra concern here: Disputes must go to binding arbitration instead of court.",
    })
    expect(comparison.keyDifferences).toContainEqual({
      category: "governing-law",
      description: "Only Cloud covers Applicable Law & Jurisdiction.",
      riskImplication: "Insurance is silent on this point. Check whether that leaves you unprotected.",
    })
    expect(comparison.keyDifferences).toContainEqual({
      category: "jury-trial-waiver",
      description: "Only Insurance contains: Waives your right to a jury trial.",
      riskImplication: "Serious concern that weighs strongly against this document.",
    })
    expect(comparison.keyDifferences).toContainEqual({
      category: "sole-discretion",
      description: "Only Cloud contains: The provider has unchecked discretion on key decisions.",
      riskImplication: "Minor concern to keep in mind.",
    })
  })

  it("finds nothing to report between identical documents", () => {
    const same = diffAnalyses(cloud, { name: "Cloud copy", result: cloud.result })

    expect(same.alignment.every((row) => row.matchType === "identical")).toBe(true)
    expect(same.uniqueRedFlagsA).toEqual([])
    expect(same.uniqueRedFlagsB).toEqual([])
    expect(same.riskDelta).toBe(0)
    expect(same.saferDocument).toBe("equal")
    expect(same.saferName).toBeNull()
    expect(same.keyDifferences).toEqual([])
  })

  it("marks categories with different terms", () => {
    const california = { name: "CA", result: analyzeDocument(GOVERNING_LAW_CLAUSE) }
    const delaware = {
      name: "DE",
      result: analyzeDocument("This Agreement is governed by the laws of the State of Delaware."),
    }
    const comparison = diffAnalyses(california, delaware)

    expect(comparison.alignment.find((row) => row.category === "governing-law")?.matchType).toBe(
      "different"
    )
    expect(comparison.keyDifferences).toContainEqual({
      category: "governing-law",
      description: "Applicable Law & Jurisdiction terms differ: California vs Delaware.",
      riskImplication: "Compare the exact wording before choosing.",
    })
  })

  it("breaks risk ties on red flag count", () => {
    const base = analyzeDocument("")
    const flagged = {
      name: "flagged",
      result: { ...base, redFlags: cloud.result.redFlags },
    }

    expect(diffAnalyses({ name: "clean", result: base }, flagged).saferDocument).toBe("a")
    expect(diffAnalyses(flagged, { name: "clean", result: base }).saferDocument).toBe("b")
  })
})

describe("compareDocuments", () => {
  beforeEach(() => {
    vi.clearAllMocks()
  })

  it("analyzes both sources and logs the outcome", async () => {
    const comparison = await compareDocuments(
      { kind: "text", name: "Insurance", text: INSURANCE_CLAUSE },
      { kind: "text", name: "Cloud", text: SAMPLE_CLOUD_TERMS }
    )

    expect(comparison.documentA.result.riskScore).toBe(66)
    expect(comparison.documentB.result.riskScore).toBe(56)
    expect(logger.info).toHaveBeenCalledWith("Documents compared", {
      documentA: "Insurance",
      documentB: "Cloud",
      riskDelta: -10,
      saferDocument: "b",
      differenceCount: 17,
    })
  })
})
