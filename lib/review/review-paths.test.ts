import { describe, it, expect, beforeAll, afterAll } from "vitest"
import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import {
  INSURANCE_CLAUSE,
  SAMPLE_CLOUD_TERMS,
  SAMPLE_LEASE,
} from "@/engine/testing/fixtures"
import { ValidationError } from "@/lib/errors"
import { reviewPaths } from "./review-paths"

let dir: string
let paths: string[]

beforeAll(async () => {
  dir = await mkdtemp(join(tmpdir(), "review-paths-"))
  paths = [join(dir, "policy.txt"), join(dir, "cloud.txt"), join(dir, "lease.txt")]
  await writeFile(paths[0], INSURANCE_CLAUSE)
  await writeFile(paths[1], SAMPLE_CLOUD_TERMS)
  await writeFile(paths[2], SAMPLE_LEASE)
})

afterAll(async () => {
  await rm(dir, { recursive: true, force: true })
})

describe("reviewPaths", () => {
  it("analyzes a single document", async () => {
    const output = await reviewPaths(paths.slice(0, 1))

    expect(output.mode).toBe("analysis")
    if (output.mode !== "analysis") return
    expect(output.document.name).toBe(paths[0])
    expect(output.document.result.riskScore).toBe(66)
  })

  it("compares two documents", async () => {
    const output = await reviewPaths(paths.slice(0, 2))

    expect(output.mode).toBe("comparison")
    if (output.mode !== "comparison") return
    expect(output.comparison.saferName).toBe(paths[1])
  })

  it("ranks three or more documents", async () => {
    const output = await reviewPaths(paths)

    expect(output.mode).toBe("ranking")
    if (output.mode !== "ranking") return
    expect(output.ranking.safest.name).toBe(paths[2])
  })

  it.each([0, 9])("rejects %i paths", async (count) => {
    await expect(reviewPaths(Array.from({ length: count }, () => paths[0]))).rejects.toBeInstanceOf(ValidationError)
  })
})
