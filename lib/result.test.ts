import { describe, it, expect } from "vitest"
import { Err, Ok, tryCatchWith } from "./result"

describe("Result", () => {
  it("builds tagged success and failure values", () => {
    expect(Ok(3)).toEqual({ ok: true, value: 3 })
    expect(Err("nope")).toEqual({ ok: false, error: "nope" })
  })

  it("captures thrown errors through the mapper", async () => {
    const result = await tryCatchWith(
      async () => {
        throw new Error("failed")
      },
      (e) => (e instanceof Error ? e.message : "unknown")
    )

    expect(result).toEqual({ ok: false, error: "failed" })
  })

  it("wraps resolved values", async () => {
    expect(await tryCatchWith(async () => 5, String)).toEqual({ ok: true, value: 5 })
  })
})
