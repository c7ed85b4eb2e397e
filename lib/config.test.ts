import { describe, it, expect } from "vitest"
import { engineSettings, loadConfig } from "./config"
import { ValidationError } from "./errors"

describe("loadConfig", () => {
  it("uses engine defaults when nothing is set", () => {
    const config = loadConfig({})

    expect(config.NODE_ENV).toBe("development")
    expect(config.SENTRY_DSN).toBeUndefined()
    expect(engineSettings(config)).toEqual({
      riskSaturation: 60,
      minClassificationScore: 4,
      maxRiskEvidence: 20,
      minAnalyzableLength: 20,
    })
  })

  it("coerces numeric variables", () => {
    const config = loadConfig({
      NODE_ENV: "test",
      RISK_SATURATION: "45",
      MAX_RISK_EVIDENCE: "5",
    })

    expect(engineSettings(config)).toMatchObject({ riskSaturation: 45, maxRiskEvidence: 5 })
  })

  it("treats empty strings as unset", () => {
    expect(loadConfig({ SENTRY_DSN: "", MIN_ANALYZABLE_LENGTH: "" }).MIN_ANALYZABLE_LENGTH).toBe(20)
  })

  it("reports invalid variables", () => {
    let caught: unknown
    try {
      loadConfig({ RISK_SATURATION: "-1", SENTRY_DSN: "not a url" })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(ValidationError)
    if (caught instanceof ValidationError) {
      expect(caught.details?.map((d) => d.field).sort()).toEqual([
        "RISK_SATURATION",
        "SENTRY_DSN",
      ])
    }
  })
})
