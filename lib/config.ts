/**
 * @fileoverview Runtime configuration
 *
 * Environment variables are read once (after `.env` has been loaded by the
 * entry point) and validated with zod. Engine tuning values fall back to
 * the engine's calibrated defaults when unset.
 *
 * @module lib/config
 */

import { z } from "zod"
import { DEFAULT_ENGINE_SETTINGS, type EngineSettings } from "@/engine/types"
import { ValidationError } from "./errors"

const positiveInt = z.coerce.number().int().positive()

export const configSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  SENTRY_DSN: z.string().url().optional(),
  RISK_SATURATION: z.coerce
    .number()
    .positive()
    .default(DEFAULT_ENGINE_SETTINGS.riskSaturation),
  MIN_CLASSIFICATION_SCORE: z.coerce
    .number()
    .min(0)
    .default(DEFAULT_ENGINE_SETTINGS.minClassificationScore),
  MAX_RISK_EVIDENCE: positiveInt.default(DEFAULT_ENGINE_SETTINGS.maxRiskEvidence),
  MIN_ANALYZABLE_LENGTH: positiveInt.default(DEFAULT_ENGINE_SETTINGS.minAnalyzableLength),
})

export type AppConfig = z.infer<typeof configSchema>

/**
 * Parses configuration from an environment map.
 * Empty strings count as unset.
 *
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  )
  const parsed = configSchema.safeParse(present)
  if (!parsed.success) {
    throw ValidationError.fromZodError(parsed.error)
  }
  return parsed.data
}

/** Maps configuration onto the engine's tuning settings */
export function engineSettings(config: AppConfig): EngineSettings {
  return {
    riskSaturation: config.RISK_SATURATION,
    minClassificationScore: config.MIN_CLASSIFICATION_SCORE,
    maxRiskEvidence: config.MAX_RISK_EVIDENCE,
    minAnalyzableLength: config.MIN_ANALYZABLE_LENGTH,
  }
}
