import * as Sentry from "@sentry/node"

/**
 * Structured logger using Sentry.logger
 *
 * Calls are dropped until `instrument.ts` initializes Sentry with a DSN,
 * so tests and DSN-less runs stay silent.
 *
 * @example
 * ```ts
 * import { logger } from "@/lib/logger"
 *
 * logger.info("Document analyzed", { documentType, riskScore })
 * logger.warn("Extraction failed", { name, code: error.code })
 *
 * // Template literal formatting (creates searchable attributes)
 * logger.info(fmt`Ranked ${count} documents`)
 * ```
 */
export const logger = Sentry.logger

// Re-export for template literal formatting
export const fmt = Sentry.logger.fmt
