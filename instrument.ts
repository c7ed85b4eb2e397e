import * as Sentry from "@sentry/node"
import type { AppConfig } from "@/lib/config"

/**
 * Initializes Sentry for the command-line entry point.
 * Without a DSN nothing is initialized and `logger` calls are dropped.
 *
 * @returns whether Sentry was initialized
 */
export function initInstrumentation(config: AppConfig): boolean {
  if (!config.SENTRY_DSN) return false

  Sentry.init({
    dsn: config.SENTRY_DSN,
    environment: config.NODE_ENV,

    // Enable structured logging
    enableLogs: true,

    // Documents are never sent, only counts and scores
    sendDefaultPii: false,

    tracesSampleRate: config.NODE_ENV === "production" ? 0.1 : 1.0,

    debug: false,
  })
  return true
}

/** Flushes buffered logs before the process exits */
export async function flushInstrumentation(timeoutMs = 2000): Promise<void> {
  await Sentry.flush(timeoutMs)
}
