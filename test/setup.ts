import { vi } from "vitest"

// Sentry is never initialized under test. Replace the logger with spies so
// suites can assert on what was logged.
vi.mock("@/lib/logger", () => ({
  logger: {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  },
  fmt: String.raw,
}))
