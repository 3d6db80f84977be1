// test/setup-unit.ts
// Shared setup for unit tests. Nothing here reaches Sentry or the network.
import { vi } from "vitest"

// Replace the Sentry logger so tests can assert on log calls
vi.mock("@/lib/logger", () => {
  const logger = {
    trace: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  }
  return { logger }
})
