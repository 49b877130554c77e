import { vi } from "vitest"
import type { Logger } from "../src/logger"
import type { ExtractionInput, UsageEvent, UsageSink } from "../src/types/usage"

export function createRecordingSink(): UsageSink & { events: UsageEvent[] } {
  const events: UsageEvent[] = []
  return {
    events,
    recordUsage(event) {
      events.push(event)
    },
  }
}

export function createTestLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger
}

/** Extraction function that records every input it receives */
export function createRecordingExtractor() {
  const calls: ExtractionInput[] = []
  const extract = vi.fn((input: ExtractionInput) => {
    calls.push(input)
  })
  return { extract, calls }
}
