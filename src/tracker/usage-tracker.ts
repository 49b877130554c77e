import { loadTrackerConfig, TrackerConfig, TrackerConfigInput, TrackerEnv } from "../config"
import { describeError, getLogger, Logger } from "../logger"
import type { UsageEvent, UsageSink } from "../types/usage"

export interface UsageTrackerOptions {
  config?: Partial<TrackerConfigInput>
  env?: TrackerEnv
  logger?: Logger
  /** Defaults to the global `fetch` */
  fetch?: typeof fetch
}

export function toWirePayload(event: UsageEvent): Record<string, unknown> {
  return {
    customer_id: event.customerId,
    provider: event.provider,
    model: event.model,
    input_tokens: event.inputTokens,
    output_tokens: event.outputTokens,
    total_tokens: event.inputTokens + event.outputTokens,
    metadata: event.metadata,
    request_id: event.requestId,
    request_start_time: event.requestStartTime,
    request_end_time: event.requestEndTime,
    duration_ms: event.requestEndTime - event.requestStartTime,
    error_occurred: event.errorOccurred,
    error_type: event.errorType,
    error_code: event.errorCode,
    error_message: event.errorMessage,
    timestamp: new Date(event.requestEndTime).toISOString(),
  }
}

/**
 * Posts usage events to the configured endpoint in the background.
 * `recordUsage` returns immediately; delivery failures are logged and
 * dropped.
 */
export class UsageTracker implements UsageSink {
  readonly config: TrackerConfig
  private readonly logger: Logger
  private readonly fetchImpl: typeof fetch
  private readonly pending = new Set<Promise<void>>()

  constructor(options: UsageTrackerOptions = {}) {
    this.config = loadTrackerConfig(options.config, options.env)
    this.logger = options.logger ?? getLogger()
    this.fetchImpl = options.fetch ?? ((...args: Parameters<typeof fetch>) => fetch(...args))
  }

  recordUsage(event: UsageEvent): void {
    if (!this.config.enabled) {
      return
    }
    const delivery = this.send(event)
      .catch((error: unknown) => {
        this.logger.warn(
          `Failed to deliver usage event ${event.requestId}: ${describeError(error)}`,
        )
      })
      .finally(() => {
        this.pending.delete(delivery)
      })
    this.pending.add(delivery)
  }

  /** Resolves once every event recorded so far has been delivered or dropped */
  async flush(): Promise<void> {
    await Promise.all([...this.pending])
  }

  get pendingCount(): number {
    return this.pending.size
  }

  private async send(event: UsageEvent): Promise<void> {
    const response = await this.fetchImpl(this.config.endpoint, {
      method: "POST",
      headers: {
        Authorization: `Bearer ${this.config.apiKey}`,
        "Content-Type": "application/json",
      },
      body: JSON.stringify(toWirePayload(event)),
      signal: AbortSignal.timeout(this.config.timeoutMs),
    })
    if (!response.ok) {
      throw new Error(`Usage endpoint responded ${response.status} ${response.statusText}`)
    }
    this.logger.debug(`Recorded usage event ${event.requestId} for ${event.customerId}`)
  }
}
