import { probeCompatibility, VersionCompatibilityOptions } from "./compat/version"
import type { TrackerConfigInput } from "./config"
import { getLogger, Logger } from "./logger"
import { createTrackedProxy } from "./proxy/tracked-proxy"
import { UsageTracker } from "./tracker/usage-tracker"
import { ANTHROPIC_TRACK_METHODS } from "./tracking/anthropic"
import { GOOGLE_TRACK_METHODS } from "./tracking/google"
import { OPENAI_TRACK_METHODS } from "./tracking/openai"
import type { ProviderType } from "./types/providers"
import type { InterceptionTable, TrackingOptions, UsageSink } from "./types/usage"

export interface TrackClientOptions {
  /** Receives usage events; built from `tracker` settings when omitted */
  sink?: UsageSink
  tracker?: Partial<TrackerConfigInput>
  logger?: Logger
  /** Extra or replacement entries merged over the provider's table */
  trackMethods?: InterceptionTable
  compatibility?: VersionCompatibilityOptions | false
}

export interface GenericTrackClientOptions extends Omit<TrackClientOptions, "compatibility"> {
  table: InterceptionTable
}

const PROVIDER_TABLES: Record<ProviderType, InterceptionTable> = {
  google: GOOGLE_TRACK_METHODS,
  openai: OPENAI_TRACK_METHODS,
  anthropic: ANTHROPIC_TRACK_METHODS,
}

function resolveSink(options: { sink?: UsageSink; tracker?: Partial<TrackerConfigInput>; logger?: Logger }): UsageSink {
  return options.sink ?? new UsageTracker({ config: options.tracker, logger: options.logger })
}

/** Wraps any client with a caller-supplied interception table */
export function trackClient<T extends object>(client: T, options: GenericTrackClientOptions): T {
  const logger = options.logger ?? getLogger()
  const table = { ...options.table, ...(options.trackMethods ?? {}) }
  return createTrackedProxy(client, resolveSink(options), table, { logger })
}

function trackProvider<T extends object>(
  provider: ProviderType,
  client: T,
  options: TrackClientOptions,
): T {
  const logger = options.logger ?? getLogger()
  if (options.compatibility !== false) {
    probeCompatibility(provider, { logger, ...options.compatibility })
  }
  return trackClient(client, { ...options, logger, table: PROVIDER_TABLES[provider] })
}

/**
 * @example
 * const ai = trackGoogleClient(new GoogleGenAI({ apiKey }), { tracker: { apiKey: "..." } })
 * await ai.models.generateContent(withTracking({ model: "gemini-2.0-flash", contents: "Hi" }, { customerId: "cus_1" }))
 */
export function trackGoogleClient<T extends object>(client: T, options: TrackClientOptions = {}): T {
  return trackProvider("google", client, options)
}

export function trackOpenAIClient<T extends object>(client: T, options: TrackClientOptions = {}): T {
  return trackProvider("openai", client, options)
}

export function trackAnthropicClient<T extends object>(client: T, options: TrackClientOptions = {}): T {
  return trackProvider("anthropic", client, options)
}

/**
 * Attaches tracking options to request params while keeping the params'
 * static type, so SDK method signatures still accept them. Where the request
 * body defines its own `metadata` (OpenAI, Anthropic), attach tracking
 * metadata to the request options argument instead.
 */
export function withTracking<P extends object>(params: P, options: TrackingOptions): P {
  return { ...params, ...options }
}
