export {
  createTrackedProxy,
  isTrackedProxy,
  getTrackedTarget,
  type TrackedProxyOptions,
} from "./proxy/tracked-proxy"
export {
  wrapMethod,
  classifyError,
  extractCallSiteOptions,
  RESERVED_KEYS,
  type WrapMethodOptions,
} from "./proxy/interceptor"
export { compileTable, tablePaths, type TableNode } from "./proxy/table"

export {
  trackClient,
  trackGoogleClient,
  trackOpenAIClient,
  trackAnthropicClient,
  withTracking,
  type TrackClientOptions,
  type GenericTrackClientOptions,
} from "./clients"

export {
  createExtractor,
  buildUsageEvent,
  normalizeModel,
  resolveModel,
  requestParams,
  type ExtractedUsage,
  type ExtractorDefinition,
} from "./tracking/helpers"
export { GOOGLE_TRACK_METHODS, trackGenerateContent, trackCountTokens } from "./tracking/google"
export {
  OPENAI_TRACK_METHODS,
  trackChatCompletion,
  trackResponse,
  trackEmbedding,
} from "./tracking/openai"
export {
  ANTHROPIC_TRACK_METHODS,
  trackMessage,
  trackMessageTokenCount,
} from "./tracking/anthropic"

export {
  UNSET_CUSTOMER,
  withCustomerId,
  setDefaultCustomerId,
  clearDefaultCustomerId,
  getCustomerContext,
  getEffectiveCustomerId,
  type CustomerIdOverride,
} from "./context/customer"

export { UsageTracker, toWirePayload, type UsageTrackerOptions } from "./tracker/usage-tracker"
export {
  loadTrackerConfig,
  TrackerConfigSchema,
  type TrackerConfig,
  type TrackerConfigInput,
  type TrackerEnv,
} from "./config"
export {
  VersionCompatibility,
  SDK_REQUIREMENTS,
  probeCompatibility,
  getCompatibilityInfo,
  checkCompatibility,
  resetCompatibilityCache,
  readInstalledVersion,
  type CompatibilityInfo,
  type VersionRequirement,
  type VersionReader,
} from "./compat/version"

export { setLogger, getLogger, resetLogger, consoleLogger, type Logger } from "./logger"
export * from "./errors"
export * from "./types"
