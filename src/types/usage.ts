import type { CustomerIdOverride } from "../context/customer"
import type { Logger } from "../logger"
import { ProviderType } from "./providers"

export type ErrorKind = "transport_error" | "sdk_error"

export interface ErrorClassification {
  kind: ErrorKind
  code: string | null
  message: string
}

interface CallContextBase {
  /** Correlation id minted for this call */
  requestId: string
  /** Full dotted path of the tracked method, e.g. `models.generateContent` */
  methodPath: string
  /** Arguments as forwarded to the real method, reserved keys removed */
  args: readonly unknown[]
  startTime: number
  endTime: number
}

export interface SuccessfulCall extends CallContextBase {
  outcome: "success"
}

export interface FailedCall extends CallContextBase {
  outcome: "failure"
  error: ErrorClassification
}

export type CallContext = SuccessfulCall | FailedCall

export type UsageMetadata = Record<string, unknown>

export interface UsageEvent {
  customerId: string
  provider: ProviderType
  model: string
  inputTokens: number
  outputTokens: number
  metadata: UsageMetadata
  requestId: string
  requestStartTime: number
  requestEndTime: number
  errorOccurred: boolean
  errorType: ErrorKind | null
  errorCode: string | null
  errorMessage: string | null
}

/**
 * Consumer of usage events. Implementations must hand the event off without
 * blocking the caller.
 */
export interface UsageSink {
  recordUsage(event: UsageEvent): void
}

export interface ExtractionInput {
  /** The real method's result, `null` when the call failed */
  result: unknown
  customerId: CustomerIdOverride
  sink: UsageSink
  methodPath: string
  args: readonly unknown[]
  metadata: UsageMetadata | null
  context: CallContext
  logger: Logger
}

export interface ExtractionFunction {
  (input: ExtractionInput): void
  /** Reserved keys the SDK also accepts on the request body */
  readonly requestFields?: readonly string[]
}

export type InterceptionTable = Readonly<Record<string, ExtractionFunction>>

export interface TrackingOptions {
  customerId?: string | null
  trackUsage?: boolean
  metadata?: UsageMetadata
}
