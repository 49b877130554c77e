import { getEffectiveCustomerId } from "../context/customer"
import { isPlainObject } from "../helpers/type-guards"
import { describeError } from "../logger"
import type { ProviderType } from "../types/providers"
import type {
  ExtractionFunction,
  ExtractionInput,
  UsageEvent,
  UsageMetadata,
} from "../types/usage"

export interface ExtractedUsage {
  inputTokens: number
  outputTokens: number
  metadata: UsageMetadata
}

export interface ExtractorDefinition {
  provider: ProviderType
  /** Human readable operation name used in log lines */
  operation: string
  /** Literal prefixes removed from the model name, e.g. `models/` */
  modelPrefixes?: readonly string[]
  /** Metadata every event of this operation carries, failures included */
  baseMetadata?: UsageMetadata
  /** Reserved tracking keys that are also fields of this method's request body */
  requestFields?: readonly string[]
  /**
   * Reads quantities from a successful result. Returning `null` means the
   * result carries no usage and nothing is emitted.
   */
  extract(result: unknown, input: ExtractionInput): ExtractedUsage | null
}

/** The request body: the first plain-object argument of the call */
export function requestParams(args: readonly unknown[]): Record<string, unknown> {
  const params = args.find(isPlainObject)
  return params ?? {}
}

export function normalizeModel(model: string, prefixes: readonly string[] = []): string {
  for (const prefix of prefixes) {
    if (model.startsWith(prefix)) {
      return model.slice(prefix.length)
    }
  }
  return model
}

export function resolveModel(args: readonly unknown[], prefixes: readonly string[] = []): string {
  const model = requestParams(args).model
  return typeof model === "string" ? normalizeModel(model, prefixes) : "unknown"
}

/** Drops `undefined` entries so events only carry fields the result had */
export function compactMetadata(metadata: Record<string, unknown>): UsageMetadata {
  return Object.fromEntries(
    Object.entries(metadata).filter(([, value]) => value !== undefined),
  )
}

export function buildUsageEvent(
  input: ExtractionInput,
  customerId: string,
  provider: ProviderType,
  model: string,
  usage: ExtractedUsage,
): UsageEvent {
  const { context } = input
  const failed = context.outcome === "failure"
  return {
    customerId,
    provider,
    model,
    inputTokens: usage.inputTokens,
    outputTokens: usage.outputTokens,
    metadata: { ...usage.metadata, ...(input.metadata ?? {}) },
    requestId: context.requestId,
    requestStartTime: context.startTime,
    requestEndTime: context.endTime,
    errorOccurred: failed,
    errorType: failed ? context.error.kind : null,
    errorCode: failed ? context.error.code : null,
    errorMessage: failed ? context.error.message : null,
  }
}

export function createExtractor(definition: ExtractorDefinition): ExtractionFunction {
  const { provider, operation, modelPrefixes = [], baseMetadata = {}, requestFields } = definition

  const track: ExtractionFunction = (input) => {
    try {
      const customerId = getEffectiveCustomerId(input.customerId)
      if (!customerId) {
        input.logger.warn(`No customer ID provided for tracking ${operation}`)
        return
      }

      const model = resolveModel(input.args, modelPrefixes)

      let usage: ExtractedUsage | null
      if (input.context.outcome === "failure") {
        usage = { inputTokens: 0, outputTokens: 0, metadata: { ...baseMetadata } }
      } else {
        const extracted = definition.extract(input.result, input)
        usage = extracted && {
          ...extracted,
          metadata: { ...baseMetadata, ...extracted.metadata },
        }
      }

      if (!usage) {
        input.logger.debug(`No usage data in ${operation} result for ${input.methodPath}`)
        return
      }

      input.sink.recordUsage(buildUsageEvent(input, customerId, provider, model, usage))
    } catch (error) {
      input.logger.warn(`Failed to extract usage data from ${operation}: ${describeError(error)}`)
    }
  }
  return requestFields ? Object.assign(track, { requestFields }) : track
}
