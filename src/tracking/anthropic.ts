import type Anthropic from "@anthropic-ai/sdk"
import { isRecord } from "../helpers/type-guards"
import { readNumber, readOptional } from "../helpers/utils"
import type { InterceptionTable } from "../types/usage"
import { compactMetadata, createExtractor } from "./helpers"

type UsageField = keyof Anthropic.Message["usage"]

const INPUT_TOKENS: UsageField = "input_tokens"
const OUTPUT_TOKENS: UsageField = "output_tokens"
const BODY_METADATA: keyof Anthropic.MessageCreateParams = "metadata"

export const trackMessage = createExtractor({
  provider: "anthropic",
  operation: "messages",
  requestFields: [BODY_METADATA],
  extract(result) {
    if (!isRecord(result) || !isRecord(result.usage)) {
      return null
    }
    const usage = result.usage

    return {
      inputTokens: readNumber(usage, INPUT_TOKENS),
      outputTokens: readNumber(usage, OUTPUT_TOKENS),
      metadata: compactMetadata({
        responseId: result.id,
        stopReason: result.stop_reason ?? undefined,
        cacheCreationInputTokens: readOptional(usage, "cache_creation_input_tokens") ?? undefined,
        cacheReadInputTokens: readOptional(usage, "cache_read_input_tokens") ?? undefined,
      }),
    }
  },
})

export const trackMessageTokenCount = createExtractor({
  provider: "anthropic",
  operation: "count_tokens",
  baseMetadata: { operation: "count_tokens" },
  extract(result) {
    const inputTokens = readNumber(result, INPUT_TOKENS)
    return { inputTokens, outputTokens: 0, metadata: { totalTokens: inputTokens } }
  },
})

/** Tracked methods of an `Anthropic` client */
export const ANTHROPIC_TRACK_METHODS: InterceptionTable = {
  "messages.create": trackMessage,
  "messages.countTokens": trackMessageTokenCount,
}
