import type OpenAI from "openai"
import type {
  Response as ResponsesResult,
  ResponseCreateParams,
} from "openai/resources/responses/responses"
import { isRecord } from "../helpers/type-guards"
import { readNumber, readOptional } from "../helpers/utils"
import type { InterceptionTable } from "../types/usage"
import { compactMetadata, createExtractor } from "./helpers"

type ChatUsageField = keyof OpenAI.CompletionUsage
type ResponsesUsageField = keyof NonNullable<ResponsesResult["usage"]>
type EmbeddingUsageField = keyof OpenAI.CreateEmbeddingResponse["usage"]

const CHAT_PROMPT_TOKENS: ChatUsageField = "prompt_tokens"
const CHAT_COMPLETION_TOKENS: ChatUsageField = "completion_tokens"
const RESPONSES_INPUT_TOKENS: ResponsesUsageField = "input_tokens"
const RESPONSES_OUTPUT_TOKENS: ResponsesUsageField = "output_tokens"
const EMBEDDING_PROMPT_TOKENS: EmbeddingUsageField = "prompt_tokens"

const CHAT_BODY_METADATA: keyof OpenAI.ChatCompletionCreateParams = "metadata"
const RESPONSES_BODY_METADATA: keyof ResponseCreateParams = "metadata"

export const trackChatCompletion = createExtractor({
  provider: "openai",
  operation: "chat_completion",
  requestFields: [CHAT_BODY_METADATA],
  extract(result) {
    if (!isRecord(result) || !isRecord(result.usage)) {
      return null
    }
    const choices = result.choices
    const firstChoice = Array.isArray(choices) && choices.length > 0 ? choices[0] : undefined

    return {
      inputTokens: readNumber(result.usage, CHAT_PROMPT_TOKENS),
      outputTokens: readNumber(result.usage, CHAT_COMPLETION_TOKENS),
      metadata: compactMetadata({
        responseId: result.id,
        systemFingerprint: result.system_fingerprint ?? undefined,
        finishReason: readOptional(firstChoice, "finish_reason"),
        cachedTokens: readOptional(result.usage.prompt_tokens_details, "cached_tokens"),
      }),
    }
  },
})

export const trackResponse = createExtractor({
  provider: "openai",
  operation: "response",
  requestFields: [RESPONSES_BODY_METADATA],
  extract(result) {
    if (!isRecord(result) || !isRecord(result.usage)) {
      return null
    }
    return {
      inputTokens: readNumber(result.usage, RESPONSES_INPUT_TOKENS),
      outputTokens: readNumber(result.usage, RESPONSES_OUTPUT_TOKENS),
      metadata: compactMetadata({
        responseId: result.id,
        status: result.status,
        reasoningTokens: readOptional(result.usage.output_tokens_details, "reasoning_tokens"),
      }),
    }
  },
})

export const trackEmbedding = createExtractor({
  provider: "openai",
  operation: "embedding",
  baseMetadata: { operation: "embedding" },
  extract(result) {
    const usage = readOptional(result, "usage")
    const data = readOptional(result, "data")
    return {
      inputTokens: readNumber(usage, EMBEDDING_PROMPT_TOKENS),
      outputTokens: 0,
      metadata: Array.isArray(data) ? { embeddingCount: data.length } : {},
    }
  },
})

/** Tracked methods of an `OpenAI` client */
export const OPENAI_TRACK_METHODS: InterceptionTable = {
  "chat.completions.create": trackChatCompletion,
  "responses.create": trackResponse,
  "embeddings.create": trackEmbedding,
}
