import type { CountTokensResponse, GenerateContentResponse } from "@google/genai"
import { isRecord } from "../helpers/type-guards"
import { readNumber, readOptional } from "../helpers/utils"
import type { InterceptionTable } from "../types/usage"
import { compactMetadata, createExtractor } from "./helpers"

type GenerateField = keyof GenerateContentResponse
type UsageField = keyof NonNullable<GenerateContentResponse["usageMetadata"]>
type CountField = keyof CountTokensResponse

const USAGE_METADATA: GenerateField = "usageMetadata"
const PROMPT_TOKENS: UsageField = "promptTokenCount"
const CANDIDATE_TOKENS: UsageField = "candidatesTokenCount"
const TOTAL_TOKENS: CountField = "totalTokens"

const MODEL_PREFIXES = ["models/"]

function firstCandidate(result: Record<string, unknown>): unknown {
  const candidates = result.candidates
  return Array.isArray(candidates) && candidates.length > 0 ? candidates[0] : undefined
}

export const trackGenerateContent = createExtractor({
  provider: "google",
  operation: "generate_content",
  modelPrefixes: MODEL_PREFIXES,
  extract(result) {
    if (!isRecord(result) || !isRecord(result[USAGE_METADATA])) {
      return null
    }
    const usage = result[USAGE_METADATA]

    return {
      inputTokens: readNumber(usage, PROMPT_TOKENS),
      outputTokens: readNumber(usage, CANDIDATE_TOKENS),
      metadata: compactMetadata({
        responseId: result.responseId,
        modelVersion: result.modelVersion,
        safetyRatings: readOptional(result.promptFeedback, "safetyRatings"),
        finishReason: readOptional(firstCandidate(result), "finishReason"),
        totalTokenCount: readOptional(usage, "totalTokenCount"),
        cachedContentTokenCount: readOptional(usage, "cachedContentTokenCount"),
        thoughtsTokenCount: readOptional(usage, "thoughtsTokenCount"),
      }),
    }
  },
})

export const trackCountTokens = createExtractor({
  provider: "google",
  operation: "count_tokens",
  modelPrefixes: MODEL_PREFIXES,
  baseMetadata: { operation: "count_tokens" },
  extract(result) {
    const totalTokens = readOptional(result, TOTAL_TOKENS)
    if (typeof totalTokens !== "number") {
      return { inputTokens: 0, outputTokens: 0, metadata: {} }
    }
    return { inputTokens: totalTokens, outputTokens: 0, metadata: { totalTokens } }
  },
})

/** Tracked methods of a `GoogleGenAI` client */
export const GOOGLE_TRACK_METHODS: InterceptionTable = {
  "models.generateContent": trackGenerateContent,
  "models.countTokens": trackCountTokens,
}
