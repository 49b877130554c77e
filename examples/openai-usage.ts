/**
 * OpenAI usage tracking with request-scoped customers
 *
 * An HTTP handler can bind the customer once and every tracked call made
 * while serving the request is attributed to it.
 */

import OpenAI from "openai"
import { trackOpenAIClient, withCustomerId, withTracking } from "../src"

const openai = trackOpenAIClient(new OpenAI({ apiKey: process.env.OPENAI_API_KEY }), {
  tracker: { apiKey: process.env.USAGE_TRACKER_API_KEY },
})

async function answer(question: string): Promise<string | null> {
  const params: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
    model: "gpt-4o-mini",
    messages: [{ role: "user", content: question }],
  }
  // The request body has its own `metadata`, so tracking metadata rides on
  // the request options.
  const completion = await openai.chat.completions.create(
    params,
    withTracking({ timeout: 30_000 }, { metadata: { route: "/answer" } }),
  )
  return completion.choices[0]?.message.content ?? null
}

async function main() {
  const reply = await withCustomerId("customer-42", () => answer("What is a token?"))
  console.log(reply)
}

main().catch((error) => {
  console.error(error)
  process.exitCode = 1
})
