/**
 * Gemini usage tracking
 *
 * Wraps a Google Gen AI client so every generateContent and countTokens call
 * reports token usage for the customer it was made on behalf of.
 */

import { GoogleGenAI } from "@google/genai"
import { setDefaultCustomerId, trackGoogleClient, withTracking } from "../src"

async function main() {
  const ai = trackGoogleClient(new GoogleGenAI({ apiKey: process.env.GEMINI_API_KEY }), {
    tracker: { apiKey: process.env.USAGE_TRACKER_API_KEY },
  })

  // Calls without an explicit customer fall back to this one
  setDefaultCustomerId("customer-default")

  const response = await ai.models.generateContent(
    withTracking(
      { model: "gemini-2.0-flash", contents: "Summarize the plot of Hamlet in one line." },
      { customerId: "customer-42", metadata: { feature: "summaries" } },
    ),
  )
  console.log(response.text)

  const count = await ai.models.countTokens({
    model: "models/gemini-2.0-flash",
    contents: "How many tokens is this?",
  })
  console.log(`Prompt is ${count.totalTokens} tokens`)
}

main().catch((error) => {
  console.error(error)
  process.exitCode = 1
})
