import { describe, it, expect } from "vitest"
import { withTracking } from "../src/clients"
import { createTrackedProxy } from "../src/proxy/tracked-proxy"
import { ANTHROPIC_TRACK_METHODS } from "../src/tracking/anthropic"
import { createRecordingSink, createTestLogger } from "./test-utils"

class APIError extends Error {
  constructor(
    public status: number,
    message: string,
  ) {
    super(message)
    this.name = "APIError"
  }
}

interface MessageParams {
  model: string
  max_tokens: number
  metadata?: { user_id: string }
}

function createAnthropicClient() {
  const received: unknown[][] = []
  return {
    received,
    messages: {
      create: async (...args: [MessageParams, Record<string, unknown>?]) => {
        received.push(args)
        const [params] = args
        if (params.max_tokens <= 0) {
          throw new APIError(400, "max_tokens: must be greater than 0")
        }
        return {
          id: "msg_01",
          type: "message",
          stop_reason: "end_turn",
          usage: {
            input_tokens: 20,
            output_tokens: 9,
            cache_creation_input_tokens: null,
            cache_read_input_tokens: 3,
          },
        }
      },
      countTokens: async (_params: { model: string }) => ({ input_tokens: 14 }),
    },
  }
}

function setup() {
  const sink = createRecordingSink()
  const raw = createAnthropicClient()
  const client = createTrackedProxy(raw, sink, ANTHROPIC_TRACK_METHODS, {
    logger: createTestLogger(),
  })
  return { sink, raw, client }
}

describe("ANTHROPIC_TRACK_METHODS", () => {
  it("should track message usage and cache reads", async () => {
    const { sink, client } = setup()

    await client.messages.create(
      withTracking({ model: "claude-sonnet-4-0", max_tokens: 64 }, { customerId: "customer-1" }),
    )

    expect(sink.events[0]).toMatchObject({
      provider: "anthropic",
      model: "claude-sonnet-4-0",
      inputTokens: 20,
      outputTokens: 9,
    })
    expect(sink.events[0].metadata).toEqual({
      responseId: "msg_01",
      stopReason: "end_turn",
      cacheReadInputTokens: 3,
    })
  })

  it("should forward the request body's own metadata to the SDK", async () => {
    const { sink, raw, client } = setup()
    const body = { model: "claude-sonnet-4-0", max_tokens: 64, metadata: { user_id: "user-1" } }

    await client.messages.create(withTracking(body, { customerId: "customer-1" }))

    expect(raw.received).toEqual([[body]])
    expect(sink.events[0].customerId).toBe("customer-1")
    expect(sink.events[0].metadata).toEqual({
      responseId: "msg_01",
      stopReason: "end_turn",
      cacheReadInputTokens: 3,
    })
  })

  it("should take tracking metadata from the request options", async () => {
    const { sink, raw, client } = setup()
    const body = { model: "claude-sonnet-4-0", max_tokens: 64, metadata: { user_id: "user-1" } }

    await client.messages.create(body, { customerId: "customer-1", metadata: { feature: "chat" } })

    expect(raw.received).toEqual([[body]])
    expect(sink.events[0].metadata).toEqual({
      responseId: "msg_01",
      stopReason: "end_turn",
      cacheReadInputTokens: 3,
      feature: "chat",
    })
  })

  it("should record failed calls with the HTTP status", async () => {
    const { sink, client } = setup()

    await expect(
      client.messages.create(withTracking({ model: "claude-sonnet-4-0", max_tokens: 0 }, { customerId: "customer-1" })),
    ).rejects.toThrow("max_tokens: must be greater than 0")

    expect(sink.events[0]).toMatchObject({
      inputTokens: 0,
      outputTokens: 0,
      errorOccurred: true,
      errorType: "transport_error",
      errorCode: "400",
      errorMessage: "max_tokens: must be greater than 0",
    })
  })

  it("should track token counting", async () => {
    const { sink, client } = setup()

    await client.messages.countTokens(withTracking({ model: "claude-sonnet-4-0" }, { customerId: "customer-1" }))

    expect(sink.events[0]).toMatchObject({
      inputTokens: 14,
      outputTokens: 0,
      metadata: { operation: "count_tokens", totalTokens: 14 },
    })
  })
})
