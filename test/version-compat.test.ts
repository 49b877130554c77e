import { describe, it, expect, beforeEach } from "vitest"
import {
  checkCompatibility,
  getCompatibilityInfo,
  probeCompatibility,
  resetCompatibilityCache,
  SDK_REQUIREMENTS,
  VersionCompatibility,
} from "../src/compat/version"
import { createTestLogger } from "./test-utils"

function probe(version: string | null, nodeVersion = "20.11.1") {
  const logger = createTestLogger()
  const compat = new VersionCompatibility(SDK_REQUIREMENTS.google, {
    readVersion: () => version,
    logger,
    nodeVersion,
  })
  return { compat, logger }
}

beforeEach(() => {
  resetCompatibilityCache()
})

describe("VersionCompatibility", () => {
  it("should mark tested versions as supported without warnings", () => {
    const { compat, logger } = probe("1.4.0")

    expect(compat.isSupported()).toBe(true)
    expect(compat.warnings).toEqual([])
    expect(logger.warn).not.toHaveBeenCalled()
  })

  it("should warn when the SDK is below the minimum", () => {
    const { compat, logger } = probe("0.9.0")

    expect(compat.isSupported()).toBe(false)
    expect(logger.warn).toHaveBeenCalledWith(
      "@google/genai 0.9.0 is below minimum supported version 1.0.0",
    )
  })

  it("should warn when the SDK is not installed", () => {
    const { compat } = probe(null)

    expect(compat.isSupported()).toBe(false)
    expect(compat.warnings[0]).toContain("not found")
  })

  it("should warn but still support versions newer than tested", () => {
    const { compat } = probe("2.1.0")

    expect(compat.isSupported()).toBe(true)
    expect(compat.warnings[0]).toContain("newer than tested")
  })

  it("should report structured library and runtime info", () => {
    const { compat } = probe("1.4.0", "18.19.0")

    expect(compat.getInfo()).toEqual({
      library: { name: "@google/genai", version: "1.4.0", supported: true },
      node: { version: "18.19.0", supported: false },
    })
  })
})

describe("probeCompatibility", () => {
  it("should probe each SDK once and warn once", () => {
    const logger = createTestLogger()
    const options = { readVersion: () => "3.0.0", logger, nodeVersion: "20.11.1" }

    const first = probeCompatibility("openai", options)
    const second = probeCompatibility("openai", options)

    expect(second).toBe(first)
    expect(logger.warn).toHaveBeenCalledTimes(1)
  })

  it("should expose info and a boolean check", () => {
    const options = { readVersion: () => "0.52.0", logger: createTestLogger(), nodeVersion: "20.11.1" }

    expect(getCompatibilityInfo("anthropic", options).library).toEqual({
      name: "@anthropic-ai/sdk",
      version: "0.52.0",
      supported: true,
    })
    expect(checkCompatibility("anthropic", options)).toBe(true)
  })
})
