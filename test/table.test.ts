import { describe, it, expect, vi } from "vitest"
import { InterceptionTableError } from "../src/errors"
import { compileTable, tablePaths } from "../src/proxy/table"
import { GOOGLE_TRACK_METHODS } from "../src/tracking/google"

describe("compileTable", () => {
  it("should place dotted keys under their namespace", () => {
    const generate = vi.fn()
    const root = compileTable({ "models.generateContent": generate, ping: vi.fn() })

    expect([...root.methods.keys()]).toEqual(["ping"])
    expect(root.children.get("models")?.methods.get("generateContent")).toBe(generate)
  })

  it("should nest arbitrarily deep keys", () => {
    const op = vi.fn()
    const root = compileTable({ "outer.inner.op": op })

    expect(root.children.get("outer")?.children.get("inner")?.methods.get("op")).toBe(op)
    expect(root.methods.size).toBe(0)
  })

  it("should allow a name to be both a method and a namespace", () => {
    const root = compileTable({ models: vi.fn(), "models.list": vi.fn() })

    expect(root.methods.has("models")).toBe(true)
    expect(root.children.get("models")?.methods.has("list")).toBe(true)
  })

  it.each(["", "models.", ".models", "a..b"])("should reject the malformed key %j", (key) => {
    expect(() => compileTable({ [key]: vi.fn() })).toThrow(InterceptionTableError)
  })

  it("should flatten back to the original keys", () => {
    expect(tablePaths(compileTable(GOOGLE_TRACK_METHODS))).toEqual([
      "models.countTokens",
      "models.generateContent",
    ])
  })
})
