import { describe, it, expect, afterEach } from "vitest"
import {
  clearDefaultCustomerId,
  getCustomerContext,
  getEffectiveCustomerId,
  setDefaultCustomerId,
  toCustomerOverride,
  UNSET_CUSTOMER,
  withCustomerId,
} from "../src/context/customer"

afterEach(() => {
  clearDefaultCustomerId()
})

describe("getEffectiveCustomerId", () => {
  it("should prefer an explicit override", () => {
    setDefaultCustomerId("default-customer")

    expect(getEffectiveCustomerId("explicit")).toBe("explicit")
  })

  it("should return null for an explicit null even with a default", () => {
    setDefaultCustomerId("default-customer")

    expect(getEffectiveCustomerId(null)).toBeNull()
  })

  it("should fall back to the default when unset", () => {
    setDefaultCustomerId("default-customer")

    expect(getEffectiveCustomerId(UNSET_CUSTOMER)).toBe("default-customer")
  })

  it("should return null when unset and nothing is ambient", () => {
    expect(getEffectiveCustomerId(UNSET_CUSTOMER)).toBeNull()
  })
})

describe("withCustomerId", () => {
  it("should scope the customer to the callback", () => {
    setDefaultCustomerId("default-customer")

    const inside = withCustomerId("scoped", () => getCustomerContext())

    expect(inside).toBe("scoped")
    expect(getCustomerContext()).toBe("default-customer")
  })

  it("should carry the customer across awaits", async () => {
    const seen = await withCustomerId("async-customer", async () => {
      await new Promise((resolve) => setTimeout(resolve, 1))
      return getEffectiveCustomerId(UNSET_CUSTOMER)
    })

    expect(seen).toBe("async-customer")
  })

  it("should let nested scopes shadow outer ones", () => {
    const seen = withCustomerId("outer", () => withCustomerId("inner", () => getCustomerContext()))

    expect(seen).toBe("inner")
  })
})

describe("toCustomerOverride", () => {
  it("should map call-site values onto the three states", () => {
    expect(toCustomerOverride(undefined)).toBe(UNSET_CUSTOMER)
    expect(toCustomerOverride(null)).toBeNull()
    expect(toCustomerOverride("cus_1")).toBe("cus_1")
    expect(toCustomerOverride(42)).toBe("42")
  })
})
