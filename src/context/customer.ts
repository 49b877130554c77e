import { AsyncLocalStorage } from "node:async_hooks"

/** Marks a customer id override the caller never supplied */
export const UNSET_CUSTOMER: unique symbol = Symbol("usage-proxy.unset-customer")

/**
 * Three states: a string is an explicit id, `null` explicitly opts out of
 * attribution, and `UNSET_CUSTOMER` defers to the ambient customer.
 */
export type CustomerIdOverride = string | null | typeof UNSET_CUSTOMER

interface CustomerScope {
  customerId: string
}

const customerStorage = new AsyncLocalStorage<CustomerScope>()

let defaultCustomerId: string | null = null

/**
 * Runs `fn` with `customerId` as the ambient customer for every tracked call
 * made inside it, including across awaits.
 */
export function withCustomerId<T>(customerId: string, fn: () => T): T {
  return customerStorage.run({ customerId }, fn)
}

export function setDefaultCustomerId(customerId: string): void {
  defaultCustomerId = customerId
}

export function clearDefaultCustomerId(): void {
  defaultCustomerId = null
}

export function getCustomerContext(): string | null {
  return customerStorage.getStore()?.customerId ?? defaultCustomerId
}

export function getEffectiveCustomerId(override: CustomerIdOverride): string | null {
  if (override === UNSET_CUSTOMER) {
    return getCustomerContext()
  }
  return override
}

export function toCustomerOverride(value: unknown): CustomerIdOverride {
  if (value === undefined) {
    return UNSET_CUSTOMER
  }
  if (value === null) {
    return null
  }
  return String(value)
}
