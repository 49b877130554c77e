import { v4 as uuidv4 } from "uuid"
import { isRecord } from "./type-guards"

export function generateRequestId(): string {
  return uuidv4()
}

export function readNumber(source: unknown, key: string): number {
  if (!isRecord(source)) {
    return 0
  }
  const value = source[key]
  return typeof value === "number" && Number.isFinite(value) ? value : 0
}

export function readOptional(source: unknown, key: string): unknown {
  if (!isRecord(source)) {
    return undefined
  }
  return source[key]
}

export function typeNameOf(target: object): string {
  if (typeof target === "function") {
    return target.name || "Function"
  }
  const ctor: unknown = Object.getPrototypeOf(target)?.constructor
  return typeof ctor === "function" && ctor.name ? ctor.name : "Object"
}

/**
 * Every string member name reachable on `target`, own and inherited, up to
 * but excluding `Object.prototype`.
 */
export function memberNames(target: object): string[] {
  const names = new Set<string>()
  let current: object | null = target
  while (current && current !== Object.prototype && current !== Function.prototype) {
    for (const name of Object.getOwnPropertyNames(current)) {
      if (name !== "constructor") {
        names.add(name)
      }
    }
    current = Object.getPrototypeOf(current)
  }
  return [...names]
}
