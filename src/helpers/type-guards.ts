export function isRecord(obj: unknown): obj is Record<string, unknown> {
  return typeof obj === "object" && obj !== null
}

/** Object literals and `Object.create(null)` maps, not class instances or arrays */
export function isPlainObject(obj: unknown): obj is Record<string, unknown> {
  if (!isRecord(obj) || Array.isArray(obj)) {
    return false
  }
  const proto = Object.getPrototypeOf(obj)
  return proto === Object.prototype || proto === null
}

export function isPromiseLike(obj: unknown): obj is PromiseLike<unknown> {
  return (
    (typeof obj === "object" || typeof obj === "function") &&
    obj !== null &&
    "then" in obj &&
    typeof obj.then === "function"
  )
}

export function isStructured(obj: unknown): obj is object {
  return (typeof obj === "object" && obj !== null) || typeof obj === "function"
}

export type AnyFunction = (...args: never[]) => unknown

export function isFunction(obj: unknown): obj is AnyFunction {
  return typeof obj === "function"
}
