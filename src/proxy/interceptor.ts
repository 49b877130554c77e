import { CustomerIdOverride, toCustomerOverride, UNSET_CUSTOMER } from "../context/customer"
import { AnyFunction, isPlainObject, isPromiseLike, isRecord } from "../helpers/type-guards"
import { generateRequestId } from "../helpers/utils"
import { describeError, Logger } from "../logger"
import type {
  CallContext,
  ErrorClassification,
  ExtractionFunction,
  UsageMetadata,
  UsageSink,
} from "../types/usage"

export const RESERVED_KEYS = ["customerId", "trackUsage", "metadata"] as const

interface CallSiteOptions {
  customerId: CustomerIdOverride
  trackUsage: boolean
  metadata: UsageMetadata | null
}

export interface WrapMethodOptions {
  method: AnyFunction
  /** `this` for the real method */
  owner: object
  methodPath: string
  extract: ExtractionFunction
  sink: UsageSink
  logger: Logger
}

/**
 * Splits the reserved tracking keys off the trailing argument. The caller's
 * object is copied, never mutated, and dropped entirely when nothing but
 * reserved keys was in it. `requestFields` names reserved keys that the SDK
 * also defines on its request body; when the trailing argument is the body
 * itself they are forwarded untouched.
 */
export function extractCallSiteOptions(
  args: readonly unknown[],
  requestFields: readonly string[] = [],
): {
  forwarded: unknown[]
  options: CallSiteOptions
} {
  const options: CallSiteOptions = {
    customerId: UNSET_CUSTOMER,
    trackUsage: true,
    metadata: null,
  }
  const last = args[args.length - 1]
  const reserved = new Set<string>(
    args.length === 1 ? RESERVED_KEYS.filter((key) => !requestFields.includes(key)) : RESERVED_KEYS,
  )
  if (!isPlainObject(last) || ![...reserved].some((key) => key in last)) {
    return { forwarded: [...args], options }
  }

  const taken: Record<string, unknown> = {}
  const rest: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(last)) {
    if (reserved.has(key)) {
      taken[key] = value
    } else {
      rest[key] = value
    }
  }
  options.customerId = toCustomerOverride(taken.customerId)
  options.trackUsage = taken.trackUsage !== false
  options.metadata = isRecord(taken.metadata) ? { ...taken.metadata } : null

  const forwarded = args.slice(0, -1)
  if (Object.keys(rest).length > 0) {
    forwarded.push(rest)
  }
  return { forwarded, options }
}

function readStatusCode(error: object): string | null {
  if ("code" in error && typeof error.code === "function") {
    try {
      return String(error.code.call(error))
    } catch {
      return null
    }
  }
  if ("status" in error && typeof error.status === "number") {
    return String(error.status)
  }
  if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
    return String(error.code)
  }
  return null
}

/**
 * Transport failures carry a status code (gRPC `code()`, HTTP `status`,
 * or a socket error `code`); anything else is reported as an SDK error.
 */
export function classifyError(error: unknown): ErrorClassification {
  const message = describeError(error)
  const code = isRecord(error) ? readStatusCode(error) : null
  if (code !== null) {
    return { kind: "transport_error", code, message }
  }
  return { kind: "sdk_error", code: null, message }
}

export function wrapMethod<F extends AnyFunction>(options: WrapMethodOptions & { method: F }): F
export function wrapMethod(options: WrapMethodOptions): AnyFunction {
  const { method, owner, methodPath, extract, sink, logger } = options

  const report = (
    callSite: CallSiteOptions,
    context: CallContext,
    result: unknown,
  ): void => {
    if (!callSite.trackUsage) {
      return
    }
    try {
      extract({
        result,
        customerId: callSite.customerId,
        sink,
        methodPath,
        args: context.args,
        metadata: callSite.metadata,
        context,
        logger,
      })
    } catch (error) {
      const what = context.outcome === "failure" ? "error" : "usage"
      logger.warn(`Failed to track ${what} for ${methodPath}: ${describeError(error)}`)
    }
  }

  const wrapped = function (...args: unknown[]): unknown {
    const { forwarded, options: callSite } = extractCallSiteOptions(args, extract.requestFields)
    const requestId = generateRequestId()
    const startTime = Date.now()

    const succeed = (result: unknown): void => {
      report(
        callSite,
        { requestId, methodPath, args: forwarded, startTime, endTime: Date.now(), outcome: "success" },
        result,
      )
    }
    const fail = (error: unknown): void => {
      let classification: ErrorClassification
      try {
        classification = classifyError(error)
      } catch (classifyFailure) {
        logger.warn(`Failed to track error for ${methodPath}: ${describeError(classifyFailure)}`)
        return
      }
      report(
        callSite,
        {
          requestId,
          methodPath,
          args: forwarded,
          startTime,
          endTime: Date.now(),
          outcome: "failure",
          error: classification,
        },
        null,
      )
    }

    let result: unknown
    try {
      result = Reflect.apply(method, owner, forwarded)
    } catch (error) {
      fail(error)
      throw error
    }

    if (isPromiseLike(result)) {
      // The caller keeps the SDK's own promise object; tracking rides on a
      // side branch that owns its rejection.
      void result.then(succeed, fail)
      return result
    }

    succeed(result)
    return result
  }

  Object.defineProperty(wrapped, "name", { value: method.name || methodPath })
  Object.defineProperty(wrapped, "length", { value: method.length })
  return wrapped
}
