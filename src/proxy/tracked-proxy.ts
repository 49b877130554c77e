import { inspect } from "node:util"
import { MemberLookupError } from "../errors"
import { isFunction, isStructured } from "../helpers/type-guards"
import { memberNames, typeNameOf } from "../helpers/utils"
import { getLogger, Logger } from "../logger"
import type { InterceptionTable, UsageSink } from "../types/usage"
import { wrapMethod } from "./interceptor"
import { compileTable, joinPath, TableNode } from "./table"

export interface TrackedProxyOptions {
  logger?: Logger
}

interface ProxyState {
  target: object
  sink: UsageSink
  node: TableNode
  /** Dotted path of this level, empty at the root */
  path: string
  logger: Logger
}

/** Names answered with `undefined` instead of a lookup error */
const PROBE_NAMES = new Set(["then", "toJSON"])

/** Public members the proxy contributes on top of the target's */
const PROXY_SURFACE = ["toString"]

const INTERNAL_PREFIX = "__tracked"

const proxyStates = new WeakMap<object, ProxyState>()

function isLocked(target: object, name: string): boolean {
  const descriptor = Reflect.getOwnPropertyDescriptor(target, name)
  return descriptor !== undefined && !descriptor.configurable && descriptor.writable === false
}

function describeProxy(state: ProxyState): string {
  return `TrackedProxy(<${typeNameOf(state.target)}>)`
}

function createProxy<T extends object>(target: T, state: ProxyState): T {
  const memo = new Map<string, unknown>()
  const internals = new Map<string, unknown>()

  const toString = () => describeProxy(state)
  const inspectProxy = () => describeProxy(state)

  const resolve = (name: string): unknown => {
    if (memo.has(name)) {
      return memo.get(name)
    }

    if (!(name in target)) {
      if (PROBE_NAMES.has(name)) {
        return undefined
      }
      throw new MemberLookupError(typeNameOf(target), name)
    }

    const member: unknown = Reflect.get(target, name)
    if (isLocked(target, name)) {
      // Frozen members must be returned as-is to satisfy Proxy invariants.
      state.logger.debug(`Member '${joinPath(state.path, name)}' is read-only; forwarding untracked`)
      memo.set(name, member)
      return member
    }
    const extract = state.node.methods.get(name)
    const childNode = state.node.children.get(name)
    let handle: unknown

    if (isFunction(member) && extract) {
      handle = wrapMethod({
        method: member,
        owner: target,
        methodPath: joinPath(state.path, name),
        extract,
        sink: state.sink,
        logger: state.logger,
      })
    } else if (isStructured(member) && childNode) {
      handle = createProxy(member, {
        target: member,
        sink: state.sink,
        node: childNode,
        path: joinPath(state.path, name),
        logger: state.logger,
      })
    } else if (isFunction(member) && name !== "constructor") {
      handle = member.bind(target)
    } else {
      handle = member
    }

    // First resolution wins; later reads always see this handle.
    if (!memo.has(name)) {
      memo.set(name, handle)
    }
    return memo.get(name)
  }

  const proxy = new Proxy(target, {
    get(obj, name) {
      if (typeof name === "symbol") {
        if (name === inspect.custom) {
          return inspectProxy
        }
        return Reflect.get(obj, name)
      }
      if (name === "toString") {
        return toString
      }
      if (name.startsWith(INTERNAL_PREFIX)) {
        return internals.get(name)
      }
      return resolve(name)
    },

    set(obj, name, value) {
      if (typeof name === "string" && name.startsWith(INTERNAL_PREFIX)) {
        internals.set(name, value)
        return true
      }
      return Reflect.set(obj, name, value)
    },

    has(obj, name) {
      if (typeof name === "string" && (PROXY_SURFACE.includes(name) || internals.has(name))) {
        return true
      }
      return Reflect.has(obj, name)
    },

    ownKeys(obj) {
      if (!Reflect.isExtensible(obj)) {
        return Reflect.ownKeys(obj)
      }
      const names = new Set([...PROXY_SURFACE, ...memberNames(obj)])
      const symbols = Reflect.ownKeys(obj).filter((key) => typeof key === "symbol")
      return [...[...names].sort(), ...symbols]
    },

    getOwnPropertyDescriptor(obj, name) {
      const own = Reflect.getOwnPropertyDescriptor(obj, name)
      if (typeof name === "symbol" || name.startsWith(INTERNAL_PREFIX)) {
        return own
      }
      if (own) {
        // Only configurable data properties may report a different value.
        if (!("value" in own) || !own.configurable || !Reflect.isExtensible(obj)) {
          return own
        }
        return { ...own, value: name === "toString" ? toString : resolve(name) }
      }
      if (!Reflect.isExtensible(obj) || (!PROXY_SURFACE.includes(name) && !(name in obj))) {
        return undefined
      }
      return {
        value: name === "toString" ? toString : resolve(name),
        writable: true,
        enumerable: true,
        configurable: true,
      }
    },
  })

  proxyStates.set(proxy, state)
  return proxy
}

/**
 * Wraps `client` so every member access is forwarded to it, while the
 * methods named in `table` (dotted paths for nested namespaces such as
 * `models.generateContent`) report usage to `sink` on each call.
 */
export function createTrackedProxy<T extends object>(
  client: T,
  sink: UsageSink,
  table: InterceptionTable,
  options: TrackedProxyOptions = {},
): T {
  return createProxy(client, {
    target: client,
    sink,
    node: compileTable(table),
    path: "",
    logger: options.logger ?? getLogger(),
  })
}

export function isTrackedProxy(value: unknown): boolean {
  return isStructured(value) && proxyStates.has(value)
}

/** The client object behind a tracked proxy */
export function getTrackedTarget(value: unknown): object | undefined {
  return isStructured(value) ? proxyStates.get(value)?.target : undefined
}
