import { InterceptionTableError } from "../errors"
import type { ExtractionFunction, InterceptionTable } from "../types/usage"

/**
 * One nesting level of an interception table. `methods` holds the tracked
 * members at this level, `children` the namespaces that lead to deeper ones.
 */
export interface TableNode {
  methods: ReadonlyMap<string, ExtractionFunction>
  children: ReadonlyMap<string, TableNode>
}

interface MutableNode {
  methods: Map<string, ExtractionFunction>
  children: Map<string, MutableNode>
}

function createNode(): MutableNode {
  return { methods: new Map(), children: new Map() }
}

export function compileTable(table: InterceptionTable): TableNode {
  const root = createNode()

  for (const [key, extract] of Object.entries(table)) {
    const segments = key.split(".")
    if (segments.some((segment) => segment.length === 0)) {
      throw new InterceptionTableError(
        `Invalid interception table key '${key}': empty path segment`,
        key,
      )
    }
    if (typeof extract !== "function") {
      throw new InterceptionTableError(
        `Invalid interception table key '${key}': extraction function required`,
        key,
      )
    }

    let node = root
    for (const segment of segments.slice(0, -1)) {
      let child = node.children.get(segment)
      if (!child) {
        child = createNode()
        node.children.set(segment, child)
      }
      node = child
    }
    node.methods.set(segments[segments.length - 1], extract)
  }

  return root
}

export function joinPath(prefix: string, name: string): string {
  return prefix ? `${prefix}.${name}` : name
}

/** Flattens a compiled node back into dotted keys, mainly for inspection */
export function tablePaths(node: TableNode, prefix = ""): string[] {
  const paths = [...node.methods.keys()].map((name) => joinPath(prefix, name))
  for (const [name, child] of node.children) {
    paths.push(...tablePaths(child, joinPath(prefix, name)))
  }
  return paths.sort()
}
