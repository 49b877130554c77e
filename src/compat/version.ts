import { existsSync, readFileSync } from "node:fs"
import { dirname, join } from "node:path"
import semver from "semver"
import { isRecord } from "../helpers/type-guards"
import { getLogger, Logger } from "../logger"
import type { ProviderType } from "../types/providers"

export interface VersionRequirement {
  packageName: string
  minimum: string
  /** First version this library has not been tested against */
  untestedFrom: string
}

export const SDK_REQUIREMENTS: Record<ProviderType, VersionRequirement> = {
  google: { packageName: "@google/genai", minimum: "1.0.0", untestedFrom: "2.0.0" },
  openai: { packageName: "openai", minimum: "4.0.0", untestedFrom: "6.0.0" },
  anthropic: { packageName: "@anthropic-ai/sdk", minimum: "0.20.0", untestedFrom: "1.0.0" },
}

export const MINIMUM_NODE_VERSION = "20.0.0"

export type VersionReader = (packageName: string) => string | null

export interface CompatibilityInfo {
  library: {
    name: string
    version: string | null
    supported: boolean
  }
  node: {
    version: string
    supported: boolean
  }
}

function readPackageVersion(file: string, packageName: string): string | null {
  const manifest: unknown = JSON.parse(readFileSync(file, "utf8"))
  if (isRecord(manifest) && manifest.name === packageName && typeof manifest.version === "string") {
    return manifest.version
  }
  return null
}

/**
 * Finds the installed version of `packageName` by walking up from its
 * resolved entry point to the package's own `package.json`.
 */
export const readInstalledVersion: VersionReader = (packageName) => {
  let entry: string
  try {
    entry = require.resolve(packageName)
  } catch {
    return null
  }

  let dir = dirname(entry)
  while (true) {
    const manifest = join(dir, "package.json")
    if (existsSync(manifest)) {
      const version = readPackageVersion(manifest, packageName)
      if (version) {
        return version
      }
    }
    const parent = dirname(dir)
    if (parent === dir) {
      return null
    }
    dir = parent
  }
}

export interface VersionCompatibilityOptions {
  readVersion?: VersionReader
  logger?: Logger
  nodeVersion?: string
}

export class VersionCompatibility {
  readonly version: string | null
  readonly warnings: string[] = []
  private readonly nodeVersion: string

  constructor(
    readonly requirement: VersionRequirement,
    options: VersionCompatibilityOptions = {},
  ) {
    const readVersion = options.readVersion ?? readInstalledVersion
    this.version = readVersion(requirement.packageName)
    this.nodeVersion = options.nodeVersion ?? process.versions.node

    const warning = this.describeProblem()
    if (warning) {
      this.warnings.push(warning)
      ;(options.logger ?? getLogger()).warn(warning)
    }
  }

  private describeProblem(): string | null {
    const { packageName, minimum, untestedFrom } = this.requirement
    if (this.version === null) {
      return `${packageName} not found. Install it to use its tracked client.`
    }
    const parsed = semver.coerce(this.version)
    if (!parsed) {
      return `${packageName} version '${this.version}' could not be parsed`
    }
    if (semver.lt(parsed, minimum)) {
      return `${packageName} ${this.version} is below minimum supported version ${minimum}`
    }
    if (semver.gte(parsed, untestedFrom)) {
      return `${packageName} ${this.version} is newer than tested versions (< ${untestedFrom}); tracking may not capture all usage`
    }
    return null
  }

  isSupported(): boolean {
    if (this.version === null) {
      return false
    }
    const parsed = semver.coerce(this.version)
    return parsed !== null && semver.gte(parsed, this.requirement.minimum)
  }

  isNodeSupported(): boolean {
    const parsed = semver.coerce(this.nodeVersion)
    return parsed !== null && semver.gte(parsed, MINIMUM_NODE_VERSION)
  }

  getInfo(): CompatibilityInfo {
    return {
      library: {
        name: this.requirement.packageName,
        version: this.version,
        supported: this.isSupported(),
      },
      node: {
        version: this.nodeVersion,
        supported: this.isNodeSupported(),
      },
    }
  }
}

const probed = new Map<string, VersionCompatibility>()

/**
 * Probes a provider SDK once per process; later calls reuse the result so
 * the warning is only logged at first initialization.
 */
export function probeCompatibility(
  provider: ProviderType,
  options: VersionCompatibilityOptions = {},
): VersionCompatibility {
  const requirement = SDK_REQUIREMENTS[provider]
  const existing = probed.get(requirement.packageName)
  if (existing) {
    return existing
  }
  const compat = new VersionCompatibility(requirement, options)
  probed.set(requirement.packageName, compat)
  return compat
}

export function resetCompatibilityCache(): void {
  probed.clear()
}

export function getCompatibilityInfo(
  provider: ProviderType = "google",
  options: VersionCompatibilityOptions = {},
): CompatibilityInfo {
  return probeCompatibility(provider, options).getInfo()
}

export function checkCompatibility(
  provider: ProviderType = "google",
  options: VersionCompatibilityOptions = {},
): boolean {
  const compat = probeCompatibility(provider, options)
  return compat.isSupported() && compat.isNodeSupported()
}
