import { z } from "zod"
import { createConfigurationError } from "../errors"

const booleanFromEnv = z
  .enum(["true", "false", "1", "0"])
  .transform((value) => value === "true" || value === "1")

export const TrackerConfigSchema = z.object({
  apiKey: z.string().min(1, "API key is required"),
  endpoint: z.string().url(),
  timeoutMs: z.number().int().positive().default(5000),
  enabled: z.boolean().default(true),
})

export type TrackerConfig = z.infer<typeof TrackerConfigSchema>
export type TrackerConfigInput = z.input<typeof TrackerConfigSchema>

const EnvSchema = z.object({
  USAGE_TRACKER_API_KEY: z.string().optional(),
  USAGE_TRACKER_ENDPOINT: z.string().optional(),
  USAGE_TRACKER_TIMEOUT_MS: z.coerce.number().optional(),
  USAGE_TRACKER_ENABLED: booleanFromEnv.optional(),
})

export type TrackerEnv = Record<string, string | undefined>

function toIssues(error: z.ZodError) {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }))
}

/**
 * Builds tracker settings from explicit overrides, falling back to the
 * `USAGE_TRACKER_*` environment variables.
 */
export function loadTrackerConfig(
  overrides: Partial<TrackerConfigInput> = {},
  env: TrackerEnv = process.env,
): TrackerConfig {
  const parsedEnv = EnvSchema.safeParse(env)
  if (!parsedEnv.success) {
    throw createConfigurationError(toIssues(parsedEnv.error))
  }
  const fromEnv = parsedEnv.data

  const parsed = TrackerConfigSchema.safeParse({
    apiKey: overrides.apiKey ?? fromEnv.USAGE_TRACKER_API_KEY,
    endpoint: overrides.endpoint ?? fromEnv.USAGE_TRACKER_ENDPOINT,
    timeoutMs: overrides.timeoutMs ?? fromEnv.USAGE_TRACKER_TIMEOUT_MS,
    enabled: overrides.enabled ?? fromEnv.USAGE_TRACKER_ENABLED,
  })
  if (!parsed.success) {
    throw createConfigurationError(toIssues(parsed.error))
  }
  return parsed.data
}
