export type UsageProxyErrorCode =
  | "member_not_found"
  | "invalid_table"
  | "invalid_config"

export class UsageProxyError extends Error {
  constructor(
    message: string,
    public code: UsageProxyErrorCode,
    public details?: unknown,
  ) {
    super(message)
    this.name = "UsageProxyError"
  }
}

/**
 * Raised when a member is read through a tracked proxy and the wrapped
 * client has no member of that name.
 */
export class MemberLookupError extends UsageProxyError {
  constructor(
    public targetType: string,
    public member: string,
  ) {
    super(`'${targetType}' object has no member '${member}'`, "member_not_found", {
      targetType,
      member,
    })
    this.name = "MemberLookupError"
  }
}

export class InterceptionTableError extends UsageProxyError {
  constructor(
    message: string,
    public key: string,
  ) {
    super(message, "invalid_table", { key })
    this.name = "InterceptionTableError"
  }
}

export interface ConfigurationIssue {
  path: string
  message: string
}

export class ConfigurationError extends UsageProxyError {
  constructor(
    message: string,
    public issues: ConfigurationIssue[],
  ) {
    super(message, "invalid_config", { issues })
    this.name = "ConfigurationError"
  }
}

export function createConfigurationError(
  issues: ConfigurationIssue[],
): ConfigurationError {
  const summary = issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join("; ")
  return new ConfigurationError(`Invalid tracker configuration: ${summary}`, issues)
}
