export interface Logger {
  debug(message: string, ...meta: unknown[]): void
  info(message: string, ...meta: unknown[]): void
  warn(message: string, ...meta: unknown[]): void
  error(message: string, ...meta: unknown[]): void
}

const PREFIX = "[USAGE PROXY]"

export const consoleLogger: Logger = {
  debug: (message, ...meta) => console.debug(`${PREFIX} ${message}`, ...meta),
  info: (message, ...meta) => console.log(`${PREFIX} ${message}`, ...meta),
  warn: (message, ...meta) => console.warn(`${PREFIX} ${message}`, ...meta),
  error: (message, ...meta) => console.error(`${PREFIX} ${message}`, ...meta),
}

let activeLogger: Logger = consoleLogger

export function setLogger(logger: Logger): void {
  activeLogger = logger
}

export function getLogger(): Logger {
  return activeLogger
}

export function resetLogger(): void {
  activeLogger = consoleLogger
}

export function describeError(error: unknown): string {
  try {
    return error instanceof Error ? error.message : String(error)
  } catch {
    return Object.prototype.toString.call(error)
  }
}
