/**
 * Console diagnostics, namespaced `agora:<scope>`.
 *
 * Debug lines print only when `AGORA_DEBUG=true` or `DEBUG` lists `agora`,
 * `agora:*` or the exact namespace. Warnings and errors always go to stderr.
 */

type Env = Record<string, string | undefined>

export interface ConsoleLogger {
  readonly namespace: string
  debug(message: string, data?: unknown): void
  warn(message: string): void
  error(message: string, cause?: unknown): void
}

export function isDebugEnabled(namespace: string, env: Env = process.env): boolean {
  if (env.AGORA_DEBUG === 'true') return true
  const names = (env.DEBUG ?? '').split(',').map((name) => name.trim())
  return names.some((name) => name === 'agora' || name === 'agora:*' || name === namespace)
}

const render = (value: unknown): string => {
  if (value instanceof Error) return value.message
  return typeof value === 'object' ? JSON.stringify(value) : String(value)
}

class ScopedLogger implements ConsoleLogger {
  readonly namespace: string
  private verbose: boolean

  constructor(namespace: string, verbose: boolean) {
    this.namespace = namespace
    this.verbose = verbose
  }

  debug(message: string, data?: unknown): void {
    if (!this.verbose) return
    console.error(this.line(data === undefined ? message : `${message} ${render(data)}`))
  }

  warn(message: string): void {
    console.warn(this.line(message))
  }

  error(message: string, cause?: unknown): void {
    console.error(this.line(cause === undefined ? message : `${message} (${render(cause)})`))
  }

  private line(message: string): string {
    return `${this.namespace} ${message}`
  }
}

export function createLogger(scope: string, options: { env?: Env } = {}): ConsoleLogger {
  const namespace = `agora:${scope}`
  return new ScopedLogger(namespace, isDebugEnabled(namespace, options.env))
}
