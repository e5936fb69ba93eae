/**
 * Run log types
 *
 * Each CLI invocation writes one plain-text log. Lines are timestamped and
 * meant for people, not for parsing.
 */

export type SessionLogLevel = 'info' | 'warn' | 'error'

export interface SessionLoggerOptions {
  /** Log file path; truncated when the logger is created */
  path: string
  /** Clock for line timestamps (default: `() => new Date()`) */
  clock?: () => Date
}

/**
 * What both the file logger and the no-op logger accept
 */
export interface SessionLoggerInstance {
  readonly path: string
  info(message: string): void
  warn(message: string): void
  error(message: string): void
  /** Record a node execution and the full state it produced */
  transition(node: string, output: unknown): void
  close(): Promise<void>
}
