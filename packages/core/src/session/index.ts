/**
 * Session Module
 *
 * Per-run text log of node transitions and the final judgment.
 */

export { createNoopLogger, NoopSessionLogger, SessionLogger } from './logger'
export type { SessionLoggerInstance, SessionLoggerOptions, SessionLogLevel } from './types'
