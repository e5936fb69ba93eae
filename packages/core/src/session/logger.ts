import { once } from 'node:events'
import { createWriteStream, type WriteStream } from 'node:fs'
import { mkdir } from 'node:fs/promises'
import { dirname } from 'node:path'
import { finished } from 'node:stream/promises'
import { ConfigurationError } from '../errors'
import { createLogger } from '../utils/logger'
import type { SessionLoggerInstance, SessionLoggerOptions, SessionLogLevel } from './types'

const log = createLogger('session')

/**
 * Append-only text log for a single debate run.
 *
 * Line format: `2026-01-01T00:00:00.000Z - INFO - message`
 */
export class SessionLogger implements SessionLoggerInstance {
  private stream: WriteStream
  private clock: () => Date
  private logPath: string
  private closed = false
  private failure: Error | undefined

  private constructor(path: string, stream: WriteStream, clock: () => Date) {
    this.logPath = path
    this.stream = stream
    this.clock = clock
    stream.on('error', (error) => {
      this.failure = error
      this.closed = true
      log.warn(`Run log ${path} stopped: ${error.message}`)
    })
  }

  /**
   * Open the log, truncating any previous run. Throws ConfigurationError
   * when the path cannot be opened for writing.
   */
  static async create(options: SessionLoggerOptions): Promise<SessionLogger> {
    try {
      await mkdir(dirname(options.path), { recursive: true })
      const stream = createWriteStream(options.path, { flags: 'w', encoding: 'utf-8' })
      await once(stream, 'open')
      return new SessionLogger(options.path, stream, options.clock ?? (() => new Date()))
    } catch (error) {
      throw new ConfigurationError(`Cannot open log file ${options.path}`, { cause: error })
    }
  }

  get path(): string {
    return this.logPath
  }

  info(message: string): void {
    this.write('info', message)
  }

  warn(message: string): void {
    this.write('warn', message)
  }

  error(message: string): void {
    this.write('error', message)
  }

  transition(node: string, output: unknown): void {
    this.info(`--- Executing Node: ${node} ---`)
    this.info(`Node Output: ${JSON.stringify(output)}`)
  }

  async close(): Promise<void> {
    if (this.closed) return
    this.closed = true
    this.stream.end()
    try {
      await finished(this.stream)
    } catch (error) {
      // already reported by the 'error' listener
      if (error !== this.failure) throw error
    }
  }

  private write(level: SessionLogLevel, message: string): void {
    if (this.closed) return
    this.stream.write(`${this.clock().toISOString()} - ${level.toUpperCase()} - ${message}\n`)
  }
}

export class NoopSessionLogger implements SessionLoggerInstance {
  get path(): string {
    return ''
  }
  info(_message: string): void {}
  warn(_message: string): void {}
  error(_message: string): void {}
  transition(_node: string, _output: unknown): void {}
  async close(): Promise<void> {}
}

export function createNoopLogger(): NoopSessionLogger {
  return new NoopSessionLogger()
}
