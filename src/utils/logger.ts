/* eslint-disable no-console */
import type { Logger as LoggerContract } from '../types'

export interface LoggerOptions {
  verbose?: boolean
  /** Suppress everything except errors */
  silent?: boolean
}

export class Logger implements LoggerContract {
  private readonly verbose: boolean
  private readonly silent: boolean

  constructor(options: LoggerOptions | boolean = {}) {
    const resolved = typeof options === 'boolean' ? { verbose: options } : options
    this.verbose = resolved.verbose ?? false
    this.silent = resolved.silent ?? false
  }

  get isVerbose(): boolean {
    return this.verbose
  }

  /**
   * Log info message
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.silent)
      console.log(message, ...args)
  }

  /**
   * Log warning message in yellow
   */
  warn(message: string, ...args: unknown[]): void {
    if (!this.silent)
      console.warn(`\x1B[33m⚠\x1B[0m ${message}`, ...args)
  }

  /**
   * Log error message in red
   */
  error(message: string, ...args: unknown[]): void {
    console.error(`\x1B[31m✖\x1B[0m ${message}`, ...args)
  }

  /**
   * Log debug message in gray (only if verbose)
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.verbose && !this.silent)
      console.log(`\x1B[90m🐛\x1B[0m ${message}`, ...args)
  }

  /**
   * Log success message in green
   */
  success(message: string, ...args: unknown[]): void {
    if (!this.silent)
      console.log(`\x1B[32m✓\x1B[0m ${message}`, ...args)
  }

  static verbose(): Logger {
    return new Logger({ verbose: true })
  }

  static quiet(): Logger {
    return new Logger({ verbose: false })
  }

  /** Logger that only reports errors, used for machine-readable output */
  static silent(): Logger {
    return new Logger({ silent: true })
  }
}
