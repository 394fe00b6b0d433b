type LogLevel = 'debug' | 'info' | 'warn' | 'error'

class Logger {
  private isDev = process.env.NODE_ENV === 'development'

  debug(...args: unknown[]): void {
    if (this.isDev) {
      console.debug('[DEBUG]', ...args)
    }
  }

  info(...args: unknown[]): void {
    console.info('[INFO]', ...args)
  }

  warn(...args: unknown[]): void {
    console.warn('[WARN]', ...args)
  }

  error(...args: unknown[]): void {
    console.error('[ERROR]', ...args)
  }

  /**
   * Logger that prefixes every message with `[scope]`.
   */
  scoped(scope: string): Pick<Logger, LogLevel> {
    const tag = `[${scope}]`
    return {
      debug: (...args: unknown[]) => this.debug(tag, ...args),
      info: (...args: unknown[]) => this.info(tag, ...args),
      warn: (...args: unknown[]) => this.warn(tag, ...args),
      error: (...args: unknown[]) => this.error(tag, ...args),
    }
  }
}

export const logger = new Logger()
