const PREFIX = '[myweblog]'

/** Destination for SDK diagnostics. Any object with console-like `warn`/`error` fits. */
export type TLogger = {
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

/** Wraps a sink so every line carries the SDK prefix. Defaults to the console. */
export function createLogger(sink: TLogger = console): TLogger {
  return {
    warn(message: string, ...args: unknown[]): void {
      sink.warn(PREFIX, message, ...args)
    },

    error(message: string, ...args: unknown[]): void {
      sink.error(PREFIX, message, ...args)
    },
  }
}

export const logger: TLogger = createLogger()
