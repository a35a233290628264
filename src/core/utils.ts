import { ConfigurationError } from './errors.ts'

export function normalizeBaseUrl(url: string): string {
  return url.replace(/\/+$/, '')
}

export function resolveFetch(override?: typeof fetch): typeof fetch {
  const resolved: typeof fetch | undefined = override ?? globalThis.fetch
  if (typeof resolved !== 'function') {
    throw new ConfigurationError(
      'No fetch implementation available. Provide a fetchImplementation option or use Node.js >= 20.',
    )
  }
  return resolved
}

export async function extractResponseErrorDetail(response: Response): Promise<string> {
  try {
    const body: unknown = await response.json()
    if (isRecord(body)) {
      const detail = body.errorMessage ?? body.message
      if (typeof detail === 'string' && detail) return `: ${detail}`
    }
  } catch {
    // Body is not JSON
  }

  return ''
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export const noop = (): void => undefined

/**
 * Returns a signal that aborts as soon as any of the given signals does.
 * Undefined entries are skipped. Call `cleanup` once the signal is no longer needed:
 * it detaches the listeners added to the inputs, which may outlive many requests.
 */
export function combineAbortSignals(...signals: Array<AbortSignal | undefined>): {
  signal: AbortSignal
  cleanup: () => void
} {
  const present = signals.filter((signal): signal is AbortSignal => signal !== undefined)
  if (present.length === 1) return { signal: present[0], cleanup: noop }

  const controller = new AbortController()
  if (present.some((signal) => signal.aborted)) {
    controller.abort()
    return { signal: controller.signal, cleanup: noop }
  }

  const abort = () => controller.abort()
  for (const signal of present) {
    signal.addEventListener('abort', abort, { once: true })
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const signal of present) signal.removeEventListener('abort', abort)
    },
  }
}

export function validateUrl(name: string, url: string): void {
  try {
    new URL(url)
  } catch {
    throw new ConfigurationError(`Invalid ${name}: "${url}"`)
  }
}

export function validatePositiveInteger(name: string, value: unknown): void {
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer`)
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

function assertValidDate(value: Date): void {
  if (Number.isNaN(value.getTime())) {
    throw new ConfigurationError('Invalid Date value')
  }
}

/** Formats a date as `yyyy-mm-dd` in local time; strings pass through. */
export function formatDate(value: Date | string): string {
  if (typeof value === 'string') return value
  assertValidDate(value)
  return `${value.getFullYear()}-${pad(value.getMonth() + 1)}-${pad(value.getDate())}`
}

/**
 * Formats a date as `yyyy-mm-ddTHH:mm±hh:mm` using the local UTC offset; strings pass through.
 * This is the form the booking endpoints accept for `bStart`/`bEnd`.
 */
export function formatDateTime(value: Date | string): string {
  if (typeof value === 'string') return value
  assertValidDate(value)

  const offsetMinutes = -value.getTimezoneOffset()
  const sign = offsetMinutes >= 0 ? '+' : '-'
  const absoluteOffset = Math.abs(offsetMinutes)
  const offset = `${sign}${pad(Math.floor(absoluteOffset / 60))}:${pad(absoluteOffset % 60)}`

  return `${formatDate(value)}T${pad(value.getHours())}:${pad(value.getMinutes())}${offset}`
}
