import { ConfigurationError } from './errors.ts'

export type TEnvironment = Record<string, string | undefined>

/** Client options that can be sourced from environment variables. */
export type TEnvironmentOptions = {
  username: string
  password: string
  appToken?: string
  appSecret?: string
  baseUrl?: string
  apiVersion?: string
  timeoutMs?: number
}

function readOptional(env: TEnvironment, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim()
    if (value) return value
  }
  return undefined
}

/**
 * Reads client options from `MYWEBLOG_*` variables.
 *
 * `APP_SECRET` is accepted as a fallback for `MYWEBLOG_APP_SECRET`.
 */
export function loadOptionsFromEnv(env: TEnvironment = process.env): TEnvironmentOptions {
  const username = readOptional(env, 'MYWEBLOG_USERNAME')
  const password = readOptional(env, 'MYWEBLOG_PASSWORD')
  if (!username || !password) {
    throw new ConfigurationError('MYWEBLOG_USERNAME and MYWEBLOG_PASSWORD must be set')
  }

  const rawTimeout = readOptional(env, 'MYWEBLOG_TIMEOUT_MS')
  let timeoutMs: number | undefined
  if (rawTimeout !== undefined) {
    timeoutMs = Number(rawTimeout)
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(
        `MYWEBLOG_TIMEOUT_MS must be a positive integer, got "${rawTimeout}"`,
      )
    }
  }

  return {
    username,
    password,
    appToken: readOptional(env, 'MYWEBLOG_APP_TOKEN'),
    appSecret: readOptional(env, 'MYWEBLOG_APP_SECRET', 'APP_SECRET'),
    baseUrl: readOptional(env, 'MYWEBLOG_BASE_URL'),
    apiVersion: readOptional(env, 'MYWEBLOG_API_VERSION'),
    timeoutMs,
  }
}
