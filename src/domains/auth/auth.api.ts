import {
  AbortOperationError,
  AuthError,
  NetworkError,
  ProtocolError,
  TimeoutError,
} from '../../core/errors.ts'
import { USER_AGENT } from '../../core/sdk-info.ts'
import { combineAbortSignals, isRecord, resolveFetch } from '../../core/utils.ts'

export const DEFAULT_TOKEN_URL = 'https://pyMyweblog.azurewebsites.net/api/GetAppToken'
const DEFAULT_EXCHANGE_TIMEOUT_MS = 10_000

export type TAuthApiOptions = {
  /** Token exchange endpoint. */
  tokenUrl?: string
  /** Optional fetch implementation for testing */
  fetchImplementation?: typeof fetch
}

export type TExchangeSecretOptions = {
  signal?: AbortSignal
  timeoutMs?: number
}

/**
 * Low-level client for the app token exchange.
 * Trades a pre-shared app secret for an app token with a single GET.
 */
export class AuthApi {
  private readonly tokenUrl: string
  private readonly fetchImpl: typeof fetch

  constructor(options: TAuthApiOptions = {}) {
    this.tokenUrl = options.tokenUrl ?? DEFAULT_TOKEN_URL
    this.fetchImpl = resolveFetch(options.fetchImplementation)
  }

  /** Calls the token endpoint with the `X-app-secret` header and returns the issued token. */
  async exchangeSecret(appSecret: string, options?: TExchangeSecretOptions): Promise<string> {
    const timeoutMs = options?.timeoutMs ?? DEFAULT_EXCHANGE_TIMEOUT_MS

    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs)
    const { signal: combinedSignal, cleanup } = combineAbortSignals(
      controller.signal,
      options?.signal,
    )

    try {
      let response: Response
      try {
        response = await this.fetchImpl(this.tokenUrl, {
          method: 'GET',
          headers: {
            'X-app-secret': appSecret,
            Accept: 'application/json',
            'User-Agent': USER_AGENT,
          },
          signal: combinedSignal,
        })
      } catch (error) {
        if (controller.signal.aborted) {
          throw new TimeoutError(`App token request timed out after ${timeoutMs}ms`)
        }
        if (options?.signal?.aborted) {
          throw new AbortOperationError('App token request was cancelled')
        }
        const detail = error instanceof Error ? error.message : String(error)
        throw new NetworkError(`Network error fetching app token: ${detail}`, { cause: error })
      }

      if (!response.ok) {
        throw new AuthError(`App token exchange failed with status ${response.status}`)
      }

      let body: unknown
      try {
        body = JSON.parse(await response.text())
      } catch {
        throw new ProtocolError('App token response is not valid JSON')
      }

      if (!isRecord(body) || typeof body.app_token !== 'string' || !body.app_token) {
        throw new AuthError('App token response missing app_token')
      }

      return body.app_token
    } finally {
      clearTimeout(timeoutId)
      cleanup()
    }
  }
}
