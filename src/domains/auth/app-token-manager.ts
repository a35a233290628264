import { AbortOperationError, AuthError, ConfigurationError } from '../../core/errors.ts'
import type { TAuthProvider, TCredentialParams } from '../../core/types.ts'
import { combineAbortSignals, noop } from '../../core/utils.ts'
import type { AuthApi } from './auth.api.ts'

export type TAppTokenManagerOptions = {
  authApi: AuthApi
  username: string
  password: string
  /** Token issued out of band. Used as-is and never dropped. */
  appToken?: string
  /** Secret exchanged for a token on demand. */
  appSecret?: string
  /** Aborts any running exchange, e.g. when the client is closed. */
  closeSignal?: AbortSignal
}

type TStoredToken = {
  token: string
  /** True when the token came from an exchange and can be re-issued. */
  exchanged: boolean
}

/**
 * Holds the session's credentials and its single app token.
 *
 * - A caller-supplied token is used until replaced by an explicit exchange
 * - Without a token, the first request exchanges the configured secret
 * - Concurrent first requests share one exchange; a caller that aborts only stops waiting
 * - Each exchange overwrites the stored token
 */
export class AppTokenManager implements TAuthProvider {
  private readonly authApi: AuthApi
  private readonly username: string
  private readonly password: string
  private readonly appSecret?: string
  private readonly closeSignal?: AbortSignal

  private storedToken: TStoredToken | null
  private pendingExchange: Promise<string> | null = null

  constructor(options: TAppTokenManagerOptions) {
    this.authApi = options.authApi
    this.username = options.username
    this.password = options.password
    this.appSecret = options.appSecret
    this.closeSignal = options.closeSignal
    this.storedToken = options.appToken ? { token: options.appToken, exchanged: false } : null
  }

  /** The stored app token, or null before one was supplied or obtained. */
  get appToken(): string | null {
    return this.storedToken?.token ?? null
  }

  /** Exchanges the given (or configured) secret for a new token and stores it. */
  async obtainAppToken(appSecret?: string, signal?: AbortSignal): Promise<string> {
    const secret = appSecret ?? this.appSecret
    if (!secret) {
      throw new ConfigurationError('appSecret is required to obtain an app token')
    }

    const { signal: exchangeSignal, cleanup } = combineAbortSignals(signal, this.closeSignal)
    try {
      return await this.exchange(secret, exchangeSignal)
    } finally {
      cleanup()
    }
  }

  async getCredentials(signal?: AbortSignal): Promise<TCredentialParams> {
    const token = this.storedToken?.token ?? (await this.exchangeWithCoalescing(signal))
    return { mwl_u: this.username, mwl_p: this.password, app_token: token }
  }

  onAuthFailure(): void {
    if (this.storedToken?.exchanged) {
      this.storedToken = null
    }
  }

  private async exchange(secret: string, signal?: AbortSignal): Promise<string> {
    try {
      const token = await this.authApi.exchangeSecret(secret, { signal })
      this.storedToken = { token, exchanged: true }
      return token
    } catch (error) {
      if (this.closeSignal?.aborted) throw new AbortOperationError('Client is closed')
      throw error
    }
  }

  private async exchangeWithCoalescing(signal?: AbortSignal): Promise<string> {
    if (!this.appSecret) {
      throw new AuthError(
        'No app token available. Provide appToken or appSecret, or call obtainAppToken() first.',
      )
    }

    if (!this.pendingExchange) {
      // Bounded by the exchange timeout and the close signal, not by any one caller
      this.pendingExchange = this.exchange(this.appSecret, this.closeSignal).finally(() => {
        this.pendingExchange = null
      })
      // Keeps the rejection handled when every caller has aborted
      this.pendingExchange.catch(noop)
    }

    if (signal?.aborted) {
      throw new AbortOperationError('App token request was cancelled')
    }
    if (!signal) {
      return await this.pendingExchange
    }

    let abortHandler: (() => void) | undefined
    try {
      return await Promise.race([
        this.pendingExchange,
        new Promise<never>((_, reject) => {
          abortHandler = () => reject(new AbortOperationError('App token request was cancelled'))
          signal.addEventListener('abort', abortHandler, { once: true })
        }),
      ])
    } finally {
      if (abortHandler) signal.removeEventListener('abort', abortHandler)
    }
  }
}
