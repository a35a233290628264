import { ConfigurationError } from '../core/errors.ts'
import { createLogger, logger as defaultLogger, type TLogger } from '../core/logger.ts'
import { Transport } from '../core/transport.ts'
import { validateRequiredStrings, validateUrl } from '../core/utils.ts'
import { AccountApi, type TGetTransactionsOptions } from '../domains/account/account.api.ts'
import { AppTokenManager } from '../domains/auth/app-token-manager.ts'
import { AuthApi, DEFAULT_TOKEN_URL } from '../domains/auth/auth.api.ts'
import {
  BookingsApi,
  type TCreateBookingInput,
  type TGetBookingsOptions,
} from '../domains/bookings/bookings.api.ts'
import { FlightLogApi, type TGetFlightLogOptions } from '../domains/flight-log/flight-log.api.ts'
import { ObjectsApi, type TGetObjectsOptions } from '../domains/objects/objects.api.ts'
import type {
  TBalanceResult,
  TBookingsResult,
  TFlightLogResult,
  TMutationResult,
  TObjectsResult,
  TTransactionsResult,
} from '../types/api.ts'

export const DEFAULT_BASE_URL = 'https://api.myweblog.se/api_mobile.php'
export const DEFAULT_API_VERSION = '2.0.3'

export type TMyWebLogOptions = {
  /** Member login, sent as `mwl_u`. */
  username: string
  /** Member password, sent as `mwl_p`. */
  password: string
  /** Pre-obtained app token. */
  appToken?: string
  /** Secret exchanged for an app token when none is stored. */
  appSecret?: string
  /** API endpoint without query string (default: https://api.myweblog.se/api_mobile.php) */
  baseUrl?: string
  /** Expected `APIVersion`, also sent as `version` (default: 2.0.3) */
  apiVersion?: string
  /** App token exchange endpoint. */
  tokenUrl?: string
  /** Response language (default: se) */
  language?: string
  /** Per-request timeout in milliseconds (default: 10000) */
  timeoutMs?: number
  /** Receives SDK warnings and errors (default: console) */
  logger?: TLogger
  /** Optional fetch implementation for testing */
  fetchImplementation?: typeof fetch
}

/**
 * MyWebLog client. One instance is one session: credentials plus at most one app token.
 *
 * @example
 * ```typescript
 * const client = new MyWebLog({ username: 'member', password: 'secret', appSecret: 'app-secret' })
 *
 * await client.obtainAppToken()
 * const { Object: aircraft } = await client.getObjects()
 * const { Booking } = await client.getBookings(Number(aircraft[0].ID), { myBookings: true })
 *
 * client.close()
 * ```
 */
export class MyWebLog {
  private readonly tokenManager: AppTokenManager
  private readonly objectsApi: ObjectsApi
  private readonly bookingsApi: BookingsApi
  private readonly accountApi: AccountApi
  private readonly flightLogApi: FlightLogApi
  private readonly closeController: AbortController = new AbortController()
  private readonly logger: TLogger
  private inFlightRequests = 0

  constructor(options: TMyWebLogOptions) {
    validateRequiredStrings(options, ['username', 'password'])
    const baseUrl = options.baseUrl ?? DEFAULT_BASE_URL
    const tokenUrl = options.tokenUrl ?? DEFAULT_TOKEN_URL
    validateUrl('baseUrl', baseUrl)
    validateUrl('tokenUrl', tokenUrl)
    if (options.timeoutMs !== undefined && !(options.timeoutMs > 0)) {
      throw new ConfigurationError('timeoutMs must be a positive number')
    }

    this.logger = options.logger ? createLogger(options.logger) : defaultLogger
    if (options.appToken && options.appSecret) {
      this.logger.warn(
        'Both appToken and appSecret configured; appToken is used until obtainAppToken() replaces it',
      )
    }

    this.tokenManager = new AppTokenManager({
      authApi: new AuthApi({ tokenUrl, fetchImplementation: options.fetchImplementation }),
      username: options.username,
      password: options.password,
      appToken: options.appToken,
      appSecret: options.appSecret,
      closeSignal: this.closeController.signal,
    })

    const transport = new Transport({
      baseUrl,
      apiVersion: options.apiVersion ?? DEFAULT_API_VERSION,
      authProvider: this.tokenManager,
      language: options.language,
      timeoutInMilliseconds: options.timeoutMs,
      closeSignal: this.closeController.signal,
      fetchImplementation: options.fetchImplementation,
    })

    this.objectsApi = new ObjectsApi({ transport })
    this.bookingsApi = new BookingsApi({ transport })
    this.accountApi = new AccountApi({ transport })
    this.flightLogApi = new FlightLogApi({ transport })
  }

  /** The stored app token, or null before one was supplied or obtained. */
  public get appToken(): string | null {
    return this.tokenManager.appToken
  }

  public get closed(): boolean {
    return this.closeController.signal.aborted
  }

  /**
   * Exchanges the app secret (argument, or the configured one) for a fresh app token
   * and stores it for subsequent calls.
   */
  public async obtainAppToken(appSecret?: string, signal?: AbortSignal): Promise<string> {
    return await this.track(() => this.tokenManager.obtainAppToken(appSecret, signal))
  }

  /** Lists the club's aircraft. */
  public async getObjects(options?: TGetObjectsOptions): Promise<TObjectsResult> {
    return await this.track(() => this.objectsApi.getObjects(options))
  }

  /** Lists bookings from today (or `fromDate`), optionally for one aircraft. */
  public async getBookings(acId?: number, options?: TGetBookingsOptions): Promise<TBookingsResult> {
    return await this.track(() => this.bookingsApi.getBookings(acId, options))
  }

  public async getBalance(signal?: AbortSignal): Promise<TBalanceResult> {
    return await this.track(() => this.accountApi.getBalance(signal))
  }

  public async getTransactions(options?: TGetTransactionsOptions): Promise<TTransactionsResult> {
    return await this.track(() => this.accountApi.getTransactions(options))
  }

  public async getFlightLog(options?: TGetFlightLogOptions): Promise<TFlightLogResult> {
    return await this.track(() => this.flightLogApi.getFlightLog(options))
  }

  public async getFlightLogReversed(options?: TGetFlightLogOptions): Promise<TFlightLogResult> {
    return await this.track(() => this.flightLogApi.getFlightLogReversed(options))
  }

  /**
   * Creates a booking. A rejected booking resolves with `errorMessage`;
   * pass the result to `assertMutationSucceeded` to turn that into a RemoteError.
   */
  public async createBooking(
    input: TCreateBookingInput,
    signal?: AbortSignal,
  ): Promise<TMutationResult> {
    return await this.track(() => this.bookingsApi.createBooking(input, signal))
  }

  public async cutBooking(bookingId: number, signal?: AbortSignal): Promise<TMutationResult> {
    return await this.track(() => this.bookingsApi.cutBooking(bookingId, signal))
  }

  public async deleteBooking(bookingId: number, signal?: AbortSignal): Promise<TMutationResult> {
    return await this.track(() => this.bookingsApi.deleteBooking(bookingId, signal))
  }

  /** Aborts in-flight requests and rejects further calls. Idempotent. */
  public close(): void {
    if (this.closed) return
    if (this.inFlightRequests > 0) {
      this.logger.warn(`Closing client with ${this.inFlightRequests} request(s) in flight`)
    }
    this.closeController.abort()
  }

  private ensureOpen(): void {
    if (this.closed) throw new ConfigurationError('Client is closed')
  }

  private async track<T>(operation: () => Promise<T>): Promise<T> {
    this.ensureOpen()
    this.inFlightRequests++
    try {
      return await operation()
    } finally {
      this.inFlightRequests--
    }
  }
}
