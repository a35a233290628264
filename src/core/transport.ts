import {
  AbortOperationError,
  APIError,
  AuthError,
  NetworkError,
  ProtocolError,
  TimeoutError,
} from './errors.ts'
import { USER_AGENT } from './sdk-info.ts'
import type {
  TAPIEnvelope,
  TAuthProvider,
  TCredentialParams,
  TQueryParams,
  TQueryType,
  TRequestOptions,
} from './types.ts'
import {
  combineAbortSignals,
  extractResponseErrorDetail,
  isRecord,
  normalizeBaseUrl,
  resolveFetch,
} from './utils.ts'

export const DEFAULT_TIMEOUT_IN_MILLISECONDS = 10_000
export const DEFAULT_LANGUAGE = 'se'

export type TTransportOptions = {
  baseUrl: string
  apiVersion: string
  authProvider: TAuthProvider
  language?: string
  timeoutInMilliseconds?: number
  /** Aborts every request made through this transport, e.g. when the client is closed. */
  closeSignal?: AbortSignal
  fetchImplementation?: typeof fetch | undefined
}

type TTimeout = { signal: AbortSignal; timeoutInMilliseconds: number }

function toFormValue(value: string | number | boolean): string {
  if (typeof value === 'boolean') return value ? '1' : '0'
  return String(value)
}

/**
 * Sends one MyWebLog operation per call: a form-encoded POST against the API URL,
 * followed by envelope checks. No retries.
 */
export class Transport {
  private readonly url: URL
  private readonly apiVersion: string
  private readonly authProvider: TAuthProvider
  private readonly language: string
  private readonly timeoutInMilliseconds: number
  private readonly closeSignal?: AbortSignal
  private readonly fetchImplementation: typeof fetch
  private readonly userAgent: string = USER_AGENT

  constructor(options: TTransportOptions) {
    this.url = new URL(normalizeBaseUrl(options.baseUrl))
    this.url.searchParams.set('version', options.apiVersion)
    this.apiVersion = options.apiVersion
    this.authProvider = options.authProvider
    this.language = options.language ?? DEFAULT_LANGUAGE
    this.timeoutInMilliseconds = options.timeoutInMilliseconds ?? DEFAULT_TIMEOUT_IN_MILLISECONDS
    this.closeSignal = options.closeSignal
    this.fetchImplementation = resolveFetch(options.fetchImplementation)
  }

  /** The fully qualified endpoint URL, including the `version` query parameter. */
  get endpoint(): string {
    return this.url.toString()
  }

  async request<TResult>(
    qType: TQueryType,
    params: TQueryParams = {},
    requestOptions: TRequestOptions = {},
  ): Promise<TResult> {
    if (this.closeSignal?.aborted) throw new AbortOperationError('Client is closed')
    if (requestOptions.signal?.aborted) throw new AbortOperationError()

    const timeoutInMilliseconds: number =
      requestOptions.timeoutInMilliseconds ?? this.timeoutInMilliseconds
    const timeoutController: AbortController = new AbortController()
    const timeoutId = setTimeout(() => timeoutController.abort(), timeoutInMilliseconds)
    const { signal: combinedSignal, cleanup } = combineAbortSignals(
      timeoutController.signal,
      requestOptions.signal,
      this.closeSignal,
    )
    const timeout = { signal: timeoutController.signal, timeoutInMilliseconds }

    try {
      let credentials: TCredentialParams
      try {
        credentials = await this.authProvider.getCredentials(combinedSignal)
      } catch (caughtError) {
        throw this.classifyAbort(combinedSignal, timeout) ?? caughtError
      }

      const form = new URLSearchParams()
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) form.set(key, toFormValue(value))
      }
      form.set('qtype', qType)
      form.set('mwl_u', credentials.mwl_u)
      form.set('mwl_p', credentials.mwl_p)
      form.set('app_token', credentials.app_token)
      form.set('returnType', 'JSON')
      form.set('charset', 'UTF-8')
      form.set('language', this.language)

      let httpResponse: Response
      try {
        httpResponse = await this.fetchImplementation(this.url, {
          method: 'POST',
          headers: {
            'content-type': 'application/x-www-form-urlencoded',
            accept: 'application/json',
            'user-agent': this.userAgent,
          },
          body: form,
          signal: combinedSignal,
        })
      } catch (caughtError) {
        throw this.classifyFetchFailure(caughtError, combinedSignal, timeout)
      }

      if (httpResponse.status === 401 || httpResponse.status === 403) {
        this.authProvider.onAuthFailure?.()
        throw new AuthError(`Authentication failed with status ${httpResponse.status}`)
      }

      if (!httpResponse.ok) {
        const errorDetail = await extractResponseErrorDetail(httpResponse)
        throw new APIError(
          `HTTP ${httpResponse.status} for ${qType}${errorDetail}`,
          httpResponse.status,
        )
      }

      let text: string
      try {
        text = await httpResponse.text()
      } catch (caughtError) {
        throw this.classifyFetchFailure(caughtError, combinedSignal, timeout)
      }

      const envelope = this.parseEnvelope(qType, text)
      return envelope.result as TResult
    } finally {
      clearTimeout(timeoutId)
      cleanup()
    }
  }

  private parseEnvelope(qType: TQueryType, text: string): TAPIEnvelope<Record<string, unknown>> {
    let body: unknown
    try {
      body = JSON.parse(text)
    } catch {
      throw new ProtocolError(`Response to ${qType} is not valid JSON`)
    }

    if (!isRecord(body)) {
      throw new ProtocolError(`Response to ${qType} is not a JSON object`)
    }
    if (body.qType !== qType) {
      throw new ProtocolError(
        `Unexpected response type: expected ${qType}, got ${String(body.qType)}`,
      )
    }
    if (body.APIVersion !== this.apiVersion) {
      throw new ProtocolError(
        `Unexpected API version: expected ${this.apiVersion}, got ${String(body.APIVersion)}`,
      )
    }
    if (!isRecord(body.result)) {
      throw new ProtocolError(`Response to ${qType} has no result object`)
    }

    return { APIVersion: body.APIVersion, qType, result: body.result }
  }

  /** Maps an aborted request to the reason it was aborted, or undefined if it was not. */
  private classifyAbort(combinedSignal: AbortSignal, timeout: TTimeout): Error | undefined {
    if (timeout.signal.aborted) {
      return new TimeoutError(`Request timed out after ${timeout.timeoutInMilliseconds}ms`)
    }
    if (this.closeSignal?.aborted) {
      return new AbortOperationError('Client is closed')
    }
    if (combinedSignal.aborted) {
      return new AbortOperationError()
    }
    return undefined
  }

  private classifyFetchFailure(
    caughtError: unknown,
    combinedSignal: AbortSignal,
    timeout: TTimeout,
  ): Error {
    const aborted = this.classifyAbort(combinedSignal, timeout)
    if (aborted) return aborted
    const detail = caughtError instanceof Error ? caughtError.message : String(caughtError)
    return new NetworkError(`Network error contacting MyWebLog: ${detail}`, { cause: caughtError })
  }
}
