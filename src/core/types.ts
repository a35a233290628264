export type TQueryType =
  | 'GetObjects'
  | 'GetBookings'
  | 'GetBalance'
  | 'GetTransactions'
  | 'GetFlightLog'
  | 'GetFlightLogReversed'
  | 'CreateBooking'
  | 'CutBooking'
  | 'DeleteBooking'

export type TQueryValue = string | number | boolean | undefined

export type TQueryParams = Record<string, TQueryValue>

/** Per-request credential parameters merged into every call. */
export type TCredentialParams = {
  mwl_u: string
  mwl_p: string
  app_token: string
}

export type TAuthProvider = {
  /** Returns the credential parameters. Implementations may obtain the app token lazily. */
  getCredentials(signal?: AbortSignal): Promise<TCredentialParams>
  /** Called when the API rejects the credentials (HTTP 401/403). */
  onAuthFailure?(): void
}

export type TRequestOptions = {
  signal?: AbortSignal
  timeoutInMilliseconds?: number
}

/** Envelope every MyWebLog response is wrapped in. */
export type TAPIEnvelope<TResult> = {
  APIVersion: string
  qType: string
  result: TResult
}
