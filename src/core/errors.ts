/** Indicates a configuration problem detected at construction time or during method validation. */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigurationError'
  }
}

/** Indicates rejected credentials, a failed app token exchange, or a missing app token. */
export class AuthError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'AuthError'
  }
}

/** Indicates a non-successful HTTP response from the MyWebLog API. */
export class APIError extends Error {
  readonly status: number

  constructor(message: string, status: number) {
    super(message)
    this.name = 'APIError'
    this.status = status
  }
}

/** Indicates the request never produced an HTTP response (DNS, refused connection, TLS). */
export class NetworkError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'NetworkError'
  }
}

/** Indicates the request did not complete within its timeout. */
export class TimeoutError extends Error {
  constructor(message = 'Operation timed out') {
    super(message)
    this.name = 'TimeoutError'
  }
}

/**
 * Indicates a response body that is not JSON, or whose envelope does not match
 * the requested operation (`qType`) or the configured `APIVersion`.
 */
export class ProtocolError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ProtocolError'
  }
}

/** Carries the `errorMessage` a mutating operation returned, verbatim. */
export class RemoteError extends Error {
  readonly remoteMessage: string

  constructor(remoteMessage: string) {
    super(`MyWebLog rejected the operation: ${remoteMessage}`)
    this.name = 'RemoteError'
    this.remoteMessage = remoteMessage
  }
}

/** Indicates an operation was aborted via AbortSignal or by closing the client. */
export class AbortOperationError extends Error {
  constructor(message = 'Operation aborted') {
    super(message)
    this.name = 'AbortOperationError'
  }
}
