// Main client
export { MyWebLog, DEFAULT_BASE_URL, DEFAULT_API_VERSION } from './client/myweblog.ts'
export type { TMyWebLogOptions } from './client/myweblog.ts'

// Configuration
export { loadOptionsFromEnv } from './core/env.ts'
export type { TEnvironment, TEnvironmentOptions } from './core/env.ts'
export { createLogger } from './core/logger.ts'
export type { TLogger } from './core/logger.ts'

// Helpers
export { isAirplane } from './domains/objects/objects.api.ts'
export { isMutationSuccessful, assertMutationSucceeded } from './domains/bookings/bookings.api.ts'

// Errors
export {
  ConfigurationError,
  AuthError,
  APIError,
  NetworkError,
  TimeoutError,
  ProtocolError,
  RemoteError,
  AbortOperationError,
} from './core/errors.ts'

// Option types
export type { TGetObjectsOptions } from './domains/objects/objects.api.ts'
export type { TGetBookingsOptions, TCreateBookingInput } from './domains/bookings/bookings.api.ts'
export type { TGetTransactionsOptions } from './domains/account/account.api.ts'
export type { TGetFlightLogOptions } from './domains/flight-log/flight-log.api.ts'

// Types
export type { TQueryType, TRequestOptions } from './core/types.ts'

export type {
  TObjectRecord,
  TObjectsResult,
  TBookingRecord,
  TBookingsResult,
  TSunData,
  TBalanceResult,
  TTransactionRecord,
  TTransactionsResult,
  TFlightLogRecord,
  TFlightLogResult,
  TMutationResult,
} from './types/api.ts'
