import { ConfigurationError, RemoteError } from '../../core/errors.ts'
import type { Transport } from '../../core/transport.ts'
import { formatDate, formatDateTime, validatePositiveInteger } from '../../core/utils.ts'
import type { TBookingsResult, TMutationResult } from '../../types/api.ts'

export type TBookingsApiOptions = {
  transport: Transport
}

export type TGetBookingsOptions = {
  /** Only bookings owned by the authenticated member. */
  myBookings?: boolean
  /**
   * Include sunrise/sunset for the member's reference airport over the listed dates.
   * Without `toDate` the API covers one month.
   */
  includeSun?: boolean
  /** Defaults to today. */
  fromDate?: Date | string
  toDate?: Date | string
  signal?: AbortSignal
}

export type TCreateBookingInput = {
  acId: number
  /** `Date`, or a string already in the API's `yyyy-mm-ddTHH:mm±hh:mm` form. */
  start: Date | string
  end: Date | string
  /** Free-text comment shown on the booking. */
  comment?: string
  /** Seats left for others (default: 1) */
  seats?: number
  /** Instructor bookings: the student's user id. */
  studentUserId?: number
  category?: number
}

/**
 * Booking listing and mutations. Mutations never throw on a business error;
 * the `errorMessage` the API returns is passed through.
 */
export interface TBookingsApi {
  getBookings(acId?: number, options?: TGetBookingsOptions): Promise<TBookingsResult>
  createBooking(input: TCreateBookingInput, signal?: AbortSignal): Promise<TMutationResult>
  cutBooking(bookingId: number, signal?: AbortSignal): Promise<TMutationResult>
  deleteBooking(bookingId: number, signal?: AbortSignal): Promise<TMutationResult>
}

export class BookingsApi implements TBookingsApi {
  private transport: Transport

  constructor(options: TBookingsApiOptions) {
    this.transport = options.transport
  }

  public async getBookings(acId?: number, options?: TGetBookingsOptions): Promise<TBookingsResult> {
    if (acId !== undefined) validatePositiveInteger('acId', acId)

    return await this.transport.request<TBookingsResult>(
      'GetBookings',
      {
        ac_id: acId,
        mybookings: options?.myBookings ?? false,
        from_date: formatDate(options?.fromDate ?? new Date()),
        to_date: options?.toDate === undefined ? undefined : formatDate(options.toDate),
        includeSun: options?.includeSun ?? false,
      },
      { signal: options?.signal },
    )
  }

  public async createBooking(
    input: TCreateBookingInput,
    signal?: AbortSignal,
  ): Promise<TMutationResult> {
    validatePositiveInteger('acId', input.acId)
    if (!input.start) throw new ConfigurationError('start is required')
    if (!input.end) throw new ConfigurationError('end is required')
    if (input.seats !== undefined) validatePositiveInteger('seats', input.seats)

    return await this.transport.request<TMutationResult>(
      'CreateBooking',
      {
        ac_id: input.acId,
        bStart: formatDateTime(input.start),
        bEnd: formatDateTime(input.end),
        fritext: input.comment ?? '',
        platserkvar: input.seats ?? 1,
        elevuserid: input.studentUserId,
        bobject_cat: input.category,
      },
      { signal },
    )
  }

  /** Shortens an ongoing booking so that it ends now. */
  public async cutBooking(bookingId: number, signal?: AbortSignal): Promise<TMutationResult> {
    validatePositiveInteger('bookingId', bookingId)
    return await this.transport.request<TMutationResult>(
      'CutBooking',
      { booking_id: bookingId },
      { signal },
    )
  }

  public async deleteBooking(bookingId: number, signal?: AbortSignal): Promise<TMutationResult> {
    validatePositiveInteger('bookingId', bookingId)
    return await this.transport.request<TMutationResult>(
      'DeleteBooking',
      { booking_id: bookingId },
      { signal },
    )
  }
}

/** True when a mutation result carries no `errorMessage`. */
export function isMutationSuccessful(result: TMutationResult): boolean {
  return typeof result.errorMessage !== 'string' || result.errorMessage === ''
}

/** Throws RemoteError with the verbatim `errorMessage` when the mutation was rejected. */
export function assertMutationSucceeded(result: TMutationResult): void {
  if (!isMutationSuccessful(result)) {
    throw new RemoteError(String(result.errorMessage))
  }
}
