import { afterEach, describe, expect, it, vi } from 'vitest'
import { ConfigurationError, RemoteError } from '../../../../src/core/errors.ts'
import {
  assertMutationSucceeded,
  BookingsApi,
  isMutationSuccessful,
  type TCreateBookingInput,
} from '../../../../src/domains/bookings/bookings.api.ts'
import { createSpiedTransport } from '../../../helpers/index.ts'

function createBookingsApi() {
  const { transport, request } = createSpiedTransport()
  return { bookingsApi: new BookingsApi({ transport }), request }
}

describe('BookingsApi', () => {
  afterEach(() => {
    vi.useRealTimers()
    vi.restoreAllMocks()
  })

  describe('getBookings', () => {
    it('lists from today with every flag off by default', async () => {
      vi.useFakeTimers({ toFake: ['Date'] })
      vi.setSystemTime(new Date(2026, 4, 12, 9, 30))
      const { bookingsApi, request } = createBookingsApi()
      request.mockResolvedValue({ Booking: [] })

      await bookingsApi.getBookings()

      expect(request).toHaveBeenCalledWith(
        'GetBookings',
        {
          ac_id: undefined,
          mybookings: false,
          from_date: '2026-05-12',
          to_date: undefined,
          includeSun: false,
        },
        { signal: undefined },
      )
    })

    it('passes the aircraft, flags, range and signal through', async () => {
      const { bookingsApi, request } = createBookingsApi()
      request.mockResolvedValue({ Booking: [] })
      const controller = new AbortController()

      await bookingsApi.getBookings(11, {
        myBookings: true,
        includeSun: true,
        fromDate: '2026-06-01',
        toDate: new Date(2026, 5, 30),
        signal: controller.signal,
      })

      expect(request).toHaveBeenCalledWith(
        'GetBookings',
        {
          ac_id: 11,
          mybookings: true,
          from_date: '2026-06-01',
          to_date: '2026-06-30',
          includeSun: true,
        },
        { signal: controller.signal },
      )
    })

    it('returns the result untouched', async () => {
      const { bookingsApi, request } = createBookingsApi()
      const result = { Booking: [{ ID: 501, ac_id: 11 }] }
      request.mockResolvedValue(result)

      await expect(bookingsApi.getBookings(11)).resolves.toBe(result)
    })

    it('rejects an invalid aircraft id before sending', async () => {
      const { bookingsApi, request } = createBookingsApi()

      await expect(bookingsApi.getBookings(0)).rejects.toThrow(
        new ConfigurationError('acId must be a positive integer'),
      )
      expect(request).not.toHaveBeenCalled()
    })
  })

  describe('createBooking', () => {
    it('sends the booking fields with defaults for comment and seats', async () => {
      const { bookingsApi, request } = createBookingsApi()
      request.mockResolvedValue({ infoMessageTitle: 'Bokning skapad' })

      await bookingsApi.createBooking({
        acId: 12,
        start: '2026-05-12T08:00+02:00',
        end: '2026-05-12T10:00+02:00',
      })

      expect(request).toHaveBeenCalledWith(
        'CreateBooking',
        {
          ac_id: 12,
          bStart: '2026-05-12T08:00+02:00',
          bEnd: '2026-05-12T10:00+02:00',
          fritext: '',
          platserkvar: 1,
          elevuserid: undefined,
          bobject_cat: undefined,
        },
        { signal: undefined },
      )
    })

    it('sends optional fields when given', async () => {
      const { bookingsApi, request } = createBookingsApi()
      request.mockResolvedValue({ infoMessageTitle: 'Bokning skapad' })

      await bookingsApi.createBooking({
        acId: 12,
        start: '2026-05-12T08:00+02:00',
        end: '2026-05-12T10:00+02:00',
        comment: 'Skolflygning',
        seats: 2,
        studentUserId: 1002,
        category: 3,
      })

      expect(request).toHaveBeenCalledWith(
        'CreateBooking',
        expect.objectContaining({
          fritext: 'Skolflygning',
          platserkvar: 2,
          elevuserid: 1002,
          bobject_cat: 3,
        }),
        { signal: undefined },
      )
    })

    it('resolves with a business error instead of throwing', async () => {
      const { bookingsApi, request } = createBookingsApi()
      request.mockResolvedValue({ errorMessage: 'Objektet är redan bokat.' })

      await expect(
        bookingsApi.createBooking({
          acId: 12,
          start: '2026-05-12T08:00+02:00',
          end: '2026-05-12T10:00+02:00',
        }),
      ).resolves.toEqual({ errorMessage: 'Objektet är redan bokat.' })
    })

    const invalidInputs: Array<[TCreateBookingInput, string]> = [
      [{ acId: -1, start: 'a', end: 'b' }, 'acId must be a positive integer'],
      [{ acId: 12, start: '', end: 'b' }, 'start is required'],
      [{ acId: 12, start: 'a', end: '' }, 'end is required'],
      [{ acId: 12, start: 'a', end: 'b', seats: 0 }, 'seats must be a positive integer'],
    ]

    it.each(invalidInputs)('validates %o', async (input, message) => {
      const { bookingsApi, request } = createBookingsApi()

      await expect(bookingsApi.createBooking(input)).rejects.toThrow(new ConfigurationError(message))
      expect(request).not.toHaveBeenCalled()
    })
  })

  describe('invalid dates', () => {
    it('rejects an invalid listing date before sending', async () => {
      const { bookingsApi, request } = createBookingsApi()

      await expect(
        bookingsApi.getBookings(11, { fromDate: new Date('next tuesday') }),
      ).rejects.toThrow(new ConfigurationError('Invalid Date value'))
      expect(request).not.toHaveBeenCalled()
    })

    it('rejects an invalid booking start before sending', async () => {
      const { bookingsApi, request } = createBookingsApi()

      await expect(
        bookingsApi.createBooking({ acId: 12, start: new Date(Number.NaN), end: new Date() }),
      ).rejects.toThrow(new ConfigurationError('Invalid Date value'))
      expect(request).not.toHaveBeenCalled()
    })
  })

  describe('cutBooking and deleteBooking', () => {
    it('send the booking id', async () => {
      const { bookingsApi, request } = createBookingsApi()
      request.mockResolvedValue({ Result: 'OK' })

      await bookingsApi.cutBooking(501)
      await bookingsApi.deleteBooking(504)

      expect(request).toHaveBeenNthCalledWith(
        1,
        'CutBooking',
        { booking_id: 501 },
        { signal: undefined },
      )
      expect(request).toHaveBeenNthCalledWith(
        2,
        'DeleteBooking',
        { booking_id: 504 },
        { signal: undefined },
      )
    })

    it('reject a non-integer booking id', async () => {
      const { bookingsApi } = createBookingsApi()

      await expect(bookingsApi.deleteBooking(1.5)).rejects.toThrow(
        'bookingId must be a positive integer',
      )
    })
  })
})

describe('mutation helpers', () => {
  it('treats a missing or empty errorMessage as success', () => {
    expect(isMutationSuccessful({ Result: 'OK' })).toBe(true)
    expect(isMutationSuccessful({ errorMessage: '' })).toBe(true)
    expect(isMutationSuccessful({ errorMessage: 'Bokningen finns inte.' })).toBe(false)
  })

  it('assertMutationSucceeded throws RemoteError carrying the remote message', () => {
    let caught: unknown
    try {
      assertMutationSucceeded({ errorMessage: 'Bokningen finns inte.' })
    } catch (error) {
      caught = error
    }

    expect(caught).toBeInstanceOf(RemoteError)
    expect(caught).toHaveProperty('remoteMessage', 'Bokningen finns inte.')
    expect(caught).toHaveProperty(
      'message',
      'MyWebLog rejected the operation: Bokningen finns inte.',
    )
  })

  it('assertMutationSucceeded passes successful results', () => {
    expect(() => assertMutationSucceeded({ infoMessageTitle: 'Bokning skapad' })).not.toThrow()
  })
})
