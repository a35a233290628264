/** An aircraft (the API calls these "objects"). */
export type TObjectRecord = {
  ID: number | string
  regnr: string
  club_id: number | string
  clubname: string
  model: string
  /** Base64 JPEG, 150x100 px. Only present when thumbnails were requested. */
  objectThumbnail?: string
  [field: string]: unknown
}

export type TObjectsResult = {
  Object: TObjectRecord[]
}

export type TBookingRecord = {
  ID: number | string
  ac_id: number | string
  regnr: string
  bobject_cat?: number | string
  club_id?: number | string
  user_id: number | string
  /** Unix timestamp (seconds). */
  bStart: number | string
  /** Unix timestamp (seconds). */
  bEnd: number | string
  typ?: string
  primary_booking?: boolean | number
  fritext?: string
  elevuserid?: number | string
  platserkvar?: number | string
  fullname: string
  email?: string
  completeMobile?: string
  [field: string]: unknown
}

export type TSunData = {
  /** Name, designators and coordinates of the user's reference airport. */
  refAirport: Record<string, unknown>
  /** Twilight, sunrise and sunset per included date, keyed by `yyyy-mm-dd`. */
  dates: Record<string, Record<string, unknown>>
}

export type TBookingsResult = {
  Booking: TBookingRecord[]
  sunData?: TSunData
}

export type TBalanceResult = {
  Fornamn?: string
  Partikel?: string
  Efternamn?: string
  /** Account balance in the club's currency. */
  Saldo?: number | string
  Valuta?: string
  /** Derived from first name, particle and last name. */
  fullname?: string
  [field: string]: unknown
}

/** Field names vary between API versions; only the identifier is stable. */
export type TTransactionRecord = {
  ID: number | string
  [field: string]: unknown
}

export type TTransactionsResult = {
  Transaction: TTransactionRecord[]
}

/** Field names vary between API versions; only the identifier is stable. */
export type TFlightLogRecord = {
  ID?: number | string
  [field: string]: unknown
}

export type TFlightLogResult = {
  FlightLog: TFlightLogRecord[]
}

/** Result of CreateBooking, CutBooking and DeleteBooking. */
export type TMutationResult = {
  infoMessageTitle?: string
  infoMessage?: string
  errorMessage?: string
  Result?: string
  [field: string]: unknown
}
