import type { Transport } from '../../core/transport.ts'
import { formatDate, validatePositiveInteger } from '../../core/utils.ts'
import type { TFlightLogResult } from '../../types/api.ts'

export const DEFAULT_FLIGHT_LOG_LIMIT = 20

export type TFlightLogApiOptions = {
  transport: Transport
}

export type TGetFlightLogOptions = {
  /** Maximum number of rows (default: 20) */
  limit?: number
  fromDate?: Date | string
  toDate?: Date | string
  /** Restrict to one aircraft. */
  acId?: number
  signal?: AbortSignal
}

export interface TFlightLogApi {
  getFlightLog(options?: TGetFlightLogOptions): Promise<TFlightLogResult>
  getFlightLogReversed(options?: TGetFlightLogOptions): Promise<TFlightLogResult>
}

/**
 * Flight log in both orders. GetFlightLog lists oldest first,
 * GetFlightLogReversed newest first; parameters are identical.
 */
export class FlightLogApi implements TFlightLogApi {
  private transport: Transport

  constructor(options: TFlightLogApiOptions) {
    this.transport = options.transport
  }

  public async getFlightLog(options?: TGetFlightLogOptions): Promise<TFlightLogResult> {
    return await this.request('GetFlightLog', options)
  }

  public async getFlightLogReversed(options?: TGetFlightLogOptions): Promise<TFlightLogResult> {
    return await this.request('GetFlightLogReversed', options)
  }

  private async request(
    qType: 'GetFlightLog' | 'GetFlightLogReversed',
    options?: TGetFlightLogOptions,
  ): Promise<TFlightLogResult> {
    const limit = options?.limit ?? DEFAULT_FLIGHT_LOG_LIMIT
    validatePositiveInteger('limit', limit)
    if (options?.acId !== undefined) validatePositiveInteger('acId', options.acId)

    return await this.transport.request<TFlightLogResult>(
      qType,
      {
        limit,
        from_date: options?.fromDate === undefined ? undefined : formatDate(options.fromDate),
        to_date: options?.toDate === undefined ? undefined : formatDate(options.toDate),
        ac_id: options?.acId,
      },
      { signal: options?.signal },
    )
  }
}
