import type { Transport } from '../../core/transport.ts'
import { formatDate, validatePositiveInteger } from '../../core/utils.ts'
import type { TBalanceResult, TTransactionsResult } from '../../types/api.ts'

export const DEFAULT_TRANSACTION_LIMIT = 20

export type TAccountApiOptions = {
  transport: Transport
}

export type TGetTransactionsOptions = {
  /** Maximum number of rows (default: 20) */
  limit?: number
  fromDate?: Date | string
  toDate?: Date | string
  signal?: AbortSignal
}

/**
 * Account balance and transactions of the authenticated member.
 */
export interface TAccountApi {
  getBalance(signal?: AbortSignal): Promise<TBalanceResult>
  getTransactions(options?: TGetTransactionsOptions): Promise<TTransactionsResult>
}

export class AccountApi implements TAccountApi {
  private transport: Transport

  constructor(options: TAccountApiOptions) {
    this.transport = options.transport
  }

  /** Returns the balance record with a derived `fullname` when name parts are present. */
  public async getBalance(signal?: AbortSignal): Promise<TBalanceResult> {
    const balance = await this.transport.request<TBalanceResult>('GetBalance', {}, { signal })
    const fullname = buildFullname(balance)
    return fullname === undefined ? balance : { ...balance, fullname }
  }

  public async getTransactions(options?: TGetTransactionsOptions): Promise<TTransactionsResult> {
    const limit = options?.limit ?? DEFAULT_TRANSACTION_LIMIT
    validatePositiveInteger('limit', limit)

    return await this.transport.request<TTransactionsResult>(
      'GetTransactions',
      {
        limit,
        from_date: options?.fromDate === undefined ? undefined : formatDate(options.fromDate),
        to_date: options?.toDate === undefined ? undefined : formatDate(options.toDate),
      },
      { signal: options?.signal },
    )
  }
}

function buildFullname(balance: TBalanceResult): string | undefined {
  const parts = [balance.Fornamn, balance.Partikel, balance.Efternamn]
    .filter((part): part is string => typeof part === 'string')
    .map((part) => part.trim())
    .filter((part) => part !== '')

  if (parts.length === 0) return undefined
  return parts.join(' ')
}
