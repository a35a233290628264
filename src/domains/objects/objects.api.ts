import type { Transport } from '../../core/transport.ts'
import type { TObjectsResult } from '../../types/api.ts'

export type TObjectsApiOptions = {
  transport: Transport
}

export type TGetObjectsOptions = {
  /** Include a 150x100 px JPEG per object. */
  includeThumbnail?: boolean
  signal?: AbortSignal
}

/**
 * Aircraft listing. Mirrors GetObjects exactly.
 */
export interface TObjectsApi {
  getObjects(options?: TGetObjectsOptions): Promise<TObjectsResult>
}

export class ObjectsApi implements TObjectsApi {
  private transport: Transport

  constructor(options: TObjectsApiOptions) {
    this.transport = options.transport
  }

  public async getObjects(options?: TGetObjectsOptions): Promise<TObjectsResult> {
    return await this.transport.request<TObjectsResult>(
      'GetObjects',
      { includeObjectThumbnail: options?.includeThumbnail ?? false },
      { signal: options?.signal },
    )
  }
}

/**
 * True for objects that look like bookable airplanes: a registration and a model are
 * present and the model is not marked with a leading "x" (retired or placeholder entries).
 */
export function isAirplane(object: { regnr?: unknown; model?: unknown }): boolean {
  return (
    typeof object.regnr === 'string' &&
    object.regnr !== '' &&
    typeof object.model === 'string' &&
    object.model !== '' &&
    !object.model.toLowerCase().startsWith('x')
  )
}
