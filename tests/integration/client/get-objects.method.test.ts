import { afterEach, describe, expect, it, vi } from 'vitest'
import { isAirplane } from '../../../src/domains/objects/objects.api.ts'
import { APIError, ProtocolError, TimeoutError } from '../../../src/core/errors.ts'
import {
  connectToFakeClub,
  createFetchMock,
  createHangingFetch,
  createTestClient,
  envelope,
  TEST_CONFIG,
} from '../../helpers/index.ts'

describe('MyWebLog.getObjects', () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('lists every aircraft of the club', async () => {
    const { client, api } = connectToFakeClub()

    const { Object: objects } = await client.getObjects()

    expect(objects.map((object) => object.regnr)).toEqual(['SE-KBT', 'SE-LFA', 'SE-MDE', 'SIM-1'])
    for (const object of objects) {
      expect(object).toHaveProperty('ID')
      expect(object).toHaveProperty('club_id')
      expect(object).toHaveProperty('model')
    }
    expect(objects.filter(isAirplane).map((object) => object.ID)).toEqual([11, 12, 13])
    expect(api.fetch).toHaveBeenCalledTimes(2)
  })

  it('posts the session fields alongside the operation', async () => {
    const { client, api } = connectToFakeClub()

    await client.getObjects()

    expect(api.apiRequests[0]).toEqual({
      includeObjectThumbnail: '0',
      qtype: 'GetObjects',
      mwl_u: TEST_CONFIG.username,
      mwl_p: TEST_CONFIG.password,
      app_token: 'fake-app-token-1',
      returnType: 'JSON',
      charset: 'UTF-8',
      language: 'se',
    })
  })

  it('sends the configured language', async () => {
    const { client, api } = connectToFakeClub({ language: 'en' })

    await client.getObjects({ includeThumbnail: true })

    expect(api.apiRequests[0]).toMatchObject({ language: 'en', includeObjectThumbnail: '1' })
  })

  it('surfaces a version the server does not serve as APIError', async () => {
    const { client } = connectToFakeClub({ apiVersion: '2.0.4' })

    const rejection = client.getObjects()

    await expect(rejection).rejects.toBeInstanceOf(APIError)
    await expect(rejection).rejects.toHaveProperty('status', 400)
    await expect(rejection).rejects.toHaveProperty(
      'message',
      'HTTP 400 for GetObjects: Unsupported version',
    )
  })

  it('rejects a body that is not JSON with ProtocolError', async () => {
    const fetchMock = createFetchMock()
    fetchMock.push({ rawBody: '<html>Service Unavailable</html>' })
    const client = createTestClient({
      appToken: TEST_CONFIG.appToken,
      fetchImplementation: fetchMock.fetch,
    })

    await expect(client.getObjects()).rejects.toThrow(
      new ProtocolError('Response to GetObjects is not valid JSON'),
    )
  })

  it('rejects an envelope for another operation with ProtocolError', async () => {
    const fetchMock = createFetchMock()
    fetchMock.pushJson(envelope('GetBookings', { Booking: [] }))
    const client = createTestClient({
      appToken: TEST_CONFIG.appToken,
      fetchImplementation: fetchMock.fetch,
    })

    await expect(client.getObjects()).rejects.toThrow(
      'Unexpected response type: expected GetObjects, got GetBookings',
    )
  })

  it('reports a lazy token exchange that outlasts the timeout as TimeoutError', async () => {
    const client = createTestClient({
      appSecret: TEST_CONFIG.appSecret,
      fetchImplementation: createHangingFetch(),
      timeoutMs: 50,
    })

    try {
      await expect(client.getObjects()).rejects.toThrow(
        new TimeoutError('Request timed out after 50ms'),
      )
    } finally {
      client.close()
    }
  })
})
