/**
 * Prints club data for the member configured in `.env`.
 *
 * Prerequisites: copy `.env.example` to `.env` and fill in MYWEBLOG_USERNAME,
 * MYWEBLOG_PASSWORD and MYWEBLOG_APP_SECRET (or MYWEBLOG_APP_TOKEN).
 *
 * Usage:
 *   npx tsx examples/club-overview.ts [objects] [bookings] [balance] [transactions]
 *                                     [flightlog] [flightlog-reversed]
 *
 * Without arguments every operation runs.
 */

import { inspect } from 'node:util'
import { config as loadEnv } from 'dotenv'
import { MyWebLog } from '../src/client/myweblog.ts'
import { loadOptionsFromEnv } from '../src/core/env.ts'
import { logger } from '../src/core/logger.ts'
import { isAirplane } from '../src/domains/objects/objects.api.ts'

loadEnv()

const OPERATIONS = {
  objects: async (client: MyWebLog) => await client.getObjects(),
  bookings: async (client: MyWebLog) => {
    const { Object: objects } = await client.getObjects()
    const airplane = objects.find(isAirplane)
    if (!airplane) return 'No airplanes found for bookings.'
    return await client.getBookings(Number(airplane.ID))
  },
  balance: async (client: MyWebLog) => await client.getBalance(),
  transactions: async (client: MyWebLog) => await client.getTransactions({ limit: 20 }),
  flightlog: async (client: MyWebLog) => await client.getFlightLog({ limit: 20 }),
  'flightlog-reversed': async (client: MyWebLog) =>
    await client.getFlightLogReversed({ limit: 20 }),
} satisfies Record<string, (client: MyWebLog) => Promise<unknown>>

type TOperationName = keyof typeof OPERATIONS

function isOperationName(name: string): name is TOperationName {
  return Object.hasOwn(OPERATIONS, name)
}

async function main(): Promise<void> {
  const requested = process.argv.slice(2)
  const unknown = requested.filter((name) => !isOperationName(name))
  if (unknown.length > 0) {
    logger.error(`Unknown operation(s): ${unknown.join(', ')}`)
    logger.error(`Available: ${Object.keys(OPERATIONS).join(', ')}`)
    process.exitCode = 1
    return
  }

  const selected = (requested.length > 0 ? requested : Object.keys(OPERATIONS)).filter(
    isOperationName,
  )

  const client = new MyWebLog(loadOptionsFromEnv())
  try {
    if (!client.appToken) await client.obtainAppToken()

    const { fullname } = await client.getBalance()
    console.log(`Welcome, ${fullname ?? 'member'}!`)

    for (const name of selected) {
      const result = await OPERATIONS[name](client)
      console.log(`Result for ${name}:`)
      console.log(inspect(result, { depth: null, colors: process.stdout.isTTY }))
    }
  } finally {
    client.close()
  }
}

main().catch((error: unknown) => {
  logger.error('Example failed:', error)
  process.exitCode = 1
})
