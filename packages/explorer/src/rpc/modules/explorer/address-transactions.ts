import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { connectionJson, withSignal } from '../helpers'
import { addressTransactionsSchema } from './schema'

export const addressTransactions = (query: ExplorerQuery) =>
  createRpcMethod(addressTransactionsSchema, async ([bech32, page], c) => {
    const address = withSignal(query, c).address(bech32)
    const connection = await address.transactions(page ?? {})
    return safeResult(connectionJson(connection, (tx) => tx.toJSON()))
  })
