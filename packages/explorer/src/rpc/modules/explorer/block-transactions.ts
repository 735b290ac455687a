import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { connectionJson, withSignal } from '../helpers'
import { blockTransactionsSchema } from './schema'

export const blockTransactions = (query: ExplorerQuery) =>
  createRpcMethod(blockTransactionsSchema, async ([id, page], c) => {
    const block = withSignal(query, c).block(id)
    const connection = await block.transactions(page ?? {})
    return safeResult(connectionJson(connection, (tx) => tx.toJSON()))
  })
