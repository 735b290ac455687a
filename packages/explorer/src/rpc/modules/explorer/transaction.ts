import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { withSignal } from '../helpers'
import { transactionSchema } from './schema'

export const transaction = (query: ExplorerQuery) =>
  createRpcMethod(transactionSchema, async ([id], c) =>
    safeResult(withSignal(query, c).transaction(id).toJSON()),
  )
