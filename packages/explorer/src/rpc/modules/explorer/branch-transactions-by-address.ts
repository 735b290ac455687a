import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { parseAddress } from '../../../query'
import { createRpcMethod } from '../../validation'
import { connectionJson, withSignal } from '../helpers'
import { branchTransactionsByAddressSchema } from './schema'

export const branchTransactionsByAddress = (query: ExplorerQuery) =>
  createRpcMethod(
    branchTransactionsByAddressSchema,
    async ([id, address, page], c) => {
      const branch = withSignal(query, c).branch(id)
      const connection = await branch.transactionsByAddress(
        parseAddress(address),
        page ?? {},
      )
      return safeResult(connectionJson(connection, (tx) => tx.toJSON()))
    },
  )
