import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { withSignal } from '../helpers'
import { addressSchema } from './schema'

export const address = (query: ExplorerQuery) =>
  createRpcMethod(addressSchema, async ([bech32], c) =>
    safeResult(withSignal(query, c).address(bech32).toJSON()),
  )
