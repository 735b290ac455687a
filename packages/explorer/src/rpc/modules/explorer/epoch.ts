import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { withSignal } from '../helpers'
import { epochSchema } from './schema'

export const epoch = (query: ExplorerQuery) =>
  createRpcMethod(epochSchema, async ([id], c) =>
    safeResult(withSignal(query, c).epoch(id).toJSON()),
  )
