import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { withSignal } from '../helpers'
import { blockSchema } from './schema'

export const block = (query: ExplorerQuery) =>
  createRpcMethod(blockSchema, async ([id], c) =>
    safeResult(withSignal(query, c).block(id).toJSON()),
  )
