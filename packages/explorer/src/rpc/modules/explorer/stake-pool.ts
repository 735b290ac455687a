import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { withSignal } from '../helpers'
import { stakePoolSchema } from './schema'

export const stakePool = (query: ExplorerQuery) =>
  createRpcMethod(stakePoolSchema, async ([id], c) =>
    safeResult(withSignal(query, c).stakePool(id).toJSON()),
  )
