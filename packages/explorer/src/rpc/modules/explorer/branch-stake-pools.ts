import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { connectionJson, withSignal } from '../helpers'
import { branchStakePoolsSchema } from './schema'

export const branchStakePools = (query: ExplorerQuery) =>
  createRpcMethod(branchStakePoolsSchema, async ([id, page], c) => {
    const connection = await withSignal(query, c)
      .branch(id)
      .allStakePools(page ?? {})
    return safeResult(connectionJson(connection, (pool) => pool.toJSON()))
  })
