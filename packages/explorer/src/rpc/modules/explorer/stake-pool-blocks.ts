import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { connectionJson, withSignal } from '../helpers'
import { stakePoolBlocksSchema } from './schema'

export const stakePoolBlocks = (query: ExplorerQuery) =>
  createRpcMethod(stakePoolBlocksSchema, async ([id, page], c) => {
    const connection = await withSignal(query, c)
      .stakePool(id)
      .blocks(page ?? {})
    return safeResult(connectionJson(connection, (block) => block.toJSON()))
  })
