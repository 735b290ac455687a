import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { connectionJson, withSignal } from '../helpers'
import { epochBlocksSchema } from './schema'

export const epochBlocks = (query: ExplorerQuery) =>
  createRpcMethod(epochBlocksSchema, async ([id, page], c) => {
    const connection = await withSignal(query, c).epoch(id).blocks(page ?? {})
    return safeResult(connectionJson(connection, (block) => block.toJSON()))
  })
