import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { connectionJson, withSignal } from '../helpers'
import { branchBlocksSchema } from './schema'

export const branchBlocks = (query: ExplorerQuery) =>
  createRpcMethod(branchBlocksSchema, async ([id, page], c) => {
    const connection = await withSignal(query, c)
      .branch(id)
      .blocks(page ?? {})
    return safeResult(connectionJson(connection, (block) => block.toJSON()))
  })
