import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { withSignal } from '../helpers'
import { blocksByChainLengthSchema } from './schema'

export const blocksByChainLength = (query: ExplorerQuery) =>
  createRpcMethod(blocksByChainLengthSchema, async ([length], c) => {
    const blocks = withSignal(query, c).blocksByChainLength(length)
    return safeResult(blocks.map((block) => block.toJSON()))
  })
