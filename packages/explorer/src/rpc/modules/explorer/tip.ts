import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { noParamsSchema } from './schema'

export const tip = (query: ExplorerQuery) =>
  createRpcMethod(noParamsSchema, async () => {
    const branch = query.tip()
    return safeResult({ ...branch.toJSON(), block: branch.block().toJSON() })
  })
