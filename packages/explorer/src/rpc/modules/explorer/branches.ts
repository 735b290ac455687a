import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { noParamsSchema } from './schema'

export const branches = (query: ExplorerQuery) =>
  createRpcMethod(noParamsSchema, async () =>
    safeResult(query.branches().map((branch) => branch.toJSON())),
  )
