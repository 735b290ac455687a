import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { withSignal } from '../helpers'
import { branchSchema } from './schema'

export const branch = (query: ExplorerQuery) =>
  createRpcMethod(branchSchema, async ([id], c) =>
    safeResult(withSignal(query, c).branch(id).toJSON()),
  )
