import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { withSignal } from '../helpers'
import { votePlanSchema } from './schema'

export const votePlan = (query: ExplorerQuery) =>
  createRpcMethod(votePlanSchema, async ([id], c) =>
    safeResult(withSignal(query, c).votePlan(id).toJSON()),
  )
