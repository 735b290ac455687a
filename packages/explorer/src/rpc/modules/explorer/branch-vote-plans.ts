import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { connectionJson, withSignal } from '../helpers'
import { branchVotePlansSchema } from './schema'

export const branchVotePlans = (query: ExplorerQuery) =>
  createRpcMethod(branchVotePlansSchema, async ([id, page], c) => {
    const connection = await withSignal(query, c)
      .branch(id)
      .allVotePlans(page ?? {})
    return safeResult(connectionJson(connection, (plan) => plan.toJSON()))
  })
