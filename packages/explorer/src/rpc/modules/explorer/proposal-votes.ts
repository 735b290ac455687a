import { safeResult } from '@chain-explorer/utils'
import type { ExplorerQuery } from '../../../query'
import { createRpcMethod } from '../../validation'
import { connectionJson, withSignal } from '../helpers'
import { proposalVotesSchema } from './schema'

export const proposalVotes = (query: ExplorerQuery) =>
  createRpcMethod(proposalVotesSchema, async ([planId, index, page], c) => {
    const proposal = withSignal(query, c).votePlan(planId).proposal(index)
    const connection = await proposal.votes(page ?? {})
    return safeResult(connectionJson(connection, (vote) => vote))
  })
