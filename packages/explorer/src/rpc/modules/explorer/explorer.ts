import type { ExplorerQuery } from '../../../query'
import { ExplorerRpcMethods, type RpcMethods } from '../types'
import { address } from './address'
import { addressTransactions } from './address-transactions'
import { block } from './block'
import { blockTransactions } from './block-transactions'
import { blocksByChainLength } from './blocks-by-chain-length'
import { branch } from './branch'
import { branchBlocks } from './branch-blocks'
import { branchStakePools } from './branch-stake-pools'
import { branchTransactionsByAddress } from './branch-transactions-by-address'
import { branchVotePlans } from './branch-vote-plans'
import { branches } from './branches'
import { epoch } from './epoch'
import { epochBlocks } from './epoch-blocks'
import { proposalVotes } from './proposal-votes'
import { settings } from './settings'
import { stakePool } from './stake-pool'
import { stakePoolBlocks } from './stake-pool-blocks'
import { tip } from './tip'
import { transaction } from './transaction'
import { votePlan } from './vote-plan'

export const createExplorerRpcMethods = (
  query: ExplorerQuery,
): RpcMethods<typeof ExplorerRpcMethods> => {
  return {
    [ExplorerRpcMethods.explorer_block]: block(query),
    [ExplorerRpcMethods.explorer_blocksByChainLength]: blocksByChainLength(query),
    [ExplorerRpcMethods.explorer_blockTransactions]: blockTransactions(query),
    [ExplorerRpcMethods.explorer_transaction]: transaction(query),
    [ExplorerRpcMethods.explorer_branches]: branches(query),
    [ExplorerRpcMethods.explorer_tip]: tip(query),
    [ExplorerRpcMethods.explorer_branch]: branch(query),
    [ExplorerRpcMethods.explorer_branchBlocks]: branchBlocks(query),
    [ExplorerRpcMethods.explorer_branchTransactionsByAddress]:
      branchTransactionsByAddress(query),
    [ExplorerRpcMethods.explorer_branchStakePools]: branchStakePools(query),
    [ExplorerRpcMethods.explorer_branchVotePlans]: branchVotePlans(query),
    [ExplorerRpcMethods.explorer_epoch]: epoch(query),
    [ExplorerRpcMethods.explorer_epochBlocks]: epochBlocks(query),
    [ExplorerRpcMethods.explorer_address]: address(query),
    [ExplorerRpcMethods.explorer_addressTransactions]:
      addressTransactions(query),
    [ExplorerRpcMethods.explorer_stakePool]: stakePool(query),
    [ExplorerRpcMethods.explorer_stakePoolBlocks]: stakePoolBlocks(query),
    [ExplorerRpcMethods.explorer_settings]: settings(query),
    [ExplorerRpcMethods.explorer_votePlan]: votePlan(query),
    [ExplorerRpcMethods.explorer_proposalVotes]: proposalVotes(query),
  }
}
