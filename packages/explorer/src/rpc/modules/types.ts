import type { RpcMethodFn } from '../types'

export enum ExplorerRpcMethods {
  explorer_address = 'explorer_address',
  explorer_addressTransactions = 'explorer_addressTransactions',
  explorer_block = 'explorer_block',
  explorer_blockTransactions = 'explorer_blockTransactions',
  explorer_blocksByChainLength = 'explorer_blocksByChainLength',
  explorer_branch = 'explorer_branch',
  explorer_branchBlocks = 'explorer_branchBlocks',
  explorer_branchStakePools = 'explorer_branchStakePools',
  explorer_branchTransactionsByAddress = 'explorer_branchTransactionsByAddress',
  explorer_branchVotePlans = 'explorer_branchVotePlans',
  explorer_branches = 'explorer_branches',
  explorer_epoch = 'explorer_epoch',
  explorer_epochBlocks = 'explorer_epochBlocks',
  explorer_proposalVotes = 'explorer_proposalVotes',
  explorer_settings = 'explorer_settings',
  explorer_stakePool = 'explorer_stakePool',
  explorer_stakePoolBlocks = 'explorer_stakePoolBlocks',
  explorer_tip = 'explorer_tip',
  explorer_transaction = 'explorer_transaction',
  explorer_votePlan = 'explorer_votePlan',
}

export type RpcMethods<T extends Record<string, string>> = {
  [key in keyof T]: RpcMethodFn
}
