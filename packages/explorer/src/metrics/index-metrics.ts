import type { RegistryMetricCreator } from './registry'

export type IndexMetrics = ReturnType<typeof createIndexMetrics>

/**
 * Create block index metrics
 */
export function createIndexMetrics(register: RegistryMetricCreator) {
  return {
    blocksIngested: register.counter({
      name: 'explorer_blocks_ingested_total',
      help: 'Total number of blocks linked into the index',
    }),
    orphansBuffered: register.gauge({
      name: 'explorer_orphans_buffered',
      help: 'Blocks waiting for their parent',
    }),
    quarantinedBlocks: register.counter({
      name: 'explorer_quarantined_blocks_total',
      help: 'Blocks rejected for forking below the confirmed point',
    }),
    mainSwitches: register.counter({
      name: 'explorer_main_branch_switches_total',
      help: 'Number of times a different branch became the main branch',
    }),
    liveBranches: register.gauge({
      name: 'explorer_live_branches',
      help: 'Branches currently in the live set',
    }),
    mainChainLength: register.gauge({
      name: 'explorer_main_chain_length',
      help: 'Chain length of the main branch tip',
    }),
    confirmedChainLength: register.gauge({
      name: 'explorer_confirmed_chain_length',
      help: 'Chain length of the newest confirmed block',
    }),
  }
}
