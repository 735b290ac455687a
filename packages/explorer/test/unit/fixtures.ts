import { bech32 } from '@scure/base'
import {
  type AppliedBlock,
  type Certificate,
  Explorer,
  type ExplorerInitOptions,
  type Transaction,
} from '../../src'

const hash = (tag: string, n: number) => `${tag}${n.toString(16).padStart(63, '0')}`

export const blockId = (n: number) => hash('b', n)
export const txId = (n: number) => hash('a', n)
export const poolId = (n: number) => hash('c', n)
export const planId = (n: number) => hash('d', n)

export const address = (n: number) =>
  bech32.encode('addr', bech32.toWords(new Uint8Array(32).fill(n)))

export const makeBlock = (
  n: number,
  parent: number | null,
  fields: Partial<Omit<AppliedBlock, 'id' | 'parentId'>> = {},
): AppliedBlock => ({
  id: blockId(n),
  parentId: parent === null ? null : blockId(parent),
  date: { epoch: 0, slot: n },
  transactions: [],
  ...fields,
})

export interface TxFields {
  inputs?: Array<[string, bigint]>
  outputs?: Array<[string, bigint]>
  certificate?: Certificate
}

export const makeTx = (n: number, fields: TxFields = {}): Transaction => ({
  id: txId(n),
  inputs: (fields.inputs ?? []).map(([addr, amount]) => ({
    address: addr,
    amount,
  })),
  outputs: (fields.outputs ?? []).map(([addr, amount]) => ({
    address: addr,
    amount,
  })),
  certificate: fields.certificate,
})

export const createTestExplorer = (opts: ExplorerInitOptions = {}) =>
  Explorer.init({
    logLevel: 'off',
    rpc: { enabled: false },
    metrics: { enabled: false },
    ...opts,
  })

export async function submitAll(
  explorer: Explorer,
  blocks: readonly AppliedBlock[],
): Promise<void> {
  for (const block of blocks) {
    await explorer.submit(block)
  }
}

/**
 * Blocks `from`..`to`, each the child of the one numbered before it
 */
export const linearChain = (from: number, to: number): AppliedBlock[] => {
  const blocks: AppliedBlock[] = []
  for (let n = from; n <= to; n++) {
    blocks.push(makeBlock(n, n === 0 ? null : n - 1))
  }
  return blocks
}

export const catchError = (fn: () => unknown): unknown => {
  try {
    fn()
  } catch (err) {
    return err
  }
  return undefined
}
