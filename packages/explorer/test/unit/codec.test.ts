import { describe, expect, it } from 'vitest'
import { ErrorCode, ValidationError } from '../../src/errors'
import {
  decodeAppliedBlock,
  decodeStoredBlock,
  encodeAppliedBlock,
  sameBlockContent,
} from '../../src/store/codec'
import {
  address,
  blockId,
  catchError,
  makeBlock,
  makeTx,
  poolId,
  txId,
} from './fixtures'

describe('block codec', () => {
  it('should decode feed values into tagged records', () => {
    const block = decodeAppliedBlock({
      id: blockId(1).toUpperCase(),
      parentId: blockId(0),
      date: { epoch: 3, slot: 9 },
      leader: { kind: 'stakePool', poolId: poolId(1) },
      transactions: [
        {
          id: txId(1),
          inputs: [{ amount: '25', address: address(1) }],
          outputs: [{ amount: 20, address: address(2) }],
          certificate: {
            kind: 'stakeDelegation',
            account: address(1),
            pools: [poolId(1)],
          },
        },
      ],
    })

    expect(block.id).toBe(blockId(1))
    expect(block.leader).toEqual({ kind: 'stakePool', poolId: poolId(1) })
    expect(block.transactions[0].inputs[0].amount).toBe(BigInt(25))
    expect(block.transactions[0].outputs[0].amount).toBe(BigInt(20))
    expect(block.transactions[0].certificate?.kind).toBe('stakeDelegation')
  })

  it('should reject malformed feed values', () => {
    expect(() =>
      decodeAppliedBlock({
        id: 'xyz',
        parentId: null,
        date: { epoch: 0, slot: 0 },
        transactions: [],
      }),
    ).toThrow(ValidationError)

    const err = catchError(() =>
      decodeAppliedBlock({ id: blockId(1), parentId: null, transactions: [] }),
    )
    expect(err).toBeInstanceOf(ValidationError)
    expect(err).toMatchObject({ code: ErrorCode.DECODE_FAILED })
  })

  it('should reject an unknown certificate kind', () => {
    expect(() =>
      decodeAppliedBlock({
        ...makeBlock(1, 0),
        transactions: [
          {
            id: txId(1),
            inputs: [],
            outputs: [],
            certificate: { kind: 'mint' },
          },
        ],
      }),
    ).toThrow(ValidationError)
  })

  it('should restore a stored block', () => {
    const block = makeBlock(2, 1, {
      transactions: [
        makeTx(1, {
          inputs: [[address(1), BigInt(7)]],
          outputs: [[address(2), BigInt(7)]],
        }),
      ],
    })
    const restored = decodeStoredBlock(encodeAppliedBlock(block))
    expect(sameBlockContent(restored, block)).toBe(true)
    expect(restored.transactions[0].outputs[0].amount).toBe(BigInt(7))
  })

  it('should compare content regardless of key order', () => {
    const a = makeBlock(1, 0)
    const b = {
      transactions: [],
      date: { slot: 1, epoch: 0 },
      parentId: blockId(0),
      id: blockId(1),
    }
    expect(sameBlockContent(a, b)).toBe(true)
    const moved = makeBlock(1, 0, { date: { epoch: 1, slot: 1 } })
    expect(sameBlockContent(a, moved)).toBe(false)
  })

  it('should reject stored text that is not JSON', () => {
    expect(() => decodeStoredBlock('{')).toThrow(ValidationError)
  })
})
