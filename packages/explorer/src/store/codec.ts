/**
 * Feed codec.
 *
 * Applied blocks arrive as untyped JSON-like values. They are validated and
 * turned into tagged variants exactly once, here; every later stage works on
 * the typed {@link AppliedBlock}.
 */

import { isHexString, stringifyWithBigInt } from '@chain-explorer/utils'
import { z } from 'zod'
import { classifyError, ValidationError } from '../errors'
import type { AppliedBlock, BlockRecord, Certificate } from '../types'

const zHash = z
  .string()
  .transform((v) => v.toLowerCase())
  .refine((v) => isHexString(v, 32), 'Expected a 32 byte hex hash')

const zValue = z
  .union([
    z.bigint().nonnegative(),
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/, 'Expected a decimal integer string'),
  ])
  .transform((v) => BigInt(v))

const zNonZero = zValue.refine((v) => v > BigInt(0), 'Expected a non-zero value')

const zAddress = z
  .string()
  .min(1)
  .transform((v) => v.toLowerCase())

const zBlockDate = z.object({
  epoch: z.number().int().nonnegative(),
  slot: z.number().int().nonnegative(),
})

const zTaxType = z.object({
  fixed: zValue,
  ratio: z.object({ numerator: zValue, denominator: zNonZero }),
  maxLimit: zNonZero.optional(),
})

const zLeader = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('stakePool'), poolId: zHash }),
  z.object({ kind: z.literal('bftLeader'), publicKey: z.string().min(1) }),
])

const zOptionRange = z
  .object({
    start: z.number().int().nonnegative(),
    end: z.number().int().nonnegative(),
  })
  .refine((r) => r.end > r.start, 'Option range must not be empty')

const zVotePayload = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('public'), choice: z.number().int().nonnegative() }),
  z.object({
    kind: z.literal('private'),
    encryptedVote: z.string().min(1),
    proof: z.string().min(1),
  }),
])

export const certificateSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('stakeDelegation'),
    account: zAddress,
    pools: z.array(zHash),
  }),
  z.object({
    kind: z.literal('ownerStakeDelegation'),
    pools: z.array(zHash),
  }),
  z.object({
    kind: z.literal('poolRegistration'),
    poolId: zHash,
    startValidity: z.number().int().nonnegative(),
    managementThreshold: z.number().int().positive(),
    owners: z.array(z.string().min(1)),
    operators: z.array(z.string().min(1)),
    rewards: zTaxType,
    rewardAccount: zAddress.optional(),
  }),
  z.object({
    kind: z.literal('poolRetirement'),
    poolId: zHash,
    retirementTime: z.number().int().nonnegative(),
  }),
  z.object({
    kind: z.literal('poolUpdate'),
    poolId: zHash,
    startValidity: z.number().int().nonnegative(),
  }),
  z.object({
    kind: z.literal('votePlan'),
    votePlanId: zHash,
    voteStart: zBlockDate,
    voteEnd: zBlockDate,
    committeeEnd: zBlockDate,
    payloadType: z.enum(['public', 'private']),
    proposals: z.array(
      z.object({ externalId: z.string().min(1), options: zOptionRange }),
    ),
  }),
  z.object({
    kind: z.literal('voteCast'),
    votePlanId: zHash,
    proposalIndex: z.number().int().nonnegative(),
    payload: zVotePayload,
  }),
  z.object({
    kind: z.literal('voteTally'),
    votePlanId: zHash,
    results: z.array(z.array(zValue)),
  }),
  z.object({
    kind: z.literal('encryptedVoteTally'),
    votePlanId: zHash,
  }),
]) satisfies z.ZodType<Certificate>

const zTransaction = z.object({
  id: zHash,
  inputs: z.array(z.object({ amount: zValue, address: zAddress })),
  outputs: z.array(z.object({ amount: zValue, address: zAddress })),
  certificate: certificateSchema.optional(),
})

export const appliedBlockSchema = z.object({
  id: zHash,
  parentId: zHash.nullable(),
  date: zBlockDate,
  leader: zLeader.optional(),
  treasury: z
    .object({ rewards: zValue, treasury: zValue, treasuryTax: zTaxType })
    .optional(),
  transactions: z.array(zTransaction),
}) satisfies z.ZodType<AppliedBlock>

/**
 * Validate and decode one element of the applied-block feed
 */
export function decodeAppliedBlock(input: unknown): AppliedBlock {
  const parsed = appliedBlockSchema.safeParse(input)
  if (!parsed.success) {
    throw classifyError(parsed.error, {
      component: 'codec',
      operation: 'decodeAppliedBlock',
    })
  }
  return parsed.data
}

/**
 * Serialize a block to the JSON stored in the durable log
 */
export function encodeAppliedBlock(block: AppliedBlock): string {
  return stringifyWithBigInt(appliedFields(block))
}

function appliedFields(block: AppliedBlock): AppliedBlock {
  const { id, parentId, date, leader, treasury, transactions } = block
  return { id, parentId, date, leader, treasury, transactions }
}

/**
 * Inverse of {@link encodeAppliedBlock}
 */
export function decodeStoredBlock(json: string): AppliedBlock {
  let value: unknown
  try {
    value = JSON.parse(json)
  } catch (err) {
    throw new ValidationError('Stored block is not valid JSON', { cause: err })
  }
  return decodeAppliedBlock(value)
}

/**
 * Derive the indexed record of an applied block
 */
export function toBlockRecord(
  block: AppliedBlock,
  chainLength: number,
): BlockRecord {
  let totalInput = BigInt(0)
  let totalOutput = BigInt(0)
  for (const tx of block.transactions) {
    for (const input of tx.inputs) totalInput += input.amount
    for (const output of tx.outputs) totalOutput += output.amount
  }
  return { ...block, chainLength, totalInput, totalOutput }
}

const canonicalize = (_key: string, value: unknown): unknown => {
  if (typeof value === 'bigint') return value.toString()
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    return Object.fromEntries(
      Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
    )
  }
  return value
}

/**
 * True when two applied blocks carry the same content, regardless of key order
 */
export function sameBlockContent(a: AppliedBlock, b: AppliedBlock): boolean {
  return (
    JSON.stringify(appliedFields(a), canonicalize) ===
    JSON.stringify(appliedFields(b), canonicalize)
  )
}
