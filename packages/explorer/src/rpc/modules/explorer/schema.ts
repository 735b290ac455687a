import { z } from 'zod'

const id = z.string().min(1, 'Expected an id')

const chainLength = z.union([
  z.number().int().nonnegative(),
  z
    .string()
    .regex(/^\d+$/, 'Expected a chain length')
    .transform((v) => Number(v)),
])

const epoch = z.number().int().nonnegative()

export const paginationSchema = z
  .object({
    first: z.number().int().nonnegative().optional(),
    last: z.number().int().nonnegative().optional(),
    after: z.string().optional(),
    before: z.string().optional(),
  })
  .strict()

const page = paginationSchema.optional()

export const noParamsSchema = z.tuple([])

export const blockSchema = z.tuple([id])
export const blocksByChainLengthSchema = z.tuple([chainLength])
export const blockTransactionsSchema = z.tuple([id, page])
export const transactionSchema = z.tuple([id])
export const branchSchema = z.tuple([id])
export const branchBlocksSchema = z.tuple([id, page])
export const branchTransactionsByAddressSchema = z.tuple([id, id, page])
export const branchStakePoolsSchema = z.tuple([id, page])
export const branchVotePlansSchema = z.tuple([id, page])
export const epochSchema = z.tuple([epoch])
export const epochBlocksSchema = z.tuple([epoch, page])
export const addressSchema = z.tuple([id])
export const addressTransactionsSchema = z.tuple([id, page])
export const stakePoolSchema = z.tuple([id])
export const stakePoolBlocksSchema = z.tuple([id, page])
export const votePlanSchema = z.tuple([id])
export const proposalVotesSchema = z.tuple([
  id,
  z.number().int().nonnegative(),
  page,
])
