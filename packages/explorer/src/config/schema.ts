import { z } from 'zod'
import { LogLevels } from '../logging'
import {
  EPOCH_STABILITY_DEPTH_DEFAULT,
  FEES_DEFAULT,
  LOG_LEVEL_DEFAULT,
  MAX_PAGE_SIZE_DEFAULT,
  ORPHAN_BUFFER_LIMIT_DEFAULT,
  RPC_ADDRESS_DEFAULT,
  RPC_BODY_LIMIT_DEFAULT,
  RPC_PORT_DEFAULT,
} from './constants'

const zValue = z
  .union([
    z.bigint().nonnegative(),
    z.number().int().nonnegative(),
    z.string().regex(/^\d+$/, 'Expected a decimal integer string'),
  ])
  .transform((v) => BigInt(v))

const feesSchema = z.object({
  constant: zValue.default(FEES_DEFAULT.constant),
  coefficient: zValue.default(FEES_DEFAULT.coefficient),
  certificate: zValue.default(FEES_DEFAULT.certificate),
  certificatePoolRegistration: zValue.default(
    FEES_DEFAULT.certificatePoolRegistration,
  ),
  certificateStakeDelegation: zValue.default(
    FEES_DEFAULT.certificateStakeDelegation,
  ),
  certificateOwnerStakeDelegation: zValue.default(
    FEES_DEFAULT.certificateOwnerStakeDelegation,
  ),
  certificateVotePlan: zValue.default(FEES_DEFAULT.certificateVotePlan),
  certificateVoteCast: zValue.default(FEES_DEFAULT.certificateVoteCast),
})

const rpcSchema = z.object({
  enabled: z.boolean().default(true),
  address: z.string().min(1).default(RPC_ADDRESS_DEFAULT),
  port: z.number().int().min(0).max(65535).default(RPC_PORT_DEFAULT),
  cors: z.string().optional(),
  bodyLimit: z.number().int().positive().default(RPC_BODY_LIMIT_DEFAULT),
  stacktraces: z.boolean().default(false),
  debug: z.boolean().default(false),
})

export const configOptionsSchema = z.object({
  epochStabilityDepth: z
    .number()
    .int()
    .nonnegative()
    .default(EPOCH_STABILITY_DEPTH_DEFAULT),
  retentionWindow: z.number().int().nonnegative().optional(),
  maxPageSize: z.number().int().positive().default(MAX_PAGE_SIZE_DEFAULT),
  orphanBufferLimit: z
    .number()
    .int()
    .positive()
    .default(ORPHAN_BUFFER_LIMIT_DEFAULT),
  datadir: z.string().min(1).optional(),
  logLevel: z.enum(LogLevels).default(LOG_LEVEL_DEFAULT),
  fees: feesSchema.prefault({}),
  rpc: rpcSchema.prefault({}),
  metrics: z.object({ enabled: z.boolean().default(true) }).prefault({}),
})

export type ParsedConfigOptions = z.output<typeof configOptionsSchema>
