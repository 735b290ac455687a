import type { ErrorCode } from '../errors'

/**
 * Every paginated sequence the explorer serves. A cursor is only accepted by
 * the sequence kind and scope it was issued for.
 */
export const CursorKinds = [
  'branch-blocks',
  'block-transactions',
  'epoch-blocks',
  'address-transactions',
  'pool-blocks',
  'stake-pools',
  'vote-plans',
  'proposal-votes',
] as const
export type CursorKind = (typeof CursorKinds)[number]

export interface PaginationArgs {
  first?: number
  last?: number
  after?: string
  before?: string
}

export interface FieldError {
  code: ErrorCode
  message: string
}

export interface Edge<T> {
  /** null when the node failed to resolve, see `error` */
  node: T | null
  cursor: string
  error?: FieldError
}

export interface PageInfo {
  hasPreviousPage: boolean
  hasNextPage: boolean
  startCursor: string | null
  endCursor: string | null
}

export interface Connection<T> {
  edges: Edge<T>[]
  pageInfo: PageInfo
  totalCount: number
}

/**
 * A stably ordered sequence addressed by strictly increasing integer keys.
 * Keys of existing elements never change while the sequence grows.
 */
export interface Sequence<T> {
  readonly count: number
  keyAt(index: number): number
  /** Index of the first element whose key is >= `key`, `count` if none */
  lowerBound(key: number): number
  resolve(key: number): T | Promise<T>
}
