import { safeTry } from '@chain-explorer/utils'
import {
  classifyError,
  InvalidCursorError,
  PaginationError,
  QueryCancelledError,
} from '../errors'
import { decodeCursorFor, encodeCursor } from './cursor'
import type {
  Connection,
  CursorKind,
  Edge,
  PaginationArgs,
  Sequence,
} from './types'

export interface ConnectionParams<T> {
  kind: CursorKind
  scope: string
  source: Sequence<T>
  args: PaginationArgs
  maxPageSize: number
  signal?: AbortSignal
}

const checkCount = (name: string, value: number | undefined) => {
  if (value === undefined) return
  if (!Number.isInteger(value) || value < 0) {
    throw new PaginationError(`${name} must be a non-negative integer`)
  }
}

/**
 * Resolve one page of `source`.
 *
 * `after`/`before` bound the window, `first` takes from its start and `last`
 * from its end. When both counts are given `first` is used; when neither is,
 * the page holds up to `maxPageSize` elements from the start. Page flags
 * describe the whole sequence as it is now, not just the window.
 */
export async function resolveConnection<T>(
  params: ConnectionParams<T>,
): Promise<Connection<T>> {
  const { kind, scope, source, args, maxPageSize, signal } = params
  checkCount('first', args.first)
  checkCount('last', args.last)

  const indexOf = (cursor: string): number => {
    const key = decodeCursorFor(cursor, kind, scope)
    const index = source.lowerBound(key)
    if (index >= source.count || source.keyAt(index) !== key) {
      throw new InvalidCursorError(`Cursor position ${key} is not in ${kind}`)
    }
    return index
  }

  let lo = 0
  let hi = source.count
  if (args.after !== undefined) lo = indexOf(args.after) + 1
  if (args.before !== undefined) hi = indexOf(args.before)
  if (hi < lo) hi = lo

  let start = lo
  let end = hi
  if (args.first !== undefined || args.last === undefined) {
    end = Math.min(hi, lo + Math.min(args.first ?? maxPageSize, maxPageSize))
  } else {
    start = Math.max(lo, hi - Math.min(args.last, maxPageSize))
  }

  const edges: Edge<T>[] = []
  for (let index = start; index < end; index++) {
    if (signal?.aborted === true) throw new QueryCancelledError()
    const key = source.keyAt(index)
    const cursor = encodeCursor({ kind, scope, key })
    const [err, node] = await safeTry(async () => source.resolve(key))
    if (err !== undefined) {
      edges.push({
        node: null,
        cursor,
        error: classifyError(err).toFieldError(),
      })
    } else {
      edges.push({ node, cursor })
    }
  }

  return {
    edges,
    pageInfo: {
      hasPreviousPage: start > 0,
      hasNextPage: end < source.count,
      startCursor: edges[0]?.cursor ?? null,
      endCursor: edges[edges.length - 1]?.cursor ?? null,
    },
    totalCount: source.count,
  }
}
