import type { Context } from 'hono'
import type { Connection } from '../../pagination'
import type { ExplorerQuery } from '../../query'
import type { RpcApiEnv } from '../types'

/**
 * Bind the query to the request so long scans stop once the client leaves
 */
export const withSignal = (
  query: ExplorerQuery,
  c: Context<RpcApiEnv>,
): ExplorerQuery => query.withSignal(c.req.raw.signal)

/**
 * Plain JSON of a connection, nodes rendered by `map`
 */
export const connectionJson = <T, R>(
  connection: Connection<T>,
  map: (node: T) => R,
) => ({
  totalCount: connection.totalCount,
  pageInfo: connection.pageInfo,
  edges: connection.edges.map((edge) => ({
    cursor: edge.cursor,
    node: edge.node === null ? null : map(edge.node),
    ...(edge.error === undefined ? {} : { error: edge.error }),
  })),
})
