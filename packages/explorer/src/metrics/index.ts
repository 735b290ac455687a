import { collectDefaultMetrics } from 'prom-client'
import { createIndexMetrics, type IndexMetrics } from './index-metrics'
import { RegistryMetricCreator } from './registry'
import { createRpcMetrics, type RpcMetrics } from './rpc-metrics'

export type Metrics = {
  index: IndexMetrics
  rpc: RpcMetrics
  register: RegistryMetricCreator
}

export interface MetricsOptions {
  /** Whether to collect default Node.js metrics */
  collectDefaultMetrics?: boolean
}

export function createMetrics(opts: MetricsOptions = {}): Metrics {
  const register = new RegistryMetricCreator()
  const index = createIndexMetrics(register)
  const rpc = createRpcMetrics(register)

  if (opts.collectDefaultMetrics === true) {
    collectDefaultMetrics({ register, prefix: 'explorer_' })
  }

  return { index, rpc, register }
}

export { RegistryMetricCreator } from './registry'
export type { IndexMetrics, RpcMetrics }
