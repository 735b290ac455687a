import type { RegistryMetricCreator } from './registry'

export type RpcMetrics = ReturnType<typeof createRpcMetrics>

export function createRpcMetrics(register: RegistryMetricCreator) {
  return {
    requests: register.counter<'method' | 'status'>({
      name: 'explorer_rpc_requests_total',
      help: 'JSON-RPC requests by method and outcome',
      labelNames: ['method', 'status'],
    }),
    duration: register.histogram<'method'>({
      name: 'explorer_rpc_request_seconds',
      help: 'Time spent resolving JSON-RPC requests',
      labelNames: ['method'],
      buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
    }),
    tipSubscribers: register.gauge({
      name: 'explorer_tip_subscribers',
      help: 'Open tip subscriptions',
    }),
  }
}
