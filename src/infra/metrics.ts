import { Counter, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export interface Metrics {
  registry: Registry;
  rpcRequests: Counter<'method' | 'code'>;
  rpcDuration: Histogram<'method'>;
}

export interface MetricsOptions {
  /** Process and runtime metrics; tests switch them off. */
  collectDefaults?: boolean;
}

export function createMetrics(options: MetricsOptions = {}): Metrics {
  const registry = new Registry();
  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  const rpcRequests = new Counter({
    name: 'user_service_rpc_requests_total',
    help: 'gRPC requests handled, by method and status code',
    labelNames: ['method', 'code'] as const,
    registers: [registry],
  });

  const rpcDuration = new Histogram({
    name: 'user_service_rpc_duration_seconds',
    help: 'gRPC request duration in seconds',
    labelNames: ['method'] as const,
    buckets: [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
    registers: [registry],
  });

  return { registry, rpcRequests, rpcDuration };
}
