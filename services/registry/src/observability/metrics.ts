import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type RegistryMetrics = {
  registry: Registry;
  requestCounter: Counter<string>;
  requestDurationMs: Histogram<string>;
  lifecycleEventsTotal: Counter<string>;
  sweepRunsTotal: Counter<string>;
  sweepDurationSeconds: Histogram<string>;
  dispatchTotal: Counter<string>;
  devicesGauge: Gauge<string>;
};

/**
 * Creates a new isolated metrics registry and all registry metrics.
 * Each server instance gets its own so tests never share counters.
 */
export function createRegistryMetrics(opts?: { defaultPrefix?: string; collectDefaults?: boolean }): RegistryMetrics {
  const registry = new Registry();
  const prefix = opts?.defaultPrefix ?? 'registry_';

  if (opts?.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const requestCounter = new Counter({
    name: `${prefix}http_requests_total`,
    help: 'Total HTTP requests received',
    labelNames: ['route', 'method', 'statusCode'],
    registers: [registry]
  });

  const requestDurationMs = new Histogram({
    name: `${prefix}http_request_duration_ms`,
    help: 'HTTP request duration in milliseconds',
    buckets: [5, 10, 25, 50, 100, 250, 500, 1_000, 2_500, 5_000, 10_000],
    labelNames: ['route', 'method', 'statusCode'],
    registers: [registry]
  });

  const lifecycleEventsTotal = new Counter({
    name: `${prefix}lifecycle_events_total`,
    help: 'Device lifecycle events emitted',
    labelNames: ['kind'],
    registers: [registry]
  });

  const sweepRunsTotal = new Counter({
    name: `${prefix}sweep_runs_total`,
    help: 'Liveness sweep executions',
    labelNames: ['result'],
    registers: [registry]
  });

  const sweepDurationSeconds = new Histogram({
    name: `${prefix}sweep_duration_seconds`,
    help: 'Liveness sweep duration in seconds',
    buckets: [0.001, 0.005, 0.01, 0.05, 0.1, 0.5, 1],
    registers: [registry]
  });

  const dispatchTotal = new Counter({
    name: `${prefix}dispatch_total`,
    help: 'Command dispatch outcomes',
    labelNames: ['command', 'outcome'],
    registers: [registry]
  });

  const devicesGauge = new Gauge({
    name: `${prefix}devices`,
    help: 'Registered devices by status',
    labelNames: ['status'],
    registers: [registry]
  });

  return {
    registry,
    requestCounter,
    requestDurationMs,
    lifecycleEventsTotal,
    sweepRunsTotal,
    sweepDurationSeconds,
    dispatchTotal,
    devicesGauge
  };
}
