import type { ServiceLogger } from '../../../observability/logging';
import type { RegistryMetrics } from '../../../observability/metrics';
import type { LifecycleEvent, LifecycleEventsPort } from '../lifecycleEventsPort';

export type LoggingLifecycleEventsDeps = {
  logger: ServiceLogger;
  metrics?: Pick<RegistryMetrics, 'lifecycleEventsTotal'>;
};

const levelFor = (event: LifecycleEvent): 'info' | 'warn' =>
  event.kind === 'dispatch_failed' || event.kind === 'removed_stale' ? 'warn' : 'info';

export const createLoggingLifecycleEventsAdapter = ({ logger, metrics }: LoggingLifecycleEventsDeps): LifecycleEventsPort => ({
  async publish(event) {
    const { kind, ...context } = event;
    logger[levelFor(event)]({ event: kind, ...context }, kind);
    metrics?.lifecycleEventsTotal.inc({ kind });
  }
});
