import type { LifecycleEvent, LifecycleEventsPort } from '../../ports/events/lifecycleEventsPort';
import type { DeviceStore } from '../../repositories/deviceStore';
import type { ServiceLogger } from '../../observability/logging';
import type { RegistryMetrics } from '../../observability/metrics';

export type LivenessSweeperDeps = {
  store: DeviceStore;
  events: LifecycleEventsPort;
  logger: ServiceLogger;
  inactiveAfterMs: number;
  removeAfterMs: number;
  metrics?: Pick<RegistryMetrics, 'sweepRunsTotal' | 'sweepDurationSeconds' | 'devicesGauge'>;
  now?: () => Date;
};

export type SweepSummary = {
  ranAt: string;
  inactivated: string[];
  removed: string[];
};

export type LivenessSweeper = {
  /** One pass: inactivate stale records, delete expired ones. Resolves to the removed ids. */
  sweep(): Promise<string[]>;
  lastRun(): SweepSummary | null;
};

const DEFAULT_NOW = () => new Date();

export const createLivenessSweeper = ({
  store,
  events,
  logger,
  inactiveAfterMs,
  removeAfterMs,
  metrics,
  now = DEFAULT_NOW
}: LivenessSweeperDeps): LivenessSweeper => {
  let last: SweepSummary | null = null;

  const publishQuietly = async (event: LifecycleEvent) => {
    try {
      await events.publish(event);
    } catch (error) {
      logger.warn({ err: error, event: event.kind, deviceId: event.deviceId }, 'lifecycle_event_publish_failed');
    }
  };

  return {
    async sweep() {
      const startedAt = now();
      const stopTimer = metrics?.sweepDurationSeconds.startTimer();
      try {
        const { inactivated, removed } = await store.sweep({ now: startedAt, inactiveAfterMs, removeAfterMs });
        const removedIds = removed.map((record) => record.deviceId);
        last = { ranAt: startedAt.toISOString(), inactivated, removed: removedIds };

        // store changes are committed at this point; publish failures are only logged
        for (const deviceId of inactivated) {
          await publishQuietly({ kind: 'marked_inactive', deviceId });
        }
        for (const record of removed) {
          await publishQuietly({ kind: 'removed_stale', deviceId: record.deviceId, lastSeen: record.lastSeen.toISOString() });
        }

        if (removedIds.length > 0 || inactivated.length > 0) {
          logger.info({ inactivated: inactivated.length, removed: removedIds.length }, 'sweep_completed');
        }

        metrics?.sweepRunsTotal.inc({ result: 'ok' });
        if (metrics) {
          const stats = await store.snapshotStats();
          metrics.devicesGauge.set({ status: 'active' }, stats.active);
          metrics.devicesGauge.set({ status: 'inactive' }, stats.inactive);
        }
        return removedIds;
      } catch (error) {
        metrics?.sweepRunsTotal.inc({ result: 'error' });
        throw error;
      } finally {
        stopTimer?.();
      }
    },

    lastRun() {
      return last;
    }
  };
};
