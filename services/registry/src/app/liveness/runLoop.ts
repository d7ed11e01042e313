import type { ServiceLogger } from '../../observability/logging';
import type { LivenessSweeper } from '../../usecases/liveness/livenessSweeper';
import { sleep } from '../../infra/timers/sleep';

export interface SweeperRunnerOptions {
  enabled: boolean;
  intervalMs: number;
  sweepOnStart: boolean;
}

export interface SweeperRunnerStatus {
  running: boolean;
  intervalMs: number;
  ticks: number;
  failedTicks: number;
}

export interface SweeperRunner {
  start(): Promise<void>;
  stop(): Promise<void>;
  status(): SweeperRunnerStatus;
}

/**
 * Single cancellable periodic task around the sweeper. A failing tick is
 * logged and the next one runs on schedule.
 */
export const createSweeperRunner = (
  sweeper: LivenessSweeper,
  options: SweeperRunnerOptions,
  logger: ServiceLogger
): SweeperRunner => {
  let running = false;
  let loopPromise: Promise<void> | null = null;
  let abortController: AbortController | null = null;
  let ticks = 0;
  let failedTicks = 0;
  const { intervalMs } = options;

  const tick = async () => {
    ticks += 1;
    try {
      await sweeper.sweep();
    } catch (error) {
      failedTicks += 1;
      logger.error({ err: error }, 'sweep_failed');
    }
  };

  const runLoop = async (signal: AbortSignal) => {
    if (options.sweepOnStart) {
      await tick();
    }
    while (!signal.aborted) {
      const waited = await sleep(intervalMs, signal);
      if (!waited) break;
      await tick();
    }
  };

  return {
    async start() {
      if (!options.enabled) {
        logger.info('sweeper disabled via SWEEPER_ENABLED=false');
        return;
      }
      if (running) {
        logger.warn('sweeper already running');
        return;
      }
      running = true;
      abortController = new AbortController();
      loopPromise = runLoop(abortController.signal);
      logger.info({ intervalMs }, 'sweeper started');
    },

    async stop() {
      if (!running) return;
      running = false;
      abortController?.abort();
      if (loopPromise) {
        await loopPromise;
      }
      loopPromise = null;
      abortController = null;
      logger.info('sweeper stopped');
    },

    status() {
      return { running, intervalMs, ticks, failedTicks };
    }
  };
};
