import type { ControllerClient, DeviceIdentity } from './controllerClient.js';
import { HeartbeatRejectedError, isRetryableHeartbeatError } from './errors.js';
import { logWithContext, sanitizeError, type SafeLogger } from './logging.js';
import { sleep } from './sleep.js';

export type HeartbeatHealth = 'never_succeeded' | 'healthy' | 'degraded' | 'unhealthy';

export interface HeartbeatClientOptions {
  identity: DeviceIdentity;
  controller: ControllerClient;
  intervalMs?: number;
  retryAttempts?: number;
  retryDelayMs?: number;
  /** Upper bound on how long stop() waits for the loop to exit. */
  stopTimeoutMs?: number;
  logger?: SafeLogger;
  now?: () => Date;
}

export interface HeartbeatStatistics {
  successes: number;
  failures: number;
  lastSuccessAt: string | null;
  lastFailureAt: string | null;
  lastError: string | null;
}

export interface HeartbeatStatus {
  running: boolean;
  deviceId: string;
  settings: {
    intervalMs: number;
    retryAttempts: number;
    retryDelayMs: number;
  };
  statistics: HeartbeatStatistics;
  health: HeartbeatHealth;
}

export const DEFAULT_HEARTBEAT_INTERVAL_MS = 30_000;
export const DEFAULT_RETRY_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 5_000;
export const DEFAULT_STOP_TIMEOUT_MS = 5_000;

const UNHEALTHY_INTERVAL_MULTIPLIER = 3;

export class HeartbeatClient {
  private intervalMs: number;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  private readonly stopTimeoutMs: number;
  private readonly now: () => Date;

  private running = false;
  private loopPromise: Promise<void> | null = null;
  /** A loop stop() gave up waiting for; the next start() waits for it to exit. */
  private orphanedLoop: Promise<void> | null = null;
  private generation = 0;
  private abortController: AbortController | null = null;

  private successes = 0;
  private failures = 0;
  private lastSuccess: Date | null = null;
  private lastFailure: Date | null = null;
  private lastError: string | null = null;

  constructor(private readonly options: HeartbeatClientOptions) {
    this.intervalMs = options.intervalMs ?? DEFAULT_HEARTBEAT_INTERVAL_MS;
    this.retryAttempts = Math.max(1, options.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS);
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.now = options.now ?? (() => new Date());
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) {
      logWithContext(this.options.logger, 'warn', 'heartbeat already running');
      return;
    }
    this.running = true;
    const generation = (this.generation += 1);

    const previous = this.orphanedLoop;
    if (previous) {
      logWithContext(this.options.logger, 'info', 'heartbeat_waiting_for_previous_loop');
      await previous;
      if (this.orphanedLoop === previous) {
        this.orphanedLoop = null;
      }
      // stop() or another start() ran while waiting
      if (!this.running || generation !== this.generation) return;
    }

    this.abortController = new AbortController();
    this.loopPromise = this.runLoop(this.abortController.signal);
    logWithContext(this.options.logger, 'info', 'heartbeat started', {
      deviceId: this.options.identity.deviceId,
      intervalMs: this.intervalMs
    });
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.abortController?.abort();

    const loop = this.loopPromise;
    if (loop) {
      let timer: NodeJS.Timeout | undefined;
      const timedOut = await Promise.race([
        loop.then(() => false),
        new Promise<boolean>((resolve) => {
          timer = setTimeout(() => resolve(true), this.stopTimeoutMs);
        })
      ]);
      clearTimeout(timer);
      if (timedOut) {
        this.orphanedLoop = loop;
        logWithContext(this.options.logger, 'warn', 'heartbeat_stop_timeout', { stopTimeoutMs: this.stopTimeoutMs });
      }
    }

    this.loopPromise = null;
    this.abortController = null;
    logWithContext(this.options.logger, 'info', 'heartbeat stopped');
  }

  /**
   * Sends one heartbeat (with retries) outside the schedule. Resolves to whether it succeeded.
   */
  async forceHeartbeat(): Promise<boolean> {
    const signal = this.abortController?.signal ?? new AbortController().signal;
    return this.beat(signal);
  }

  /** Takes effect from the next wait onwards. */
  updateInterval(intervalMs: number): void {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`heartbeat interval must be positive, got ${intervalMs}`);
    }
    const previous = this.intervalMs;
    this.intervalMs = intervalMs;
    logWithContext(this.options.logger, 'info', 'heartbeat_interval_updated', { previous, intervalMs });
  }

  resetStatistics(): void {
    this.successes = 0;
    this.failures = 0;
    this.lastSuccess = null;
    this.lastFailure = null;
    this.lastError = null;
  }

  health(): HeartbeatHealth {
    if (!this.lastSuccess) return 'never_succeeded';
    if (!this.lastFailure || this.lastSuccess.getTime() > this.lastFailure.getTime()) return 'healthy';
    const sinceSuccess = this.now().getTime() - this.lastSuccess.getTime();
    return sinceSuccess > this.intervalMs * UNHEALTHY_INTERVAL_MULTIPLIER ? 'unhealthy' : 'degraded';
  }

  getStatus(): HeartbeatStatus {
    return {
      running: this.running,
      deviceId: this.options.identity.deviceId,
      settings: {
        intervalMs: this.intervalMs,
        retryAttempts: this.retryAttempts,
        retryDelayMs: this.retryDelayMs
      },
      statistics: {
        successes: this.successes,
        failures: this.failures,
        lastSuccessAt: this.lastSuccess?.toISOString() ?? null,
        lastFailureAt: this.lastFailure?.toISOString() ?? null,
        lastError: this.lastError
      },
      health: this.health()
    };
  }

  private async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.beat(signal);
      } catch (error) {
        logWithContext(this.options.logger, 'error', 'heartbeat_tick_failed', { err: sanitizeError(error) });
      }
      const completed = await sleep(this.intervalMs, signal);
      if (!completed) break;
    }
  }

  private async beat(signal: AbortSignal): Promise<boolean> {
    const { identity, controller, logger } = this.options;

    for (let attempt = 1; attempt <= this.retryAttempts; attempt += 1) {
      if (signal.aborted) return false;
      try {
        await controller.register(identity, signal);
        this.successes += 1;
        this.lastSuccess = this.now();
        logWithContext(logger, 'debug', 'heartbeat_sent', { deviceId: identity.deviceId, attempt });
        return true;
      } catch (error) {
        // a stop() mid-request is not a failed heartbeat
        if (signal.aborted) return false;

        this.failures += 1;
        this.lastFailure = this.now();
        this.lastError = error instanceof Error ? error.message : String(error);

        if (!isRetryableHeartbeatError(error)) {
          logWithContext(logger, 'warn', 'heartbeat_rejected', {
            deviceId: identity.deviceId,
            statusCode: error instanceof HeartbeatRejectedError ? error.statusCode : undefined,
            err: sanitizeError(error)
          });
          return false;
        }

        logWithContext(logger, 'warn', 'heartbeat_attempt_failed', {
          deviceId: identity.deviceId,
          attempt,
          retryAttempts: this.retryAttempts,
          err: sanitizeError(error)
        });

        if (attempt < this.retryAttempts) {
          const waited = await sleep(this.retryDelayMs, signal);
          if (!waited) return false;
        }
      }
    }

    logWithContext(logger, 'error', 'heartbeat_gave_up', { deviceId: identity.deviceId, retryAttempts: this.retryAttempts });
    return false;
  }
}
