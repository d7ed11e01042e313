import type { RegistryConfig } from '../config';
import { resolveDeviceTypeLimits } from '../config';
import type { ServiceLogger } from '../observability/logging';
import type { RegistryMetrics } from '../observability/metrics';
import type { DeviceEndpointPort } from '../ports/deviceEndpoint/deviceEndpointPort';
import { createHttpDeviceEndpointAdapter } from '../ports/deviceEndpoint/http/httpDeviceEndpointAdapter';
import type { LifecycleEventsPort } from '../ports/events/lifecycleEventsPort';
import { createLoggingLifecycleEventsAdapter } from '../ports/events/logging/loggingLifecycleEventsAdapter';
import type { DeviceStore } from '../repositories/deviceStore';
import { createInMemoryDeviceStore } from '../repositories/inMemoryDeviceStore';
import { createCommandDispatcher, type CommandDispatcher } from '../usecases/dispatch/commandDispatcher';
import { createLivenessSweeper, type LivenessSweeper } from '../usecases/liveness/livenessSweeper';
import { createRegistrationService, type RegistrationService } from '../usecases/registration/registrationService';
import { createSweeperRunner, type SweeperRunner } from './liveness/runLoop';

export interface RegistryContainer {
  store: DeviceStore;
  events: LifecycleEventsPort;
  registrationService: RegistrationService;
  commandDispatcher: CommandDispatcher;
  livenessSweeper: LivenessSweeper;
  sweeperRunner: SweeperRunner;
}

/** Seams tests and embedders may replace; everything else is built from config. */
export interface RegistryContainerOverrides {
  store?: DeviceStore;
  events?: LifecycleEventsPort;
  deviceEndpoint?: DeviceEndpointPort;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

export const createRegistryContainer = (
  config: RegistryConfig,
  logger: ServiceLogger,
  metrics: RegistryMetrics,
  overrides: RegistryContainerOverrides = {}
): RegistryContainer => {
  const now = overrides.now ?? (() => new Date());

  const store =
    overrides.store ??
    createInMemoryDeviceStore({
      limits: resolveDeviceTypeLimits(config),
      inactiveAfterMs: config.INACTIVE_THRESHOLD_MS,
      now
    });

  const events = overrides.events ?? createLoggingLifecycleEventsAdapter({ logger, metrics });
  const deviceEndpoint = overrides.deviceEndpoint ?? createHttpDeviceEndpointAdapter({ fetchImpl: overrides.fetchImpl });

  const registrationService = createRegistrationService({
    store,
    events,
    requirePeerMatch: config.REQUIRE_PEER_ADDRESS_MATCH
  });

  const livenessSweeper = createLivenessSweeper({
    store,
    events,
    logger,
    metrics,
    inactiveAfterMs: config.INACTIVE_THRESHOLD_MS,
    removeAfterMs: config.REMOVAL_THRESHOLD_MS,
    now
  });

  const commandDispatcher = createCommandDispatcher({
    store,
    endpoint: deviceEndpoint,
    events,
    logger,
    metrics,
    timeoutMs: config.DISPATCH_TIMEOUT_MS
  });

  const sweeperRunner = createSweeperRunner(
    livenessSweeper,
    {
      enabled: config.SWEEPER_ENABLED,
      intervalMs: config.SWEEP_INTERVAL_MS,
      sweepOnStart: config.SWEEP_ON_STARTUP
    },
    logger
  );

  return { store, events, registrationService, commandDispatcher, livenessSweeper, sweeperRunner };
};
