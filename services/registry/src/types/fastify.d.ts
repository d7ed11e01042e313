import 'fastify';
import type { RegistryConfig } from '../config';
import type { RegistryMetrics } from '../observability/metrics';
import type { RegistrationService } from '../usecases/registration/registrationService';
import type { CommandDispatcher } from '../usecases/dispatch/commandDispatcher';
import type { LivenessSweeper } from '../usecases/liveness/livenessSweeper';
import type { SweeperRunner } from '../app/liveness/runLoop';

declare module 'fastify' {
  interface FastifyInstance {
    config: RegistryConfig;
    registryMetrics: RegistryMetrics;
    registrationService: RegistrationService;
    commandDispatcher: CommandDispatcher;
    livenessSweeper: LivenessSweeper;
    sweeperRunner: SweeperRunner;
  }

  interface FastifyRequest {
    metrics?: {
      startTime: bigint;
      route: string;
    };
  }
}
