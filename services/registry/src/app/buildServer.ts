import Fastify from 'fastify';
import fastifySwagger from '@fastify/swagger';
import fastifySwaggerUi from '@fastify/swagger-ui';
import { loadConfig, type RegistryConfig } from '../config';
import { loggerOptions } from '../observability/logging';
import { createRegistryMetrics } from '../observability/metrics';
import { registerErrorHandler } from './errorHandler';
import { registerMetricsHooks, registerMetricsRoute } from './metrics';
import { registerRoutes } from './routes';
import { createRegistryContainer, type RegistryContainerOverrides } from './serverContainer';

export interface BuildServerOptions {
  config?: RegistryConfig;
  enableSwagger?: boolean;
  overrides?: RegistryContainerOverrides;
}

export const buildServer = async ({ config = loadConfig(), enableSwagger, overrides }: BuildServerOptions = {}) => {
  const app = Fastify({
    logger: loggerOptions(config.LOG_LEVEL),
    disableRequestLogging: config.NODE_ENV === 'test'
  });

  const metrics = createRegistryMetrics({ collectDefaults: config.NODE_ENV !== 'test' });

  app.decorate('config', config);
  app.decorate('registryMetrics', metrics);

  registerMetricsHooks(app);
  registerErrorHandler(app);

  if (enableSwagger ?? config.ENABLE_SWAGGER) {
    await app.register(fastifySwagger, {
      openapi: {
        openapi: '3.1.0',
        info: {
          title: 'Fleet Registry API',
          description: 'Device registration, liveness tracking and command forwarding for the controller',
          version: '1.0.0'
        }
      }
    });
    await app.register(fastifySwaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true
      },
      staticCSP: true
    });
  }

  const container = createRegistryContainer(config, app.log, metrics, overrides);
  app.decorate('registrationService', container.registrationService);
  app.decorate('commandDispatcher', container.commandDispatcher);
  app.decorate('livenessSweeper', container.livenessSweeper);
  app.decorate('sweeperRunner', container.sweeperRunner);

  app.addHook('onClose', async () => {
    await container.sweeperRunner.stop();
  });

  await registerRoutes(app);
  registerMetricsRoute(app);

  return { app, container };
};
