import type { FastifyInstance } from 'fastify';
import { loadConfig } from '../config';
import { buildServer, type BuildServerOptions } from './buildServer';

export interface RegistryServer {
  app: FastifyInstance;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export const createServer = async (options: BuildServerOptions = {}): Promise<RegistryServer> => {
  const config = options.config ?? loadConfig();
  const { app, container } = await buildServer({ ...options, config });

  return {
    app,
    async start() {
      await app.listen({ host: config.HTTP_HOST, port: config.HTTP_PORT });
      await container.sweeperRunner.start();
      app.log.info({ sweepIntervalMs: config.SWEEP_INTERVAL_MS }, 'registry ready');
    },
    async stop() {
      app.log.info('Starting graceful shutdown sequence...');
      await container.sweeperRunner.stop();
      await app.close();
      app.log.info('Graceful shutdown complete');
    }
  };
};

if (process.argv[1] && import.meta.url === `file://${process.argv[1]}`) {
  let server: RegistryServer | null = null;
  let isShuttingDown = false;
  const SHUTDOWN_TIMEOUT_MS = 15_000;

  const gracefulShutdown = async (signal: string) => {
    if (isShuttingDown) {
      console.log(`${signal} received again, forcing immediate exit`);
      process.exit(1);
    }
    isShuttingDown = true;
    console.log(`${signal} received, initiating graceful shutdown (max ${SHUTDOWN_TIMEOUT_MS}ms)...`);

    const forceExitTimer = setTimeout(() => {
      console.error('Graceful shutdown timeout exceeded, forcing exit');
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      if (server) {
        await server.stop();
      }
      clearTimeout(forceExitTimer);
      process.exit(0);
    } catch (error) {
      console.error('Error during graceful shutdown:', error);
      clearTimeout(forceExitTimer);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  createServer()
    .then((s) => {
      server = s;
      return server.start();
    })
    .catch((error) => {
      console.error('Failed to start registry service', error);
      process.exit(1);
    });
}
