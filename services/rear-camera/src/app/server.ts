import type { FastifyInstance } from 'fastify';
import type { HeartbeatClient } from '@fleet/heartbeat';
import { loadConfig } from '../config';
import { buildServer, type BuildServerOptions } from './buildServer';

export interface RearCameraServer {
  app: FastifyInstance;
  heartbeat: HeartbeatClient;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export const createServer = async (options: BuildServerOptions = {}): Promise<RearCameraServer> => {
  const config = options.config ?? loadConfig();
  const { app, heartbeat } = await buildServer({ ...options, config });

  return {
    app,
    heartbeat,
    async start() {
      await app.listen({ host: config.HTTP_HOST, port: config.HTTP_PORT });
      if (config.HEARTBEAT_ENABLED) {
        await heartbeat.start();
      } else {
        app.log.info('heartbeat disabled via HEARTBEAT_ENABLED=false');
      }
      app.log.info({ deviceId: config.DEVICE_ID, controllerUrl: config.CONTROLLER_URL }, 'rear camera ready');
    },
    async stop() {
      app.log.info('Starting graceful shutdown sequence...');
      await heartbeat.stop();
      await app.close();
      app.log.info('Graceful shutdown complete');
    }
  };
};

if (process.argv[1] && import.meta.url === `file://${process.argv[1]}`) {
  let server: RearCameraServer | null = null;
  let isShuttingDown = false;
  const SHUTDOWN_TIMEOUT_MS = 10_000;

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
      console.error('Failed to start rear camera service', error);
      process.exit(1);
    });
}
