import Fastify from 'fastify';
import { HeartbeatClient, createControllerClient } from '@fleet/heartbeat';
import { CameraController } from '../camera/cameraController';
import { advertisedPort, loadConfig, type RearCameraConfig } from '../config';
import { loggerOptions } from '../observability/logging';
import { registerErrorHandler } from './errorHandler';
import { registerRoutes } from './routes';

export interface BuildServerOptions {
  config?: RearCameraConfig;
  fetchImpl?: typeof fetch;
  now?: () => Date;
}

export const buildServer = async ({ config = loadConfig(), fetchImpl, now }: BuildServerOptions = {}) => {
  const app = Fastify({
    logger: loggerOptions(config.LOG_LEVEL),
    disableRequestLogging: config.NODE_ENV === 'test'
  });

  registerErrorHandler(app);

  const camera = new CameraController({
    moveDurationMs: config.CAMERA_MOVE_DURATION_MS,
    logger: app.log,
    now
  });

  const heartbeat = new HeartbeatClient({
    identity: {
      deviceId: config.DEVICE_ID,
      deviceType: 'rear-camera',
      address: config.ADVERTISED_ADDRESS,
      port: advertisedPort(config)
    },
    controller: createControllerClient({
      baseUrl: config.CONTROLLER_URL,
      fetchImpl,
      timeoutMs: config.HEARTBEAT_TIMEOUT_MS
    }),
    intervalMs: config.HEARTBEAT_INTERVAL_MS,
    retryAttempts: config.HEARTBEAT_RETRY_ATTEMPTS,
    retryDelayMs: config.HEARTBEAT_RETRY_DELAY_MS,
    stopTimeoutMs: config.HEARTBEAT_STOP_TIMEOUT_MS,
    logger: app.log,
    now
  });

  app.addHook('onClose', async () => {
    await heartbeat.stop();
  });

  await registerRoutes(app, { deviceId: config.DEVICE_ID, camera, heartbeat });

  return { app, camera, heartbeat };
};
