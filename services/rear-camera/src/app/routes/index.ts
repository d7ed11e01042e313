import type { FastifyInstance } from 'fastify';
import type { HeartbeatClient } from '@fleet/heartbeat';
import { REAR_CAMERA_BASE_PATH } from '@fleet/protocol';
import type { CameraController } from '../../camera/cameraController';
import { registerCameraRoutes } from './camera';
import { registerHealthRoutes } from './health';

export interface RouteDeps {
  deviceId: string;
  camera: CameraController;
  heartbeat: HeartbeatClient;
}

export const registerRoutes = async (app: FastifyInstance, { deviceId, camera, heartbeat }: RouteDeps) => {
  await app.register(registerHealthRoutes, { deviceId, camera, heartbeat });
  await app.register(registerCameraRoutes, { prefix: REAR_CAMERA_BASE_PATH, camera, heartbeat });
};
