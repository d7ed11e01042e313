import type { FastifyPluginAsync } from 'fastify';
import type { HeartbeatClient } from '@fleet/heartbeat';
import type { CameraController } from '../../camera/cameraController';

export interface HealthRouteOptions {
  deviceId: string;
  camera: CameraController;
  heartbeat: HeartbeatClient;
}

export const registerHealthRoutes: FastifyPluginAsync<HealthRouteOptions> = async (app, { deviceId, camera, heartbeat }) => {
  app.get('/health', async () => ({
    status: 'ok',
    service: 'rear-camera',
    device_id: deviceId,
    camera_status: camera.status(),
    heartbeat: heartbeat.getStatus()
  }));
};
