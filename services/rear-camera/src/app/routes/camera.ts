import type { FastifyPluginAsync } from 'fastify';
import type { HeartbeatClient } from '@fleet/heartbeat';
import type { CameraController } from '../../camera/cameraController';

export interface CameraRouteOptions {
  camera: CameraController;
  heartbeat: HeartbeatClient;
}

export const registerCameraRoutes: FastifyPluginAsync<CameraRouteOptions> = async (app, { camera, heartbeat }) => {
  // ============================================================================
  // POST /up, /down - Move the camera
  // ============================================================================

  app.post('/up', async () => ({
    status: 'success',
    message: 'Camera moved up',
    movement_result: await camera.moveUp()
  }));

  app.post('/down', async () => ({
    status: 'success',
    message: 'Camera moved down',
    movement_result: await camera.moveDown()
  }));

  // ============================================================================
  // POST /reset - Back to middle
  // ============================================================================

  app.post('/reset', async () => ({
    status: 'success',
    message: 'Camera position reset',
    reset_result: await camera.reset()
  }));

  // ============================================================================
  // GET /status
  // ============================================================================

  app.get('/status', async () => ({
    status: 'success',
    camera_status: camera.status(),
    heartbeat: heartbeat.getStatus()
  }));
};
