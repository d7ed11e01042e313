import { RearCameraConfigSchema, type RearCameraConfig } from '../../config';

export const createTestConfig = (env: Record<string, string> = {}): RearCameraConfig =>
  RearCameraConfigSchema.parse({
    NODE_ENV: 'test',
    LOG_LEVEL: 'error',
    HEARTBEAT_ENABLED: 'false',
    CAMERA_MOVE_DURATION_MS: '0',
    ...env
  });
