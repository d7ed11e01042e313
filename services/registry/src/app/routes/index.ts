import type { FastifyInstance } from 'fastify';
import { CONTROLLER_BASE_PATH } from '@fleet/protocol';
import { registerControlRoutes } from './control';
import { registerDeviceRoutes } from './devices';
import { registerHealthRoutes } from './health';

export const registerRoutes = async (app: FastifyInstance) => {
  await app.register(registerHealthRoutes);
  await app.register(registerDeviceRoutes, { prefix: CONTROLLER_BASE_PATH });
  await app.register(registerControlRoutes, { prefix: CONTROLLER_BASE_PATH });
};
