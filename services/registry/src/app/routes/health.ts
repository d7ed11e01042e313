import type { FastifyInstance } from 'fastify';
import { mapStats } from './mappers';

export const registerHealthRoutes = async (app: FastifyInstance) => {
  app.get('/health', {
    schema: {
      description: 'Health check endpoint',
      tags: ['health']
    }
  }, async () => ({
    status: 'ok',
    service: 'registry',
    registry: mapStats(await app.registrationService.stats()),
    sweeper: app.sweeperRunner.status(),
    last_sweep: app.livenessSweeper.lastRun()
  }));
};
