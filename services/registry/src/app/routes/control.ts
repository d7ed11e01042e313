import type { FastifyInstance } from 'fastify';
import { ControlBodySchema, type CleanupResponse, type ControlResponse } from '@fleet/protocol';
import { ControlParamsSchema } from './schemas/devices';
import { sendValidationError } from './validation';

export const registerControlRoutes = async (app: FastifyInstance) => {
  // ============================================================================
  // POST /control/:deviceId/:command - Forward a command to the device
  // ============================================================================

  app.post('/control/:deviceId/:command', {
    schema: {
      description: 'Forward a command to an active device',
      tags: ['control']
    }
  }, async (request, reply) => {
    const params = ControlParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(request, reply, 'Invalid parameters', params.error);
    }
    const body = ControlBodySchema.safeParse(request.body ?? undefined);
    if (!body.success) {
      return sendValidationError(request, reply, 'Invalid body payload', body.error);
    }

    const { deviceId, command } = params.data;
    const result = await app.commandDispatcher.dispatch(deviceId, command, body.data?.parameters);
    if (!result.ok) {
      throw result.error;
    }

    const response: ControlResponse = {
      device_id: result.value.deviceId,
      command: result.value.command,
      device_response: result.value.payload
    };
    return reply.code(200).send(response);
  });

  // ============================================================================
  // POST /cleanup - Run a sweep now
  // ============================================================================

  app.post('/cleanup', {
    schema: {
      description: 'Run the liveness sweep immediately and report removed devices',
      tags: ['control']
    }
  }, async (request, reply) => {
    const removed = await app.livenessSweeper.sweep();
    request.log.info({ removed: removed.length }, 'cleanup_forced');
    const response: CleanupResponse = { removed_devices: removed, removed_count: removed.length };
    return reply.send(response);
  });
};
