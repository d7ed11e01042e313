import type { FastifyInstance } from 'fastify';
import { RegisterDeviceBodySchema, type ListDevicesResponse, type RegisterDeviceResponse } from '@fleet/protocol';
import { DeviceNotFoundError } from '../../domain/errors';
import { mapDeviceView, mapStats } from './mappers';
import { DeviceParamsSchema, ListDevicesQuerySchema } from './schemas/devices';
import { sendValidationError } from './validation';

export const registerDeviceRoutes = async (app: FastifyInstance) => {
  // ============================================================================
  // PUT /device/:deviceId - Register or heartbeat
  // ============================================================================

  app.put('/device/:deviceId', {
    schema: {
      description: 'Register a device, or refresh it when already known (heartbeat)',
      tags: ['devices']
    }
  }, async (request, reply) => {
    const params = DeviceParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(request, reply, 'Invalid parameters', params.error);
    }
    const body = RegisterDeviceBodySchema.safeParse(request.body);
    if (!body.success) {
      return sendValidationError(request, reply, 'Missing required fields: device_type, ip_address, port', body.error);
    }

    const result = await app.registrationService.registerOrHeartbeat({
      deviceId: params.data.deviceId,
      deviceType: body.data.device_type,
      sourceAddress: body.data.ip_address,
      port: body.data.port,
      peerAddress: request.ip
    });
    if (!result.ok) {
      throw result.error;
    }

    const response: RegisterDeviceResponse = {
      device_id: result.value.deviceId,
      outcome: result.value.outcome,
      message: result.value.outcome === 'created' ? 'Device registered' : 'Heartbeat updated'
    };
    return reply.code(200).send(response);
  });

  // ============================================================================
  // GET /device/:deviceId
  // ============================================================================

  app.get('/device/:deviceId', {
    schema: {
      description: 'Look up a single device',
      tags: ['devices']
    }
  }, async (request, reply) => {
    const params = DeviceParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(request, reply, 'Invalid parameters', params.error);
    }
    const record = await app.registrationService.get(params.data.deviceId);
    if (!record) {
      throw new DeviceNotFoundError(params.data.deviceId);
    }
    return reply.send(mapDeviceView(record));
  });

  // ============================================================================
  // DELETE /device/:deviceId
  // ============================================================================

  app.delete('/device/:deviceId', {
    schema: {
      description: 'Remove a device from the registry',
      tags: ['devices']
    }
  }, async (request, reply) => {
    const params = DeviceParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(request, reply, 'Invalid parameters', params.error);
    }
    const removed = await app.registrationService.remove(params.data.deviceId);
    if (!removed) {
      throw new DeviceNotFoundError(params.data.deviceId);
    }
    return reply.send({ device_id: params.data.deviceId, message: 'Device removed' });
  });

  // ============================================================================
  // GET /devices
  // ============================================================================

  app.get('/devices', {
    schema: {
      description: 'List registered devices, optionally only active ones or one type',
      tags: ['devices']
    }
  }, async (request, reply) => {
    const query = ListDevicesQuerySchema.safeParse(request.query);
    if (!query.success) {
      return sendValidationError(request, reply, 'Invalid query', query.error);
    }
    const result = await app.registrationService.list({
      activeOnly: query.data.active_only,
      deviceType: query.data.device_type
    });
    if (!result.ok) {
      throw result.error;
    }
    const devices = result.value.map(mapDeviceView);
    const response: ListDevicesResponse = { devices, count: devices.length };
    return reply.send(response);
  });

  // ============================================================================
  // GET /stats
  // ============================================================================

  app.get('/stats', {
    schema: {
      description: 'Registry counts by status and type',
      tags: ['devices']
    }
  }, async (_request, reply) => {
    const stats = await app.registrationService.stats();
    return reply.send(mapStats(stats));
  });
};
