import { ListDevicesResponseSchema } from '@fleet/protocol';
import type { FastifyInstance } from 'fastify';
import { afterEach, describe, expect, it } from 'vitest';
import { buildServer } from '../../../app/buildServer';
import { DeviceTransportError } from '../../../ports/deviceEndpoint/deviceEndpointPort';
import {
  createScriptedDeviceEndpointAdapter,
  type ScriptedDeviceEndpoint
} from '../../../ports/deviceEndpoint/inMemory/scriptedDeviceEndpointAdapter';
import { createRecordingLifecycleEventsAdapter } from '../../../ports/events/inMemory/recordingLifecycleEventsAdapter';
import { createClock, createTestConfig, type TestClock } from '../../support/fixtures';

const BASE = '/api/v1/main-controller';

const register = (app: FastifyInstance, deviceId: string, ipAddress = '10.0.0.5', port: number | string = 9001) =>
  app.inject({
    method: 'PUT',
    url: `${BASE}/device/${deviceId}`,
    payload: { device_type: 'rear-camera', ip_address: ipAddress, port }
  });

describe('registry routes', () => {
  let app: FastifyInstance | undefined;
  let clock: TestClock;
  let endpoint: ScriptedDeviceEndpoint;

  const start = async (env: Record<string, string> = {}) => {
    clock = createClock();
    endpoint = createScriptedDeviceEndpointAdapter();
    const events = createRecordingLifecycleEventsAdapter();
    const built = await buildServer({
      config: createTestConfig(env),
      overrides: { now: clock.now, deviceEndpoint: endpoint, events }
    });
    app = built.app;
    return { app: built.app, events };
  };

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('walks a device through registration, control and stale cleanup', async () => {
    const { app, events } = await start();

    const created = await register(app, 'cam-1');
    expect(created.statusCode).toBe(200);
    expect(created.json()).toEqual({ device_id: 'cam-1', outcome: 'created', message: 'Device registered' });

    const conflict = await register(app, 'cam-1', '10.0.0.9');
    expect(conflict.statusCode).toBe(400);
    expect(conflict.json().code).toBe('IDENTITY_CONFLICT');

    const full = await register(app, 'cam-2', '10.0.0.6');
    expect(full.statusCode).toBe(409);
    expect(full.json()).toMatchObject({ code: 'CAPACITY_EXCEEDED', details: { device_type: 'rear-camera', limit: 1 } });

    const listed = await app.inject({ method: 'GET', url: `${BASE}/devices` });
    expect(ListDevicesResponseSchema.parse(listed.json())).toEqual({
      devices: [
        {
          device_id: 'cam-1',
          device_type: 'rear-camera',
          ip_address: '10.0.0.5',
          port: 9001,
          status: 'active',
          created_at: '2026-03-01T12:00:00.000Z',
          last_seen: '2026-03-01T12:00:00.000Z',
          failure_count: 0
        }
      ],
      count: 1
    });

    const control = await app.inject({ method: 'POST', url: `${BASE}/control/cam-1/up` });
    expect(control.statusCode).toBe(200);
    expect(control.json()).toEqual({ device_id: 'cam-1', command: 'up', device_response: { status: 'ok' } });

    clock.advance(301_000);
    const cleanup = await app.inject({ method: 'POST', url: `${BASE}/cleanup` });
    expect(cleanup.json()).toEqual({ removed_devices: ['cam-1'], removed_count: 1 });

    const again = await app.inject({ method: 'POST', url: `${BASE}/cleanup` });
    expect(again.json()).toEqual({ removed_devices: [], removed_count: 0 });

    expect(events.kinds()).toEqual(['new_device', 'removed_stale']);
  });

  it('answers a repeat registration as a heartbeat and accepts a numeric-string port', async () => {
    const { app } = await start();
    await register(app, 'cam-1');

    clock.advance(10_000);
    const heartbeat = await register(app, 'CAM-1', '10.0.0.5', '9100');

    expect(heartbeat.json()).toEqual({ device_id: 'cam-1', outcome: 'updated', message: 'Heartbeat updated' });
    const device = await app.inject({ method: 'GET', url: `${BASE}/device/cam-1` });
    expect(device.json()).toMatchObject({ port: 9100, last_seen: '2026-03-01T12:00:10.000Z' });
  });

  it('rejects registrations with missing or invalid fields', async () => {
    const { app } = await start();

    const missing = await app.inject({ method: 'PUT', url: `${BASE}/device/cam-1`, payload: { device_type: 'rear-camera' } });
    const badType = await app.inject({
      method: 'PUT',
      url: `${BASE}/device/cam-1`,
      payload: { device_type: 'drone', ip_address: '10.0.0.5', port: 9001 }
    });

    expect(missing.statusCode).toBe(400);
    expect(missing.json()).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Missing required fields: device_type, ip_address, port'
    });
    expect(badType.statusCode).toBe(400);
    expect(badType.json()).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Validation error for device_type: must be one of rear-camera',
      details: { field: 'device_type' }
    });
  });

  it.each([{ port: true }, { port: [9001] }, { port: '90x1' }])('rejects port $port with the missing-fields message', async ({ port }) => {
    const { app } = await start();

    const response = await app.inject({
      method: 'PUT',
      url: `${BASE}/device/cam-1`,
      payload: { device_type: 'rear-camera', ip_address: '10.0.0.5', port }
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Missing required fields: device_type, ip_address, port'
    });
    const device = await app.inject({ method: 'GET', url: `${BASE}/device/cam-1` });
    expect(device.statusCode).toBe(404);
  });

  it('ties registrations to the connection address when peer matching is required', async () => {
    const { app, events } = await start({ REQUIRE_PEER_ADDRESS_MATCH: 'true' });
    const payload = { device_type: 'rear-camera', ip_address: '10.0.0.5', port: 9001 };

    const spoofed = await app.inject({ method: 'PUT', url: `${BASE}/device/cam-1`, remoteAddress: '10.0.0.9', payload });
    const genuine = await app.inject({ method: 'PUT', url: `${BASE}/device/cam-1`, remoteAddress: '10.0.0.5', payload });

    expect(spoofed.statusCode).toBe(400);
    expect(spoofed.json()).toMatchObject({
      code: 'ADDRESS_MISMATCH',
      details: { ip_address: '10.0.0.5', peer_address: '10.0.0.9' }
    });
    expect(genuine.statusCode).toBe(200);
    expect(genuine.json()).toEqual({ device_id: 'cam-1', outcome: 'created', message: 'Device registered' });
    expect(events.kinds()).toEqual(['new_device']);
  });

  it('filters the listing by activity and rejects unknown types', async () => {
    const { app } = await start({ DEVICE_TYPE_LIMITS: 'rear-camera=2' });
    await register(app, 'cam-1', '10.0.0.5');
    clock.advance(121_000);
    await register(app, 'cam-2', '10.0.0.6');

    const active = await app.inject({ method: 'GET', url: `${BASE}/devices?active_only=TRUE` });
    const all = await app.inject({ method: 'GET', url: `${BASE}/devices?active_only=false` });
    const unknown = await app.inject({ method: 'GET', url: `${BASE}/devices?device_type=drone` });

    expect(ListDevicesResponseSchema.parse(active.json()).devices.map((device) => device.device_id)).toEqual(['cam-2']);
    expect(all.json().count).toBe(2);
    expect(unknown.statusCode).toBe(400);
  });

  it('rejects an active_only value other than true or false', async () => {
    const { app } = await start();
    await register(app, 'cam-1');

    const response = await app.inject({ method: 'GET', url: `${BASE}/devices?active_only=yes` });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({ code: 'VALIDATION_ERROR', message: 'Invalid query' });
  });

  it('deletes devices and 404s on the second attempt', async () => {
    const { app, events } = await start();
    await register(app, 'cam-1');

    const removed = await app.inject({ method: 'DELETE', url: `${BASE}/device/cam-1` });
    const missing = await app.inject({ method: 'DELETE', url: `${BASE}/device/cam-1` });

    expect(removed.json()).toEqual({ device_id: 'cam-1', message: 'Device removed' });
    expect(missing.statusCode).toBe(404);
    expect(missing.json()).toMatchObject({ code: 'DEVICE_NOT_FOUND', message: 'Device not found: cam-1' });
    expect(events.kinds()).toEqual(['new_device', 'removed_manual']);
  });

  it('maps dispatch failures to their HTTP statuses', async () => {
    const { app } = await start();
    await register(app, 'cam-1');
    endpoint.enqueue(new DeviceTransportError('connection', 'connect ECONNREFUSED 10.0.0.5:9001'), {
      statusCode: 409,
      body: { error: 'camera busy' }
    });

    const unreachable = await app.inject({ method: 'POST', url: `${BASE}/control/cam-1/up` });
    const busy = await app.inject({ method: 'POST', url: `${BASE}/control/cam-1/down` });
    const unsupported = await app.inject({ method: 'POST', url: `${BASE}/control/cam-1/zoom` });
    const unknown = await app.inject({ method: 'POST', url: `${BASE}/control/ghost/up` });

    expect(unreachable.statusCode).toBe(503);
    expect(unreachable.json()).toMatchObject({ code: 'DEVICE_UNREACHABLE', details: { failure_count: 1 } });
    expect(busy.statusCode).toBe(400);
    expect(busy.json()).toMatchObject({
      code: 'DEVICE_ERROR',
      details: { device_status: 409, device_response: { error: 'camera busy' }, failure_count: 2 }
    });
    expect(unsupported.statusCode).toBe(400);
    expect(unsupported.json()).toMatchObject({
      code: 'UNSUPPORTED_COMMAND',
      details: { supported_commands: ['up', 'down', 'reset', 'status'] }
    });
    expect(unknown.statusCode).toBe(404);
  });

  it('rejects control of an inactive device and forwards parameters', async () => {
    const { app } = await start();
    await register(app, 'cam-1');

    const forwarded = await app.inject({
      method: 'POST',
      url: `${BASE}/control/cam-1/reset`,
      payload: { parameters: { hard: true } }
    });
    clock.advance(121_000);
    const inactive = await app.inject({ method: 'POST', url: `${BASE}/control/cam-1/up` });

    expect(forwarded.statusCode).toBe(200);
    expect(endpoint.requests[0]?.body).toEqual({ hard: true });
    expect(inactive.statusCode).toBe(400);
    expect(inactive.json().code).toBe('DEVICE_NOT_ACTIVE');
  });

  it('reports stats and health', async () => {
    const { app } = await start();
    await register(app, 'cam-1');

    const stats = await app.inject({ method: 'GET', url: `${BASE}/stats` });
    const health = await app.inject({ method: 'GET', url: '/health' });

    expect(stats.json()).toEqual({
      total_devices: 1,
      active_devices: 1,
      inactive_devices: 0,
      devices_by_type: { 'rear-camera': 1 },
      device_type_limits: { 'rear-camera': 1 }
    });
    expect(health.json()).toMatchObject({
      status: 'ok',
      service: 'registry',
      sweeper: { running: false, intervalMs: 60_000, ticks: 0, failedTicks: 0 },
      last_sweep: null
    });
  });

  it('exposes prometheus metrics outside production', async () => {
    const { app } = await start();
    await register(app, 'cam-1');

    const metrics = await app.inject({ method: 'GET', url: '/metrics' });

    expect(metrics.statusCode).toBe(200);
    expect(metrics.body).toContain('registry_http_requests_total');
  });
});
