import { describe, expect, it } from 'vitest';
import { AddressMismatchError, CapacityExceededError, IdentityConflictError, ValidationError } from '../../../domain/errors';
import { createRecordingLifecycleEventsAdapter } from '../../../ports/events/inMemory/recordingLifecycleEventsAdapter';
import { createInMemoryDeviceStore } from '../../../repositories/inMemoryDeviceStore';
import { createRegistrationService, type RegisterCommand } from '../../../usecases/registration/registrationService';
import { createClock } from '../../support/fixtures';

const setup = () => {
  const clock = createClock();
  const store = createInMemoryDeviceStore({ limits: { 'rear-camera': 1 }, now: clock.now });
  const events = createRecordingLifecycleEventsAdapter();
  const service = createRegistrationService({ store, events });
  return { clock, store, events, service };
};

const command = (overrides: Partial<RegisterCommand> = {}): RegisterCommand => ({
  deviceId: 'cam-1',
  deviceType: 'rear-camera',
  sourceAddress: '10.0.0.5',
  port: 9001,
  ...overrides
});

describe('registration service', () => {
  it('creates then refreshes a device and emits the matching events', async () => {
    const { service, events } = setup();

    const created = await service.registerOrHeartbeat(command({ deviceId: ' CAM-1 ' }));
    const refreshed = await service.registerOrHeartbeat(command({ port: 9100 }));

    expect(created).toEqual({ ok: true, value: { deviceId: 'cam-1', outcome: 'created' } });
    expect(refreshed).toEqual({ ok: true, value: { deviceId: 'cam-1', outcome: 'updated' } });
    expect(events.events).toEqual([
      { kind: 'new_device', deviceId: 'cam-1', deviceType: 'rear-camera', address: '10.0.0.5', port: 9001 },
      { kind: 'heartbeat_update', deviceId: 'cam-1', address: '10.0.0.5', port: 9100 }
    ]);
  });

  it.each([
    [{ deviceId: '   ' }, 'device_id', 'Validation error for device_id: must be a non-empty string'],
    [{ deviceType: 'front-camera' }, 'device_type', 'Validation error for device_type: must be one of rear-camera'],
    [{ sourceAddress: 'camera.local' }, 'ip_address', 'Validation error for ip_address: camera.local is not an IPv4 address'],
    [{ port: 0 }, 'port', 'Validation error for port: must be an integer between 1 and 65535'],
    [{ port: 70_000 }, 'port', 'Validation error for port: must be an integer between 1 and 65535']
  ])('rejects invalid input %o', async (overrides, field, message) => {
    const { service, events, store } = setup();

    const result = await service.registerOrHeartbeat(command(overrides));

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(ValidationError);
    expect(result.error.details).toEqual({ field });
    expect(result.error.message).toBe(message);
    expect(events.events).toEqual([]);
    expect(await store.list()).toEqual([]);
  });

  it('surfaces store rejections without emitting events', async () => {
    const { service, events } = setup();
    await service.registerOrHeartbeat(command());

    const conflict = await service.registerOrHeartbeat(command({ sourceAddress: '10.0.0.9' }));
    const capacity = await service.registerOrHeartbeat(command({ deviceId: 'cam-2', sourceAddress: '10.0.0.6' }));

    expect(!conflict.ok && conflict.error).toBeInstanceOf(IdentityConflictError);
    expect(!capacity.ok && capacity.error).toBeInstanceOf(CapacityExceededError);
    expect(events.kinds()).toEqual(['new_device']);
  });

  it('filters listings and rejects unknown type filters', async () => {
    const { service, clock } = setup();
    await service.registerOrHeartbeat(command());

    const all = await service.list();
    clock.advance(121_000);
    const activeOnly = await service.list({ activeOnly: true });
    const byType = await service.list({ deviceType: 'rear-camera' });
    const unknown = await service.list({ deviceType: 'drone' });

    expect(all.ok && all.value.map((record) => record.deviceId)).toEqual(['cam-1']);
    expect(activeOnly).toEqual({ ok: true, value: [] });
    expect(byType.ok && byType.value).toHaveLength(1);
    expect(unknown.ok).toBe(false);
    if (unknown.ok) return;
    expect(unknown.error.message).toBe('Validation error for device_type: must be one of rear-camera');
  });

  it('removes devices and reports missing ones', async () => {
    const { service, events } = setup();
    await service.registerOrHeartbeat(command());

    expect(await service.remove('CAM-1')).toBe(true);
    expect(await service.remove('cam-1')).toBe(false);
    expect(await service.get('cam-1')).toBeNull();
    expect(events.events.at(-1)).toEqual({ kind: 'removed_manual', deviceId: 'cam-1' });
    expect(events.kinds()).toEqual(['new_device', 'removed_manual']);
  });

  it('frees capacity after removal', async () => {
    const { service } = setup();
    await service.registerOrHeartbeat(command());
    await service.remove('cam-1');

    const result = await service.registerOrHeartbeat(command({ deviceId: 'cam-2', sourceAddress: '10.0.0.6' }));

    expect(result).toEqual({ ok: true, value: { deviceId: 'cam-2', outcome: 'created' } });
    expect((await service.stats()).byType).toEqual({ 'rear-camera': 1 });
  });

  describe('with peer matching required', () => {
    const strictSetup = () => {
      const clock = createClock();
      const store = createInMemoryDeviceStore({ limits: { 'rear-camera': 1 }, now: clock.now });
      const events = createRecordingLifecycleEventsAdapter();
      const service = createRegistrationService({ store, events, requirePeerMatch: true });
      return { store, events, service };
    };

    it('rejects a reported address that differs from the connection', async () => {
      const { store, events, service } = strictSetup();

      const result = await service.registerOrHeartbeat(command({ peerAddress: '10.0.0.9' }));

      expect(!result.ok && result.error).toBeInstanceOf(AddressMismatchError);
      if (!result.ok) {
        expect(result.error.details).toEqual({ ip_address: '10.0.0.5', peer_address: '10.0.0.9' });
      }
      expect(await store.get('cam-1')).toBeNull();
      expect(events.events).toEqual([]);
    });

    it('accepts IPv4-mapped peers and rejects requests with no peer', async () => {
      const { service } = strictSetup();

      const mapped = await service.registerOrHeartbeat(command({ peerAddress: '::ffff:10.0.0.5' }));
      const anonymous = await service.registerOrHeartbeat(command());

      expect(mapped).toEqual({ ok: true, value: { deviceId: 'cam-1', outcome: 'created' } });
      expect(!anonymous.ok && anonymous.error.message).toBe(
        'Reported address 10.0.0.5 does not match connection address unknown'
      );
    });
  });

  it('ignores the connection address unless peer matching is required', async () => {
    const { service } = setup();

    const result = await service.registerOrHeartbeat(command({ peerAddress: '127.0.0.1' }));

    expect(result).toEqual({ ok: true, value: { deviceId: 'cam-1', outcome: 'created' } });
  });
});
