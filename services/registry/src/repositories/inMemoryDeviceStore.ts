import { DEFAULT_DEVICE_TYPE_LIMITS, DEVICE_TYPES, type DeviceType, type DeviceTypeLimits } from '@fleet/protocol';
import { normalizeDeviceId } from '../domain/deviceId';
import { CapacityExceededError, IdentityConflictError } from '../domain/errors';
import { err, ok } from '../domain/result';
import type { DeviceRecord, DeviceStatus, RegistryStats } from '../domain/types/device.types';
import { AsyncMutex } from '../infra/mutex/asyncMutex';
import type { DeviceStore } from './deviceStore';

export interface InMemoryDeviceStoreOptions {
  limits?: DeviceTypeLimits;
  /** Records older than this read back as inactive even before a sweep persists it. */
  inactiveAfterMs?: number;
  now?: () => Date;
  mutex?: AsyncMutex;
}

const DEFAULT_INACTIVE_AFTER_MS = 120_000;

export const createInMemoryDeviceStore = ({
  limits = DEFAULT_DEVICE_TYPE_LIMITS,
  inactiveAfterMs = DEFAULT_INACTIVE_AFTER_MS,
  now = () => new Date(),
  mutex = new AsyncMutex()
}: InMemoryDeviceStoreOptions = {}): DeviceStore => {
  const devices = new Map<string, DeviceRecord>();

  const deriveStatus = (record: DeviceRecord, at: Date): DeviceStatus => {
    if (record.status === 'inactive') return 'inactive';
    return at.getTime() - record.lastSeen.getTime() > inactiveAfterMs ? 'inactive' : 'active';
  };

  const snapshot = (record: DeviceRecord, at: Date): DeviceRecord => ({
    ...record,
    endpoint: { ...record.endpoint },
    createdAt: new Date(record.createdAt.getTime()),
    lastSeen: new Date(record.lastSeen.getTime()),
    status: deriveStatus(record, at)
  });

  const countByType = (deviceType: DeviceType) => {
    let count = 0;
    for (const record of devices.values()) {
      if (record.deviceType === deviceType) count += 1;
    }
    return count;
  };

  return {
    get(deviceId) {
      return mutex.runExclusive(() => {
        const record = devices.get(normalizeDeviceId(deviceId));
        return record ? snapshot(record, now()) : null;
      });
    },

    upsert({ deviceId, deviceType, endpoint }) {
      return mutex.runExclusive(() => {
        const id = normalizeDeviceId(deviceId);
        const at = now();
        const existing = devices.get(id);

        if (existing) {
          if (existing.endpoint.address !== endpoint.address) {
            return err(new IdentityConflictError(id));
          }
          existing.endpoint = { ...endpoint };
          existing.lastSeen = at;
          existing.status = 'active';
          existing.failureCount = 0;
          return ok('updated' as const);
        }

        const limit = limits[deviceType];
        if (countByType(deviceType) >= limit) {
          return err(new CapacityExceededError(deviceType, limit));
        }

        devices.set(id, {
          deviceId: id,
          deviceType,
          endpoint: { ...endpoint },
          status: 'active',
          createdAt: at,
          lastSeen: at,
          failureCount: 0
        });
        return ok('created' as const);
      });
    },

    remove(deviceId) {
      return mutex.runExclusive(() => devices.delete(normalizeDeviceId(deviceId)));
    },

    list(filter = {}) {
      return mutex.runExclusive(() => {
        const at = now();
        const result: DeviceRecord[] = [];
        for (const record of devices.values()) {
          if (filter.deviceType && record.deviceType !== filter.deviceType) continue;
          const view = snapshot(record, at);
          if (filter.activeOnly && view.status !== 'active') continue;
          result.push(view);
        }
        return result;
      });
    },

    incrementFailure(deviceId) {
      return mutex.runExclusive(() => {
        const record = devices.get(normalizeDeviceId(deviceId));
        if (!record) return null;
        record.failureCount += 1;
        return record.failureCount;
      });
    },

    snapshotStats() {
      return mutex.runExclusive((): RegistryStats => {
        const at = now();
        const byType = { ...limits };
        for (const type of DEVICE_TYPES) {
          byType[type] = 0;
        }
        let active = 0;
        for (const record of devices.values()) {
          byType[record.deviceType] += 1;
          if (deriveStatus(record, at) === 'active') active += 1;
        }
        return {
          total: devices.size,
          active,
          inactive: devices.size - active,
          byType,
          limits: { ...limits }
        };
      });
    },

    sweep({ now: at, inactiveAfterMs: inactiveThreshold, removeAfterMs }) {
      return mutex.runExclusive(() => {
        const inactivated: string[] = [];
        const removed: DeviceRecord[] = [];
        for (const [id, record] of devices) {
          const age = at.getTime() - record.lastSeen.getTime();
          if (age > removeAfterMs) {
            removed.push(snapshot(record, at));
            devices.delete(id);
            continue;
          }
          if (age > inactiveThreshold && record.status !== 'inactive') {
            record.status = 'inactive';
            inactivated.push(id);
          }
        }
        return { inactivated, removed };
      });
    }
  };
};
