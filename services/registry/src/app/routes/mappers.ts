import type { DeviceView } from '@fleet/protocol';
import type { DeviceRecord, RegistryStats } from '../../domain/types/device.types';

export const mapDeviceView = (record: DeviceRecord): DeviceView => ({
  device_id: record.deviceId,
  device_type: record.deviceType,
  ip_address: record.endpoint.address,
  port: record.endpoint.port,
  status: record.status,
  created_at: record.createdAt.toISOString(),
  last_seen: record.lastSeen.toISOString(),
  failure_count: record.failureCount
});

export const mapStats = (stats: RegistryStats) => ({
  total_devices: stats.total,
  active_devices: stats.active,
  inactive_devices: stats.inactive,
  devices_by_type: stats.byType,
  device_type_limits: stats.limits
});
