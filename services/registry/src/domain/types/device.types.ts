import type { DeviceType } from '@fleet/protocol';

export type DeviceStatus = 'active' | 'inactive';

export interface DeviceEndpoint {
  address: string;
  port: number;
}

export interface DeviceRecord {
  deviceId: string;
  deviceType: DeviceType;
  endpoint: DeviceEndpoint;
  status: DeviceStatus;
  createdAt: Date;
  lastSeen: Date;
  failureCount: number;
}

export interface DeviceFilter {
  activeOnly?: boolean;
  deviceType?: DeviceType;
}

export type UpsertOutcome = 'created' | 'updated';

export interface UpsertInput {
  deviceId: string;
  deviceType: DeviceType;
  endpoint: DeviceEndpoint;
}

export interface RegistryStats {
  total: number;
  active: number;
  inactive: number;
  byType: Record<DeviceType, number>;
  limits: Record<DeviceType, number>;
}

export interface SweepThresholds {
  now: Date;
  inactiveAfterMs: number;
  removeAfterMs: number;
}

export interface SweepOutcome {
  inactivated: string[];
  removed: DeviceRecord[];
}
