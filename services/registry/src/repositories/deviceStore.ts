import type { Result } from '../domain/result';
import type { CapacityExceededError, IdentityConflictError } from '../domain/errors';
import type {
  DeviceFilter,
  DeviceRecord,
  RegistryStats,
  SweepOutcome,
  SweepThresholds,
  UpsertInput,
  UpsertOutcome
} from '../domain/types/device.types';

export type UpsertRejection = CapacityExceededError | IdentityConflictError;

/**
 * Authoritative map of device id -> registration state.
 *
 * Every method is one atomic operation; records handed out are copies, so
 * callers never observe or cause a partially applied write.
 */
export interface DeviceStore {
  get(deviceId: string): Promise<DeviceRecord | null>;
  /** Creates or refreshes a record. Capacity and identity checks share the write's critical section. */
  upsert(input: UpsertInput): Promise<Result<UpsertOutcome, UpsertRejection>>;
  remove(deviceId: string): Promise<boolean>;
  list(filter?: DeviceFilter): Promise<DeviceRecord[]>;
  /** New failure count, or null when the device is gone. */
  incrementFailure(deviceId: string): Promise<number | null>;
  snapshotStats(): Promise<RegistryStats>;
  sweep(thresholds: SweepThresholds): Promise<SweepOutcome>;
}
