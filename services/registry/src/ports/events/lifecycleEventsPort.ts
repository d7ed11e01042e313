import type { DeviceType } from '@fleet/protocol';

export type LifecycleEvent =
  | { kind: 'new_device'; deviceId: string; deviceType: DeviceType; address: string; port: number }
  | { kind: 'heartbeat_update'; deviceId: string; address: string; port: number }
  | { kind: 'marked_inactive'; deviceId: string }
  | { kind: 'removed_stale'; deviceId: string; lastSeen: string }
  | { kind: 'removed_manual'; deviceId: string }
  | {
      kind: 'dispatch_failed';
      deviceId: string;
      command: string;
      reason: 'communication' | 'device_error';
      failureCount: number;
    };

export type LifecycleEventKind = LifecycleEvent['kind'];

export interface LifecycleEventsPort {
  publish(event: LifecycleEvent): Promise<void>;
}
