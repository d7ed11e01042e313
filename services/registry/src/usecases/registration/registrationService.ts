import { isIPv4 } from 'node:net';
import { DEVICE_TYPES, isDeviceType, type DeviceType } from '@fleet/protocol';
import { normalizeDeviceId } from '../../domain/deviceId';
import { AddressMismatchError, ValidationError } from '../../domain/errors';
import { err, ok, type Result } from '../../domain/result';
import type {
  DeviceEndpoint,
  DeviceFilter,
  DeviceRecord,
  RegistryStats,
  UpsertOutcome
} from '../../domain/types/device.types';
import type { LifecycleEventsPort } from '../../ports/events/lifecycleEventsPort';
import type { DeviceStore, UpsertRejection } from '../../repositories/deviceStore';

export type RegistrationServiceDeps = {
  store: DeviceStore;
  events: LifecycleEventsPort;
  /** Reject registrations whose reported address differs from `peerAddress`. */
  requirePeerMatch?: boolean;
};

export type RegisterCommand = {
  deviceId: string;
  deviceType: string;
  /** Address the request claims to come from; pinned as the device's identity on first registration. */
  sourceAddress: string;
  port: number;
  /** Address of the connection that carried the request, when known. */
  peerAddress?: string;
};

export type RegisterResult = {
  deviceId: string;
  outcome: UpsertOutcome;
};

export type ListQuery = {
  activeOnly?: boolean;
  deviceType?: string;
};

export type RegistrationService = {
  registerOrHeartbeat(
    command: RegisterCommand
  ): Promise<Result<RegisterResult, ValidationError | AddressMismatchError | UpsertRejection>>;
  get(deviceId: string): Promise<DeviceRecord | null>;
  list(query?: ListQuery): Promise<Result<DeviceRecord[], ValidationError>>;
  remove(deviceId: string): Promise<boolean>;
  stats(): Promise<RegistryStats>;
};

const MIN_PORT = 1;
const MAX_PORT = 65_535;

type ValidRegistration = {
  deviceId: string;
  deviceType: DeviceType;
  endpoint: DeviceEndpoint;
};

// IPv4 peers reach dual-stack sockets as ::ffff:a.b.c.d
const toPlainIPv4 = (address: string) => (address.startsWith('::ffff:') ? address.slice('::ffff:'.length) : address);

const validate = (command: RegisterCommand): Result<ValidRegistration, ValidationError> => {
  const deviceId = normalizeDeviceId(command.deviceId);
  if (!deviceId) {
    return err(new ValidationError('device_id', 'must be a non-empty string'));
  }
  if (!isDeviceType(command.deviceType)) {
    return err(new ValidationError('device_type', `must be one of ${DEVICE_TYPES.join(', ')}`));
  }
  if (!isIPv4(command.sourceAddress)) {
    return err(new ValidationError('ip_address', `${command.sourceAddress} is not an IPv4 address`));
  }
  if (!Number.isInteger(command.port) || command.port < MIN_PORT || command.port > MAX_PORT) {
    return err(new ValidationError('port', `must be an integer between ${MIN_PORT} and ${MAX_PORT}`));
  }
  return ok({
    deviceId,
    deviceType: command.deviceType,
    endpoint: { address: command.sourceAddress, port: command.port }
  });
};

export const createRegistrationService = ({
  store,
  events,
  requirePeerMatch = false
}: RegistrationServiceDeps): RegistrationService => ({
  async registerOrHeartbeat(command) {
    const valid = validate(command);
    if (!valid.ok) return valid;

    if (requirePeerMatch) {
      const peer = command.peerAddress === undefined ? '' : toPlainIPv4(command.peerAddress);
      if (peer !== command.sourceAddress) {
        return err(new AddressMismatchError(command.sourceAddress, peer || 'unknown'));
      }
    }

    const { deviceId, deviceType, endpoint } = valid.value;
    const result = await store.upsert(valid.value);
    if (!result.ok) return result;

    if (result.value === 'created') {
      await events.publish({ kind: 'new_device', deviceId, deviceType, address: endpoint.address, port: endpoint.port });
    } else {
      await events.publish({ kind: 'heartbeat_update', deviceId, address: endpoint.address, port: endpoint.port });
    }

    return ok({ deviceId, outcome: result.value });
  },

  async get(deviceId) {
    return store.get(deviceId);
  },

  async list(query = {}) {
    const filter: DeviceFilter = { activeOnly: query.activeOnly };
    if (query.deviceType !== undefined) {
      if (!isDeviceType(query.deviceType)) {
        return err(new ValidationError('device_type', `must be one of ${DEVICE_TYPES.join(', ')}`));
      }
      filter.deviceType = query.deviceType;
    }
    return ok(await store.list(filter));
  },

  async remove(deviceId) {
    const removed = await store.remove(deviceId);
    if (removed) {
      await events.publish({ kind: 'removed_manual', deviceId: normalizeDeviceId(deviceId) });
    }
    return removed;
  },

  async stats() {
    return store.snapshotStats();
  }
});
