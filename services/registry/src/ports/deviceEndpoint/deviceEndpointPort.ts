import type { CommandMethod } from '@fleet/protocol';
import type { DeviceEndpoint } from '../../domain/types/device.types';

export type DeviceRequest = {
  endpoint: DeviceEndpoint;
  method: CommandMethod;
  path: string;
  body?: unknown;
  timeoutMs: number;
};

export type DeviceResponse = {
  statusCode: number;
  /** Parsed JSON when the device sent JSON, the raw text otherwise, null when empty. */
  body: unknown;
};

export type DeviceTransportFailure = 'timeout' | 'connection';

/**
 * The request never produced a response (timeout, refused, reset).
 */
export class DeviceTransportError extends Error {
  constructor(
    public readonly reason: DeviceTransportFailure,
    message: string
  ) {
    super(message);
    this.name = 'DeviceTransportError';
    Object.setPrototypeOf(this, DeviceTransportError.prototype);
  }
}

export interface DeviceEndpointPort {
  /** Resolves with whatever status the device answered; rejects with DeviceTransportError otherwise. */
  send(request: DeviceRequest): Promise<DeviceResponse>;
}
