/**
 * Registry domain errors
 *
 * Every rejection the registry can surface carries an HTTP status, a stable
 * code for clients, a taxonomy kind and whether a caller may retry it.
 */

export type ErrorKind = 'validation' | 'business' | 'routing' | 'transport';

/**
 * Base error class for the registry domain
 */
export class RegistryError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly kind: ErrorKind,
    public readonly retryable = false,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'RegistryError';
    Object.setPrototypeOf(this, RegistryError.prototype);
  }
}

/**
 * Malformed registration or query input
 */
export class ValidationError extends RegistryError {
  constructor(field: string, reason: string) {
    super(`Validation error for ${field}: ${reason}`, 'VALIDATION_ERROR', 400, 'validation', false, { field });
    this.name = 'ValidationError';
  }
}

/**
 * Existing id claimed from a different address
 */
export class IdentityConflictError extends RegistryError {
  constructor(deviceId: string) {
    super(
      `Device ${deviceId} is already registered from a different address`,
      'IDENTITY_CONFLICT',
      400,
      'business'
    );
    this.name = 'IdentityConflictError';
  }
}

/**
 * Reported address differs from the connection it arrived on
 */
export class AddressMismatchError extends RegistryError {
  constructor(reportedAddress: string, peerAddress: string) {
    super(
      `Reported address ${reportedAddress} does not match connection address ${peerAddress}`,
      'ADDRESS_MISMATCH',
      400,
      'business',
      false,
      { ip_address: reportedAddress, peer_address: peerAddress }
    );
    this.name = 'AddressMismatchError';
  }
}

/**
 * Per-type population limit reached
 */
export class CapacityExceededError extends RegistryError {
  constructor(deviceType: string, limit: number) {
    super(
      `Device type ${deviceType} is at capacity (max: ${limit})`,
      'CAPACITY_EXCEEDED',
      409,
      'business',
      false,
      { device_type: deviceType, limit }
    );
    this.name = 'CapacityExceededError';
  }
}

export class DeviceNotFoundError extends RegistryError {
  constructor(deviceId: string) {
    super(`Device not found: ${deviceId}`, 'DEVICE_NOT_FOUND', 404, 'routing');
    this.name = 'DeviceNotFoundError';
  }
}

export class DeviceNotActiveError extends RegistryError {
  constructor(deviceId: string) {
    super(`Device ${deviceId} is not active`, 'DEVICE_NOT_ACTIVE', 400, 'routing');
    this.name = 'DeviceNotActiveError';
  }
}

export class UnsupportedCommandError extends RegistryError {
  constructor(command: string, deviceType: string, supported: string[]) {
    super(
      `Command ${command} is not supported for device type ${deviceType}`,
      'UNSUPPORTED_COMMAND',
      400,
      'routing',
      false,
      { supported_commands: supported }
    );
    this.name = 'UnsupportedCommandError';
  }
}

/**
 * Device could not be reached (timeout, refused, reset)
 */
export class CommunicationError extends RegistryError {
  constructor(deviceId: string, reason: string, failureCount: number) {
    super(
      `Failed to communicate with device ${deviceId}: ${reason}`,
      'DEVICE_UNREACHABLE',
      503,
      'transport',
      true,
      { failure_count: failureCount }
    );
    this.name = 'CommunicationError';
  }
}

/**
 * Device answered with a non-success status
 */
export class DeviceError extends RegistryError {
  constructor(deviceId: string, deviceStatus: number, deviceResponse: unknown, failureCount: number) {
    super(
      `Device ${deviceId} returned status ${deviceStatus}`,
      'DEVICE_ERROR',
      400,
      'transport',
      false,
      { device_status: deviceStatus, device_response: deviceResponse, failure_count: failureCount }
    );
    this.name = 'DeviceError';
  }
}
