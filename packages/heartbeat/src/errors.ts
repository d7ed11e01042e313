/**
 * Heartbeat errors
 *
 * `retryable` decides whether the client spends another attempt on the same tick.
 */
export class HeartbeatError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly retryable: boolean
  ) {
    super(message);
    this.name = 'HeartbeatError';
    Object.setPrototypeOf(this, HeartbeatError.prototype);
  }
}

/**
 * Controller answered with a 4xx (validation, identity conflict, capacity)
 */
export class HeartbeatRejectedError extends HeartbeatError {
  constructor(
    public readonly statusCode: number,
    public readonly rejectionCode: string | null,
    reason: string
  ) {
    super(`Controller rejected registration (${statusCode}): ${reason}`, 'HEARTBEAT_REJECTED', false);
    this.name = 'HeartbeatRejectedError';
  }
}

export type UnavailableReason = 'timeout' | 'network' | 'server';

/**
 * Controller could not be reached or failed on its side
 */
export class ControllerUnavailableError extends HeartbeatError {
  constructor(
    public readonly reason: UnavailableReason,
    detail: string,
    public readonly statusCode: number | null = null
  ) {
    super(`Controller unavailable (${reason}): ${detail}`, 'CONTROLLER_UNAVAILABLE', true);
    this.name = 'ControllerUnavailableError';
  }
}

export class HeartbeatAbortedError extends HeartbeatError {
  constructor() {
    super('Heartbeat aborted', 'HEARTBEAT_ABORTED', false);
    this.name = 'HeartbeatAbortedError';
  }
}

export const isRetryableHeartbeatError = (error: unknown) =>
  error instanceof HeartbeatError ? error.retryable : true;
