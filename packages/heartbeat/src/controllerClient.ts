import {
  RegisterDeviceResponseSchema,
  deviceRegistrationPath,
  type DeviceType,
  type RegisterDeviceBody,
  type RegisterDeviceResponse
} from '@fleet/protocol';
import { ControllerUnavailableError, HeartbeatAbortedError, HeartbeatRejectedError } from './errors.js';

export interface DeviceIdentity {
  deviceId: string;
  deviceType: DeviceType;
  /** Address the controller should dial back; also the identity the controller pins. */
  address: string;
  port: number;
}

export interface ControllerClient {
  register(identity: DeviceIdentity, signal?: AbortSignal): Promise<RegisterDeviceResponse | null>;
}

export interface ControllerClientOptions {
  baseUrl: string;
  fetchImpl?: typeof fetch;
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

const readBody = async (response: Response): Promise<unknown> => {
  const text = await response.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

/** Settles with `work`, or rejects once `signal` aborts, whichever comes first. */
const untilAborted = <T>(work: Promise<T>, signal: AbortSignal): Promise<T> =>
  new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new Error('aborted'));
    if (signal.aborted) {
      onAbort();
      return;
    }
    signal.addEventListener('abort', onAbort, { once: true });
    void work.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });

const describeRejection = (body: unknown): { code: string | null; message: string } => {
  if (body && typeof body === 'object') {
    const code = 'code' in body && typeof body.code === 'string' ? body.code : null;
    const message = 'message' in body && typeof body.message === 'string' ? body.message : 'rejected';
    return { code, message };
  }
  return { code: null, message: typeof body === 'string' && body ? body : 'rejected' };
};

export const createControllerClient = ({
  baseUrl,
  fetchImpl = fetch,
  timeoutMs = DEFAULT_TIMEOUT_MS
}: ControllerClientOptions): ControllerClient => {
  const root = baseUrl.replace(/\/+$/, '');

  return {
    async register(identity, signal) {
      const body: RegisterDeviceBody = {
        device_type: identity.deviceType,
        ip_address: identity.address,
        port: identity.port
      };

      if (signal?.aborted) {
        throw new HeartbeatAbortedError();
      }

      const controller = new AbortController();
      let timedOut = false;
      const timer = setTimeout(() => {
        timedOut = true;
        controller.abort();
      }, timeoutMs);
      const onAbort = () => controller.abort();
      signal?.addEventListener('abort', onAbort, { once: true });

      // the deadline covers the body as well as the headers
      let response: Response;
      let payload: unknown;
      try {
        response = await untilAborted(
          fetchImpl(`${root}${deviceRegistrationPath(identity.deviceId)}`, {
            method: 'PUT',
            headers: { 'content-type': 'application/json' },
            body: JSON.stringify(body),
            signal: controller.signal
          }),
          controller.signal
        );
        payload = await untilAborted(readBody(response), controller.signal);
      } catch (error) {
        if (signal?.aborted) {
          throw new HeartbeatAbortedError();
        }
        if (timedOut) {
          throw new ControllerUnavailableError('timeout', `no response within ${timeoutMs}ms`);
        }
        throw new ControllerUnavailableError('network', error instanceof Error ? error.message : String(error));
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      }

      if (response.status >= 500) {
        throw new ControllerUnavailableError('server', describeRejection(payload).message, response.status);
      }

      if (!response.ok) {
        const { code, message } = describeRejection(payload);
        throw new HeartbeatRejectedError(response.status, code, message);
      }

      const parsed = RegisterDeviceResponseSchema.safeParse(payload);
      return parsed.success ? parsed.data : null;
    }
  };
};
