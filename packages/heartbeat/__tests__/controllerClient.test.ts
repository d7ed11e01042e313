import { describe, expect, it, vi } from 'vitest';
import { createControllerClient, type DeviceIdentity } from '../src/controllerClient';
import { ControllerUnavailableError, HeartbeatAbortedError, HeartbeatRejectedError } from '../src/errors';

const identity: DeviceIdentity = { deviceId: 'cam-1', deviceType: 'rear-camera', address: '10.0.0.5', port: 5001 };

const jsonResponse = (status: number, body: unknown) =>
  new Response(JSON.stringify(body), { status, headers: { 'content-type': 'application/json' } });

const abortAwareFetch = () =>
  vi.fn<typeof fetch>(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      })
  );

describe('controller client', () => {
  it('PUTs the registration body to the device path', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse(200, { device_id: 'cam-1', outcome: 'created', message: 'Device registered' })
    );
    const client = createControllerClient({ baseUrl: 'http://controller:5000/', fetchImpl });

    const result = await client.register(identity);

    expect(result).toEqual({ device_id: 'cam-1', outcome: 'created', message: 'Device registered' });
    expect(fetchImpl).toHaveBeenCalledWith(
      'http://controller:5000/api/v1/main-controller/device/cam-1',
      expect.objectContaining({
        method: 'PUT',
        body: '{"device_type":"rear-camera","ip_address":"10.0.0.5","port":5001}'
      })
    );
  });

  it('returns null when the success body is not a registration response', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response('', { status: 200 }));
    const client = createControllerClient({ baseUrl: 'http://controller:5000', fetchImpl });
    await expect(client.register(identity)).resolves.toBeNull();
  });

  it('maps 4xx to a non-retryable rejection', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () =>
      jsonResponse(409, { code: 'CAPACITY_EXCEEDED', message: 'limit reached' })
    );
    const client = createControllerClient({ baseUrl: 'http://controller:5000', fetchImpl });

    const error = await client.register(identity).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(HeartbeatRejectedError);
    if (!(error instanceof HeartbeatRejectedError)) return;
    expect(error.statusCode).toBe(409);
    expect(error.rejectionCode).toBe('CAPACITY_EXCEEDED');
    expect(error.retryable).toBe(false);
    expect(error.message).toBe('Controller rejected registration (409): limit reached');
  });

  it('maps 5xx to a retryable unavailability', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(503, { code: 'X', message: 'warming up' }));
    const client = createControllerClient({ baseUrl: 'http://controller:5000', fetchImpl });

    const error = await client.register(identity).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ControllerUnavailableError);
    if (!(error instanceof ControllerUnavailableError)) return;
    expect(error.reason).toBe('server');
    expect(error.statusCode).toBe(503);
    expect(error.retryable).toBe(true);
  });

  it('maps network failures to a retryable unavailability', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new TypeError('fetch failed');
    });
    const client = createControllerClient({ baseUrl: 'http://controller:5000', fetchImpl });

    const error = await client.register(identity).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ControllerUnavailableError);
    if (!(error instanceof ControllerUnavailableError)) return;
    expect(error.reason).toBe('network');
    expect(error.message).toBe('Controller unavailable (network): fetch failed');
  });

  it('times out slow controllers', async () => {
    const client = createControllerClient({ baseUrl: 'http://controller:5000', fetchImpl: abortAwareFetch(), timeoutMs: 20 });

    const error = await client.register(identity).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ControllerUnavailableError);
    if (!(error instanceof ControllerUnavailableError)) return;
    expect(error.reason).toBe('timeout');
  });

  it('times out when the controller stalls mid-body', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 }));
    const client = createControllerClient({ baseUrl: 'http://controller:5000', fetchImpl, timeoutMs: 20 });

    const error = await client.register(identity).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ControllerUnavailableError);
    if (!(error instanceof ControllerUnavailableError)) return;
    expect(error.reason).toBe('timeout');
    expect(error.message).toBe('Controller unavailable (timeout): no response within 20ms');
  });

  it('reports cancellation during a stalled body as aborted', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response(new ReadableStream<Uint8Array>({ start() {} }), { status: 200 }));
    const client = createControllerClient({ baseUrl: 'http://controller:5000', fetchImpl });
    const controller = new AbortController();

    const pending = client.register(identity, controller.signal);
    // let the headers resolve so the abort lands while the body is being read
    await new Promise((resolve) => setTimeout(resolve, 0));
    expect(fetchImpl).toHaveBeenCalledTimes(1);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(HeartbeatAbortedError);
  });

  it('does not call the controller when already cancelled', async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => jsonResponse(200, {}));
    const client = createControllerClient({ baseUrl: 'http://controller:5000', fetchImpl });
    const controller = new AbortController();
    controller.abort();

    await expect(client.register(identity, controller.signal)).rejects.toBeInstanceOf(HeartbeatAbortedError);
    expect(fetchImpl).not.toHaveBeenCalled();
  });

  it('reports caller cancellation as aborted', async () => {
    const client = createControllerClient({ baseUrl: 'http://controller:5000', fetchImpl: abortAwareFetch() });
    const controller = new AbortController();

    const pending = client.register(identity, controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(HeartbeatAbortedError);
  });
});
