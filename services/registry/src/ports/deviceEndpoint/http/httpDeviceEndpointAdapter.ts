import type { DeviceEndpointPort } from '../deviceEndpointPort';
import { DeviceTransportError } from '../deviceEndpointPort';

export type HttpDeviceEndpointDeps = {
  fetchImpl?: typeof fetch;
};

const parseBody = (text: string): unknown => {
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
};

export const createHttpDeviceEndpointAdapter = ({ fetchImpl = fetch }: HttpDeviceEndpointDeps = {}): DeviceEndpointPort => ({
  async send({ endpoint, method, path, body, timeoutMs }) {
    const url = `http://${endpoint.address}:${endpoint.port}${path}`;
    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      const response = await fetchImpl(url, {
        method,
        headers: method === 'GET' ? undefined : { 'content-type': 'application/json' },
        body: method === 'GET' ? undefined : JSON.stringify(body ?? {}),
        signal: controller.signal
      });
      const text = await response.text();
      return { statusCode: response.status, body: parseBody(text) };
    } catch (error) {
      if (timedOut) {
        throw new DeviceTransportError('timeout', `no response from ${url} within ${timeoutMs}ms`);
      }
      throw new DeviceTransportError('connection', error instanceof Error ? error.message : String(error));
    } finally {
      clearTimeout(timer);
    }
  }
});
