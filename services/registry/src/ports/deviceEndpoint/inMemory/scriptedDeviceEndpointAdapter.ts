import type { DeviceEndpointPort, DeviceRequest, DeviceResponse } from '../deviceEndpointPort';

export type ScriptedReply = DeviceResponse | Error | ((request: DeviceRequest) => DeviceResponse | Promise<DeviceResponse>);

export type ScriptedDeviceEndpoint = DeviceEndpointPort & {
  readonly requests: DeviceRequest[];
  /** Queue replies; once drained, `fallback` answers. */
  enqueue(...replies: ScriptedReply[]): void;
};

/**
 * In-process device stand-in: records every request and answers from a queue.
 */
export const createScriptedDeviceEndpointAdapter = (
  fallback: ScriptedReply = { statusCode: 200, body: { status: 'ok' } }
): ScriptedDeviceEndpoint => {
  const requests: DeviceRequest[] = [];
  const queue: ScriptedReply[] = [];

  return {
    requests,
    enqueue(...replies) {
      queue.push(...replies);
    },
    async send(request) {
      requests.push(request);
      const reply = queue.shift() ?? fallback;
      if (reply instanceof Error) throw reply;
      if (typeof reply === 'function') return reply(request);
      return reply;
    }
  };
};
