import { resolveCommandRoute, supportedCommands } from '@fleet/protocol';
import {
  CommunicationError,
  DeviceError,
  DeviceNotActiveError,
  DeviceNotFoundError,
  UnsupportedCommandError
} from '../../domain/errors';
import { err, ok, type Result } from '../../domain/result';
import type { DeviceEndpointPort, DeviceResponse } from '../../ports/deviceEndpoint/deviceEndpointPort';
import { DeviceTransportError } from '../../ports/deviceEndpoint/deviceEndpointPort';
import type { LifecycleEventsPort } from '../../ports/events/lifecycleEventsPort';
import type { DeviceStore } from '../../repositories/deviceStore';
import type { ServiceLogger } from '../../observability/logging';
import type { RegistryMetrics } from '../../observability/metrics';

export type CommandDispatcherDeps = {
  store: DeviceStore;
  endpoint: DeviceEndpointPort;
  events: LifecycleEventsPort;
  logger: ServiceLogger;
  timeoutMs: number;
  metrics?: Pick<RegistryMetrics, 'dispatchTotal'>;
};

export type DispatchSuccess = {
  deviceId: string;
  command: string;
  statusCode: number;
  payload: unknown;
};

export type DispatchFailure =
  | DeviceNotFoundError
  | DeviceNotActiveError
  | UnsupportedCommandError
  | CommunicationError
  | DeviceError;

export type CommandDispatcher = {
  dispatch(deviceId: string, command: string, parameters?: Record<string, unknown>): Promise<Result<DispatchSuccess, DispatchFailure>>;
};

// command label when no route accepts it; keeps the label set to known commands
const UNKNOWN_COMMAND_LABEL = 'unknown';

const isSuccessStatus = (statusCode: number) => statusCode >= 200 && statusCode < 300;

export const createCommandDispatcher = ({
  store,
  endpoint,
  events,
  logger,
  timeoutMs,
  metrics
}: CommandDispatcherDeps): CommandDispatcher => {
  const count = (command: string, outcome: string) => metrics?.dispatchTotal.inc({ command, outcome });

  return {
    async dispatch(deviceId, command, parameters) {
      // the store lock is held only inside get() and incrementFailure(), never across the device call
      const record = await store.get(deviceId);
      if (!record) {
        count(UNKNOWN_COMMAND_LABEL, 'not_found');
        return err(new DeviceNotFoundError(deviceId));
      }
      const route = resolveCommandRoute(record.deviceType, command);
      if (record.status !== 'active') {
        count(route ? command : UNKNOWN_COMMAND_LABEL, 'not_active');
        return err(new DeviceNotActiveError(record.deviceId));
      }
      if (!route) {
        count(UNKNOWN_COMMAND_LABEL, 'unsupported');
        return err(new UnsupportedCommandError(command, record.deviceType, supportedCommands(record.deviceType)));
      }

      let response: DeviceResponse;
      try {
        response = await endpoint.send({
          endpoint: record.endpoint,
          method: route.method,
          path: route.path,
          body: parameters ?? {},
          timeoutMs
        });
      } catch (error) {
        const reason = error instanceof DeviceTransportError ? error.message : 'unexpected transport failure';
        if (!(error instanceof DeviceTransportError)) {
          logger.error({ err: error, deviceId: record.deviceId, command }, 'dispatch_transport_unexpected');
        }
        const failureCount = (await store.incrementFailure(record.deviceId)) ?? record.failureCount + 1;
        await events.publish({ kind: 'dispatch_failed', deviceId: record.deviceId, command, reason: 'communication', failureCount });
        count(command, 'communication_error');
        return err(new CommunicationError(record.deviceId, reason, failureCount));
      }

      if (!isSuccessStatus(response.statusCode)) {
        const failureCount = (await store.incrementFailure(record.deviceId)) ?? record.failureCount + 1;
        await events.publish({ kind: 'dispatch_failed', deviceId: record.deviceId, command, reason: 'device_error', failureCount });
        count(command, 'device_error');
        return err(new DeviceError(record.deviceId, response.statusCode, response.body, failureCount));
      }

      count(command, 'ok');
      logger.info({ deviceId: record.deviceId, command }, 'command_dispatched');
      return ok({ deviceId: record.deviceId, command, statusCode: response.statusCode, payload: response.body });
    }
  };
};
