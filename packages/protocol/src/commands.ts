import type { DeviceType } from './deviceTypes.js';
import { REAR_CAMERA_BASE_PATH } from './paths.js';

export type CommandMethod = 'GET' | 'POST';

export interface CommandRoute {
  method: CommandMethod;
  path: string;
}

/**
 * Static routing table: device type -> command name -> endpoint path on the device.
 * Adding a device type means adding a row here and a limit in deviceTypes.
 */
export const COMMAND_ROUTES: Record<DeviceType, Readonly<Record<string, CommandRoute>>> = {
  'rear-camera': {
    up: { method: 'POST', path: `${REAR_CAMERA_BASE_PATH}/up` },
    down: { method: 'POST', path: `${REAR_CAMERA_BASE_PATH}/down` },
    reset: { method: 'POST', path: `${REAR_CAMERA_BASE_PATH}/reset` },
    status: { method: 'GET', path: `${REAR_CAMERA_BASE_PATH}/status` }
  }
};

export const resolveCommandRoute = (deviceType: DeviceType, command: string): CommandRoute | null => {
  const routes = COMMAND_ROUTES[deviceType];
  if (!Object.prototype.hasOwnProperty.call(routes, command)) {
    return null;
  }
  return routes[command] ?? null;
};

export const supportedCommands = (deviceType: DeviceType): string[] => Object.keys(COMMAND_ROUTES[deviceType]);
