// Use explicit .js extensions for ESM runtime resolution
export { DEVICE_TYPES, DEFAULT_DEVICE_TYPE_LIMITS, isDeviceType } from './deviceTypes.js';
export type { DeviceType, DeviceTypeLimits } from './deviceTypes.js';
export { COMMAND_ROUTES, resolveCommandRoute, supportedCommands } from './commands.js';
export type { CommandMethod, CommandRoute } from './commands.js';
export {
  CONTROLLER_BASE_PATH,
  DEVICE_PATH,
  REAR_CAMERA_BASE_PATH,
  DEFAULT_CONTROLLER_PORT,
  DEFAULT_DEVICE_PORT,
  deviceRegistrationPath
} from './paths.js';
export {
  RegisterDeviceBodySchema,
  RegisterDeviceResponseSchema,
  DeviceViewSchema,
  ListDevicesResponseSchema,
  ControlBodySchema,
  CleanupResponseSchema
} from './schemas.js';
export type {
  RegisterDeviceBody,
  RegisterDeviceResponse,
  DeviceView,
  ListDevicesResponse,
  ControlBody,
  ControlResponse,
  CleanupResponse,
  ErrorResponse
} from './schemas.js';
