export const CONTROLLER_BASE_PATH = '/api/v1/main-controller';
export const DEVICE_PATH = '/device';
export const REAR_CAMERA_BASE_PATH = '/api/v1/rear-camera';

export const DEFAULT_CONTROLLER_PORT = 5000;
export const DEFAULT_DEVICE_PORT = 5001;

export const deviceRegistrationPath = (deviceId: string) =>
  `${CONTROLLER_BASE_PATH}${DEVICE_PATH}/${encodeURIComponent(deviceId)}`;
