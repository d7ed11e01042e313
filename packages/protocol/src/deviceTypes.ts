export const DEVICE_TYPES = ['rear-camera'] as const;

export type DeviceType = (typeof DEVICE_TYPES)[number];

export type DeviceTypeLimits = Record<DeviceType, number>;

/** Maximum simultaneous registrations per device type. */
export const DEFAULT_DEVICE_TYPE_LIMITS: DeviceTypeLimits = {
  'rear-camera': 1
};

export const isDeviceType = (value: string): value is DeviceType =>
  DEVICE_TYPES.some((type) => type === value);
