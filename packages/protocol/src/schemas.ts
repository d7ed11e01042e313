import { z } from 'zod';

// ============================================================================
// PUT /device/:deviceId - Register or heartbeat
// ============================================================================

// numbers, or strings of decimal digits; booleans, arrays and blanks are rejected
const PortSchema = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'must be a decimal integer')
    .transform((value) => Number.parseInt(value, 10))
]);

export const RegisterDeviceBodySchema = z.object({
  device_type: z.string().min(1),
  ip_address: z.string().min(1),
  port: PortSchema
});

export type RegisterDeviceBody = z.infer<typeof RegisterDeviceBodySchema>;

export const RegisterDeviceResponseSchema = z.object({
  device_id: z.string(),
  outcome: z.enum(['created', 'updated']),
  message: z.string()
});

export type RegisterDeviceResponse = z.infer<typeof RegisterDeviceResponseSchema>;

// ============================================================================
// Device views
// ============================================================================

export const DeviceViewSchema = z.object({
  device_id: z.string(),
  device_type: z.string(),
  ip_address: z.string(),
  port: z.number().int(),
  status: z.enum(['active', 'inactive']),
  created_at: z.string().datetime(),
  last_seen: z.string().datetime(),
  failure_count: z.number().int().nonnegative()
});

export type DeviceView = z.infer<typeof DeviceViewSchema>;

export const ListDevicesResponseSchema = z.object({
  devices: z.array(DeviceViewSchema),
  count: z.number().int().nonnegative()
});

export type ListDevicesResponse = z.infer<typeof ListDevicesResponseSchema>;

// ============================================================================
// POST /control/:deviceId/:command and POST /cleanup
// ============================================================================

export const ControlBodySchema = z
  .object({
    parameters: z.record(z.unknown()).optional()
  })
  .optional();

export type ControlBody = z.infer<typeof ControlBodySchema>;

export interface ControlResponse {
  device_id: string;
  command: string;
  device_response: unknown;
}

export const CleanupResponseSchema = z.object({
  removed_devices: z.array(z.string()),
  removed_count: z.number().int().nonnegative()
});

export type CleanupResponse = z.infer<typeof CleanupResponseSchema>;

export interface ErrorResponse {
  code: string;
  message: string;
  requestId?: string;
  details?: Record<string, unknown>;
}
