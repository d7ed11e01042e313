import { z } from 'zod';

// ============================================================================
// /device/:deviceId
// ============================================================================

export const DeviceParamsSchema = z.object({
  deviceId: z.string().trim().min(1)
});

// ============================================================================
// GET /devices
// ============================================================================

export const ListDevicesQuerySchema = z.object({
  active_only: z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(['true', 'false']))
    .transform((value) => value === 'true')
    .optional(),
  device_type: z.string().trim().min(1).optional()
});

// ============================================================================
// POST /control/:deviceId/:command
// ============================================================================

export const ControlParamsSchema = z.object({
  deviceId: z.string().trim().min(1),
  command: z.string().trim().min(1)
});
