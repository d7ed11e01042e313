import { z } from 'zod';
import { DEFAULT_DEVICE_TYPE_LIMITS, isDeviceType, type DeviceTypeLimits } from '@fleet/protocol';

const BOOL = z
  .union([z.string(), z.boolean()])
  .optional()
  .transform((value) => {
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    return value === 'true';
  });

const NUMBER_FROM_STRING = (schema: z.ZodNumber = z.number()) =>
  z
    .union([z.string(), z.number()])
    .optional()
    .transform((value) => {
      if (value === undefined) return undefined;
      return typeof value === 'number' ? value : Number.parseInt(value, 10);
    })
    .pipe(schema);

/**
 * "rear-camera=1,other=2" -> { 'rear-camera': 1, other: 2 }. Unknown types are
 * reported by the schema refinement below.
 */
const LIMITS_FROM_STRING = z
  .string()
  .optional()
  .transform((value, ctx) => {
    const overrides: Record<string, number> = {};
    if (!value) return overrides;
    for (const entry of value.split(',')) {
      const trimmed = entry.trim();
      if (!trimmed) continue;
      const [type, rawLimit] = trimmed.split('=').map((part) => part.trim());
      const limit = Number.parseInt(rawLimit ?? '', 10);
      if (!type || !Number.isInteger(limit) || limit < 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid limit entry "${trimmed}"` });
        continue;
      }
      overrides[type] = limit;
    }
    return overrides;
  });

export const RegistryConfigSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    HTTP_HOST: z.string().default('0.0.0.0'),
    HTTP_PORT: NUMBER_FROM_STRING(z.number().int().nonnegative()).default(5000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    // Liveness
    SWEEPER_ENABLED: BOOL.default(true),
    SWEEP_ON_STARTUP: BOOL.default(true),
    SWEEP_INTERVAL_MS: NUMBER_FROM_STRING(z.number().int().positive()).default(60_000),
    INACTIVE_THRESHOLD_MS: NUMBER_FROM_STRING(z.number().int().positive()).default(120_000),
    REMOVAL_THRESHOLD_MS: NUMBER_FROM_STRING(z.number().int().positive()).default(300_000),
    // Dispatch
    DISPATCH_TIMEOUT_MS: NUMBER_FROM_STRING(z.number().int().positive()).default(10_000),
    // Registration
    REQUIRE_PEER_ADDRESS_MATCH: BOOL.default(false),
    // Capacity overrides, e.g. "rear-camera=2"
    DEVICE_TYPE_LIMITS: LIMITS_FROM_STRING,
    ENABLE_SWAGGER: BOOL.default(true)
  })
  .superRefine((cfg, ctx) => {
    if (cfg.REMOVAL_THRESHOLD_MS <= cfg.INACTIVE_THRESHOLD_MS) {
      ctx.addIssue({
        path: ['REMOVAL_THRESHOLD_MS'],
        code: z.ZodIssueCode.custom,
        message: 'REMOVAL_THRESHOLD_MS must be greater than INACTIVE_THRESHOLD_MS'
      });
    }
    for (const type of Object.keys(cfg.DEVICE_TYPE_LIMITS)) {
      if (!isDeviceType(type)) {
        ctx.addIssue({
          path: ['DEVICE_TYPE_LIMITS'],
          code: z.ZodIssueCode.custom,
          message: `unknown device type "${type}"`
        });
      }
    }
  });

export type RegistryConfig = z.infer<typeof RegistryConfigSchema>;

let cachedConfig: RegistryConfig | null = null;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): RegistryConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = RegistryConfigSchema.parse(env);
  return cachedConfig;
};

export const resetConfigForTests = () => {
  cachedConfig = null;
};

/** Defaults merged with DEVICE_TYPE_LIMITS overrides. */
export const resolveDeviceTypeLimits = (config: RegistryConfig): DeviceTypeLimits => {
  const limits: DeviceTypeLimits = { ...DEFAULT_DEVICE_TYPE_LIMITS };
  for (const [type, limit] of Object.entries(config.DEVICE_TYPE_LIMITS)) {
    if (isDeviceType(type)) {
      limits[type] = limit;
    }
  }
  return limits;
};
