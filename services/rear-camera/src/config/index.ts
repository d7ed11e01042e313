import { z } from 'zod';
import {
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_STOP_TIMEOUT_MS
} from '@fleet/heartbeat';
import { DEFAULT_CONTROLLER_PORT, DEFAULT_DEVICE_PORT } from '@fleet/protocol';

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

export const RearCameraConfigSchema = z
  .object({
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
    HTTP_HOST: z.string().default('0.0.0.0'),
    HTTP_PORT: NUMBER_FROM_STRING(z.number().int().nonnegative()).default(DEFAULT_DEVICE_PORT),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    // Identity announced to the controller
    DEVICE_ID: z.string().trim().min(1).default('rear-camera-001'),
    ADVERTISED_ADDRESS: z.string().ip({ version: 'v4' }).default('127.0.0.1'),
    ADVERTISED_PORT: NUMBER_FROM_STRING(z.number().int().min(1).max(65_535)).optional(),
    // Heartbeat
    CONTROLLER_URL: z.string().url().default(`http://127.0.0.1:${DEFAULT_CONTROLLER_PORT}`),
    HEARTBEAT_ENABLED: BOOL.default(true),
    HEARTBEAT_INTERVAL_MS: NUMBER_FROM_STRING(z.number().int().positive()).default(DEFAULT_HEARTBEAT_INTERVAL_MS),
    HEARTBEAT_RETRY_ATTEMPTS: NUMBER_FROM_STRING(z.number().int().positive()).default(DEFAULT_RETRY_ATTEMPTS),
    HEARTBEAT_RETRY_DELAY_MS: NUMBER_FROM_STRING(z.number().int().nonnegative()).default(DEFAULT_RETRY_DELAY_MS),
    HEARTBEAT_TIMEOUT_MS: NUMBER_FROM_STRING(z.number().int().positive()).default(10_000),
    HEARTBEAT_STOP_TIMEOUT_MS: NUMBER_FROM_STRING(z.number().int().positive()).default(DEFAULT_STOP_TIMEOUT_MS),
    // Actuator
    CAMERA_MOVE_DURATION_MS: NUMBER_FROM_STRING(z.number().int().nonnegative()).default(2_000)
  })
  .superRefine((cfg, ctx) => {
    if (cfg.HEARTBEAT_RETRY_DELAY_MS >= cfg.HEARTBEAT_INTERVAL_MS) {
      ctx.addIssue({
        path: ['HEARTBEAT_RETRY_DELAY_MS'],
        code: z.ZodIssueCode.custom,
        message: 'HEARTBEAT_RETRY_DELAY_MS must be smaller than HEARTBEAT_INTERVAL_MS'
      });
    }
  });

export type RearCameraConfig = z.infer<typeof RearCameraConfigSchema>;

let cachedConfig: RearCameraConfig | null = null;

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): RearCameraConfig => {
  if (cachedConfig) {
    return cachedConfig;
  }
  cachedConfig = RearCameraConfigSchema.parse(env);
  return cachedConfig;
};

export const resetConfigForTests = () => {
  cachedConfig = null;
};

/** Port the controller should dial back; defaults to the listening port. */
export const advertisedPort = (config: RearCameraConfig) => config.ADVERTISED_PORT ?? config.HTTP_PORT;
