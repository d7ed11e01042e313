import { vi } from 'vitest';
import { RegistryConfigSchema, type RegistryConfig } from '../../config';

export const createClock = (start = '2026-03-01T12:00:00.000Z') => {
  let current = new Date(start).getTime();
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    }
  };
};

export type TestClock = ReturnType<typeof createClock>;

export const createSpyLogger = () => ({
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn()
});

export const createTestConfig = (env: Record<string, string> = {}): RegistryConfig =>
  RegistryConfigSchema.parse({
    NODE_ENV: 'test',
    LOG_LEVEL: 'error',
    SWEEPER_ENABLED: 'false',
    ENABLE_SWAGGER: 'false',
    ...env
  });

export const rearCamera = (deviceId: string, address = '10.0.0.5', port = 9001) => ({
  deviceId,
  deviceType: 'rear-camera' as const,
  endpoint: { address, port }
});
