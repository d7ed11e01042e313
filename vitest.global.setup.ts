import { afterEach, vi } from 'vitest';

process.env.NODE_ENV ??= 'test';
process.env.LOG_LEVEL ??= 'error';
process.env.SWEEPER_ENABLED ??= 'false'; // sweeper loop is driven explicitly in tests
process.env.HEARTBEAT_ENABLED ??= 'false';

afterEach(() => {
  vi.useRealTimers();
  vi.restoreAllMocks();
});
