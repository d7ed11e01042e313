// Use explicit .js extensions for ESM runtime resolution
export {
  HeartbeatClient,
  DEFAULT_HEARTBEAT_INTERVAL_MS,
  DEFAULT_RETRY_ATTEMPTS,
  DEFAULT_RETRY_DELAY_MS,
  DEFAULT_STOP_TIMEOUT_MS
} from './heartbeatClient.js';
export type { HeartbeatClientOptions, HeartbeatHealth, HeartbeatStatistics, HeartbeatStatus } from './heartbeatClient.js';
export { createControllerClient } from './controllerClient.js';
export type { ControllerClient, ControllerClientOptions, DeviceIdentity } from './controllerClient.js';
export {
  HeartbeatError,
  HeartbeatRejectedError,
  ControllerUnavailableError,
  HeartbeatAbortedError,
  isRetryableHeartbeatError
} from './errors.js';
export type { UnavailableReason } from './errors.js';
export { logWithContext, sanitizeError } from './logging.js';
export type { SafeLogger } from './logging.js';
export { sleep } from './sleep.js';
