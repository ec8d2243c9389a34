/**
 * Resilience primitives for direct uploads
 * @module dataverse-direct-upload/resilience
 */

export {
  RetryExecutor,
  RetryState,
  createRetryExecutor,
  type ExecuteOptions,
  type RetryExecutorOptions,
  type RetryNotice,
  type SleepFunction,
} from './retry.js';

export { Semaphore } from './semaphore.js';
