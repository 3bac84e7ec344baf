export {
  ConcurrentPool,
  type ConcurrentPoolOptions,
} from './utils/concurrent-pool';
export {
  RetryPolicy,
  type RetryAttempt,
  type RetryExecuteOptions,
  type RetryPolicyOptions,
} from './utils/retry-policy';
export { Semaphore } from './utils/semaphore';
export {
  spawnAsync,
  type SpawnAsyncOptions,
  type SpawnResult,
} from './utils/spawn-utils';
