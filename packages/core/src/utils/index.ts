export { createSemaphore, type Semaphore } from './semaphore';
export { createKeyedMutex, type KeyedMutex } from './keyed-mutex';
export { systemClock, createManualClock, type Clock, type ManualClock } from './clock';
export {
  withRetry,
  withRetryResult,
  RetryExhaustedError,
  type RetryOptions,
  type RetryResult,
} from './retry';
