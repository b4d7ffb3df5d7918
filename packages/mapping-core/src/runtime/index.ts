export { Semaphore } from './semaphore.js';
export { TimeoutError, withTimeout } from './timeout.js';
export { withRetries, sleep } from './retry.js';
export type { RetryConfig, RetryContext, RetryHooks } from './retry.js';
export { CircuitBreaker } from './circuit-breaker.js';
export type { CircuitBreakerConfig, CircuitBreakerSnapshot } from './circuit-breaker.js';
