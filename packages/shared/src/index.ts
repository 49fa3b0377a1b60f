export { ConcurrentPool, type PoolOutcome } from './utils/concurrent-pool';
