export { withRetry } from './with-retry.js';
export { delay, abortReason } from './delay.js';
export { isRecord, isFiniteNumber } from './guards.js';
export { deepFreeze } from './deep-freeze.js';
