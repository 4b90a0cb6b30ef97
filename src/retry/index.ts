export { DEFAULT_RETRY_CONFIG, RetryQueue } from "./retry-queue.js";
export type { RetryAttempt, RetryQueueDeps } from "./retry-queue.js";
export { RetryDisposition } from "./types.js";
export type { RetryConfig, RetryEvents, RetryItem, RetryOutcome } from "./types.js";
