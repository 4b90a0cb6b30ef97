export { LinearBackoff } from "./backoff.js";
export type { BackoffConfig } from "./backoff.js";
export { DEFAULT_RELAY_CONFIG, relayConfigFromEnv } from "./config.js";
export type { RelayConfig, UpstreamEndpoint } from "./config.js";
export { CorrelationMap } from "./correlation-map.js";
export { OutboundQueue } from "./outbound-queue.js";
export type { OfferResult } from "./outbound-queue.js";
export { RELAY_QUEUED_MESSAGE, RelayMultiplexer } from "./relay.js";
export type { RelayDeps } from "./relay.js";
export { OverflowPolicy } from "./types.js";
export type { RelayEvents, RelayItem, RelayStatus } from "./types.js";
