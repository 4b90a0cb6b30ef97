/**
 * Local Relay
 *
 * Accepts producers on SIGNAL_RELAY_LOCAL_HOST:SIGNAL_RELAY_LOCAL_PORT
 * (127.0.0.1:7777 by default) and forwards their signals over one
 * authenticated link to SIGNAL_RELAY_UPSTREAM_HOST:SIGNAL_RELAY_UPSTREAM_PORT.
 * Signals sent while the link is down wait in the outbound queue.
 */

import { RelayMultiplexer, createLogger, relayConfigFromEnv } from "../src/index.js";

const config = relayConfigFromEnv(process.env);
const logger = createLogger({ level: config.logLevel, name: "local-relay" });
const relay = new RelayMultiplexer(config, { logger });

relay.events.on("upstream_disconnected", (_error, retryInMs) => {
	const { queueDepth } = relay.status();
	if (queueDepth > 0) {
		logger.warn({ queueDepth, retryInMs }, "Holding signals until upstream returns");
	}
});
relay.events.on("unrouted", (response) => {
	logger.debug({ response }, "Response without a waiting producer");
});

await relay.start();

process.once("SIGINT", () => {
	relay.stop().catch((e: unknown) => {
		logger.error({ err: e instanceof Error ? e.message : String(e) }, "Shutdown failed");
		process.exitCode = 1;
	});
});
