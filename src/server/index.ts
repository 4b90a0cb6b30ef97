export { DEFAULT_SERVER_CONFIG, serverConfigFromEnv } from "./config.js";
export type { ServerConfig, ServerTlsConfig } from "./config.js";
export { formatClosedMessage, formatOpenedMessage } from "./messages.js";
export type { ClosedSignal, OpenedSignal } from "./messages.js";
export { QUEUED_FOR_RETRY_MESSAGE, SignalProcessor } from "./signal-processor.js";
export type { SignalProcessorConfig, SignalProcessorDeps } from "./signal-processor.js";
export { SignalServer } from "./signal-server.js";
export type {
	ServerAddress,
	SignalServerConfig,
	SignalServerDeps,
	SignalServerEvents,
} from "./signal-server.js";
export { ReportKind } from "./types.js";
export type {
	NewSignal,
	Notifier,
	OpenAction,
	Report,
	Reporter,
	SignalStore,
	SignalStoreConnection,
	StoredSignal,
	TodayStats,
} from "./types.js";
