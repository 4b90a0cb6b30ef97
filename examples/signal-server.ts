/**
 * Signal Server
 *
 * Runs the upstream endpoint with an in-memory store:
 * - Settings from SIGNAL_RELAY_* variables (SIGNAL_RELAY_SECRET_KEY is required)
 * - Notifications go to the log
 * - Operator reports go to SIGNAL_RELAY_REPORT_FILE, or stay in memory
 *
 * Stop with Ctrl-C.
 */

import type { Reporter } from "../src/index.js";
import {
	FileReportSink,
	LogNotifier,
	MemoryReportSink,
	MemorySignalStore,
	SignalServer,
	createLogger,
	serverConfigFromEnv,
} from "../src/index.js";

const config = serverConfigFromEnv(process.env);
const logger = createLogger({ level: config.logLevel, name: "signal-server" });

const files = config.reportFile === null ? null : FileReportSink.create({ filePath: config.reportFile });
const reporter: Reporter = files ?? new MemoryReportSink();

const server = new SignalServer(config, {
	store: new MemorySignalStore(),
	notifier: new LogNotifier(logger.child({ component: "notifier" })),
	reporter,
	logger,
});

server.processor.retryQueue.events.on("succeeded", (item) => {
	logger.info({ symbol: item.signal.symbol, attempts: item.attempt }, "Queued signal delivered");
});

const address = await server.start();
logger.info({ ...address }, "Ready for producers");

// ── Shutdown ────────────────────────────────────────────────────────

process.once("SIGINT", () => {
	server
		.stop()
		.then(() => files?.close())
		.catch((e: unknown) => {
			logger.error({ err: e instanceof Error ? e.message : String(e) }, "Shutdown failed");
			process.exitCode = 1;
		});
});
