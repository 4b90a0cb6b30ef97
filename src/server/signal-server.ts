/**
 * SignalServer — the upstream endpoint producers and relays connect to.
 *
 * One ServerSession per accepted socket, each handing its signals to the
 * shared SignalProcessor. The server owns the processor's retry worker and
 * stops it last, after every session has closed.
 */

import { readFile } from "node:fs/promises";
import { createServer as createNetServer } from "node:net";
import type { Server, Socket } from "node:net";
import { createServer as createTlsServer } from "node:tls";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { ServerSession } from "../session/server-session.js";
import { CloseReason } from "../session/types.js";
import type { SessionId } from "../shared/identifiers.js";
import { listenOn } from "../shared/net.js";
import { tryCatchAsync } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import type { ServerConfig, ServerTlsConfig } from "./config.js";
import { SignalProcessor } from "./signal-processor.js";
import type { Notifier, Reporter, SignalStore } from "./types.js";

export type ServerAddress = { readonly host: string; readonly port: number; readonly tls: boolean };

export type SignalServerEvents = {
	listening: (address: ServerAddress) => void;
	session_opened: (id: SessionId, peer: string) => void;
	session_closed: (id: SessionId, reason: CloseReason) => void;
};

export interface SignalServerDeps {
	readonly store: SignalStore;
	readonly notifier: Notifier;
	readonly reporter: Reporter;
	readonly logger?: Logger;
	readonly clock?: Clock;
}

export type SignalServerConfig = Omit<ServerConfig, "reportFile" | "logLevel">;

interface Running {
	readonly session: ServerSession;
	readonly done: Promise<CloseReason>;
}

export class SignalServer {
	readonly processor: SignalProcessor;
	readonly events = new TypedEmitter<SignalServerEvents>((event, e) => {
		this.logger.warn({ event, err: e instanceof Error ? e.message : String(e) }, "Server listener threw");
	});
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly sessions = new Map<SessionId, Running>();
	private server: Server | null = null;
	private bound: ServerAddress | null = null;

	constructor(
		private readonly config: SignalServerConfig,
		deps: SignalServerDeps,
	) {
		this.logger = (deps.logger ?? silentLogger()).child({ component: "signal-server" });
		this.clock = deps.clock ?? SystemClock;
		this.processor = new SignalProcessor(
			{
				store: deps.store,
				notifier: deps.notifier,
				reporter: deps.reporter,
				logger: this.logger,
				clock: this.clock,
			},
			{ admission: config.admission, retry: config.retry },
		);
	}

	get address(): ServerAddress | null {
		return this.bound;
	}

	get sessionCount(): number {
		return this.sessions.size;
	}

	/** Binds the listener and starts the retry worker. */
	async start(): Promise<ServerAddress> {
		if (this.bound !== null) return this.bound;

		const credentials = await this.loadTls(this.config.tls);
		const onSocket = (socket: Socket): void => this.accept(socket);
		const server =
			credentials === null ? createNetServer(onSocket) : createTlsServer(credentials, onSocket);
		server.on("error", (e) => this.logger.error({ err: e.message }, "Listener error"));

		const port = await listenOn(server, this.config.host, this.config.port);
		this.server = server;
		this.bound = { host: this.config.host, port, tls: credentials !== null };
		this.processor.retryQueue.start();
		this.logger.info({ ...this.bound }, "Signal server listening");
		this.events.emit("listening", this.bound);
		return this.bound;
	}

	/** Stops accepting, closes every session and waits for them, then stops the retry worker. */
	async stop(): Promise<void> {
		const server = this.server;
		if (server === null) return;
		this.server = null;
		this.bound = null;

		const closed = new Promise<void>((resolve) => {
			server.close((e) => {
				if (e !== undefined) this.logger.warn({ err: e.message }, "Listener close failed");
				resolve();
			});
		});
		const running = [...this.sessions.values()];
		for (const { session } of running) session.close(CloseReason.Shutdown);
		await Promise.all(running.map(({ done }) => done));
		await Promise.all(running.map(({ session }) => session.whenSocketClosed()));
		await closed;

		await this.processor.retryQueue.stop();
		this.logger.info("Signal server stopped");
	}

	private accept(socket: Socket): void {
		const session = ServerSession.accept(socket, {
			secretKey: this.config.secretKey,
			authTimeoutMs: this.config.authTimeoutMs,
			heartbeatTimeoutMs: this.config.heartbeatTimeoutMs,
			maxFrameBytes: this.config.maxFrameBytes,
			processor: (envelope) => this.processor.handle(envelope),
			logger: this.logger,
			clock: this.clock,
		});
		const done = session.run().then((reason) => {
			this.sessions.delete(session.id);
			this.events.emit("session_closed", session.id, reason);
			return reason;
		});
		this.sessions.set(session.id, { session, done });
		this.events.emit("session_opened", session.id, session.peer);
	}

	/** Null when TLS is off or its files cannot be read; the server then speaks plain TCP. */
	private async loadTls(tls: ServerTlsConfig | null): Promise<{ cert: Buffer; key: Buffer } | null> {
		if (tls === null) return null;
		const files = await tryCatchAsync(() => Promise.all([readFile(tls.certPath), readFile(tls.keyPath)]));
		if (!files.ok) {
			this.logger.error(
				{ certPath: tls.certPath, keyPath: tls.keyPath, err: files.error.message },
				"Cannot read TLS files, serving plain TCP",
			);
			return null;
		}
		const [cert, key] = files.value;
		return { cert, key };
	}
}
