/**
 * RelayMultiplexer — many local producers, one upstream link.
 *
 * Local producers connect to a plain-TCP listener and speak the same framed
 * protocol as upstream. Their signals go onto a bounded outbound queue, which
 * the upstream session drains whenever it is connected; its responses are
 * routed back through the correlation map by `client_msg_id`. The upstream
 * link reconnects forever with linear backoff, and local traffic keeps being
 * accepted and queued while it is down.
 *
 * @example
 * ```ts
 * const relay = new RelayMultiplexer(relayConfigFromEnv(process.env), { logger });
 * await relay.start();
 * process.once("SIGINT", () => relay.stop());
 * ```
 */

import { createServer } from "node:net";
import type { Server, Socket } from "node:net";
import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { clientMsgIdOf } from "../protocol/envelope.js";
import { errorResponse, queuedResponse, withCorrelation } from "../protocol/types.js";
import type { Envelope, ResponseEnvelope } from "../protocol/types.js";
import { ServerSession } from "../session/server-session.js";
import { CloseReason } from "../session/types.js";
import { UpstreamSession } from "../session/upstream-session.js";
import type { RelayError } from "../shared/errors.js";
import type { SessionId } from "../shared/identifiers.js";
import { listenOn } from "../shared/net.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, sleep } from "../shared/time.js";
import { LinearBackoff } from "./backoff.js";
import type { RelayConfig } from "./config.js";
import { CorrelationMap } from "./correlation-map.js";
import { OutboundQueue } from "./outbound-queue.js";
import type { RelayEvents, RelayItem, RelayStatus } from "./types.js";

export const RELAY_QUEUED_MESSAGE = "Queued for upstream delivery";

export interface RelayDeps {
	readonly logger?: Logger;
	readonly clock?: Clock;
}

interface LocalProducer {
	readonly session: ServerSession;
	readonly done: Promise<CloseReason>;
}

export class RelayMultiplexer {
	readonly events = new TypedEmitter<RelayEvents>((event, e) => {
		this.logger.warn({ event, err: e instanceof Error ? e.message : String(e) }, "Relay listener threw");
	});
	private readonly logger: Logger;
	private readonly clock: Clock;
	private readonly correlations = new CorrelationMap();
	private readonly outbound: OutboundQueue<RelayItem>;
	private readonly backoff: LinearBackoff;
	private readonly locals = new Map<SessionId, LocalProducer>();
	private server: Server | null = null;
	private upstream: UpstreamSession | null = null;
	private supervisor: Promise<void> | null = null;
	private stopping: AbortController | null = null;

	constructor(
		private readonly config: RelayConfig,
		deps: RelayDeps = {},
	) {
		this.logger = (deps.logger ?? silentLogger()).child({ component: "relay" });
		this.clock = deps.clock ?? SystemClock;
		this.outbound = new OutboundQueue(config.maxOutboundQueue, config.overflowPolicy);
		this.backoff = new LinearBackoff(config.backoff);
	}

	status(): RelayStatus {
		return {
			upstreamConnected: this.upstream !== null,
			queueDepth: this.outbound.depth,
			localSessions: this.locals.size,
			pendingCorrelations: this.correlations.size,
			consecutiveFailures: this.backoff.consecutiveFailures,
		};
	}

	/** Opens the local listener and starts the upstream loop. Resolves with the local port. */
	async start(): Promise<number> {
		if (this.server !== null) {
			throw new Error("Relay already started");
		}
		const server = createServer((socket) => this.accept(socket));
		server.on("error", (e) => this.logger.error({ err: e.message }, "Local listener error"));
		const port = await listenOn(server, this.config.localHost, this.config.localPort);
		this.server = server;

		const stopping = new AbortController();
		this.stopping = stopping;
		this.supervisor = this.superviseUpstream(stopping.signal);

		this.logger.info(
			{ host: this.config.localHost, port, upstream: `${this.config.upstream.host}:${this.config.upstream.port}` },
			"Relay listening",
		);
		this.events.emit("listening", port);
		return port;
	}

	/** Stops accepting, closes local sessions and the upstream link. Queued messages are dropped. */
	async stop(): Promise<void> {
		const server = this.server;
		if (server === null) return;
		this.server = null;
		this.stopping?.abort();

		const closed = new Promise<void>((resolve) => {
			server.close((e) => {
				if (e !== undefined) this.logger.warn({ err: e.message }, "Local listener close failed");
				resolve();
			});
		});
		const producers = [...this.locals.values()];
		for (const { session } of producers) session.close(CloseReason.Shutdown);
		await Promise.all(producers.map(({ done }) => done));
		await Promise.all(producers.map(({ session }) => session.whenSocketClosed()));
		await this.supervisor;
		await closed;

		this.supervisor = null;
		this.stopping = null;
		const dropped = this.outbound.drain().length;
		if (dropped > 0) {
			this.logger.warn({ dropped }, "Relay stopped with undelivered messages");
		} else {
			this.logger.info("Relay stopped");
		}
	}

	// ── Local side ──────────────────────────────────────────────────

	private accept(socket: Socket): void {
		const session = ServerSession.accept(socket, {
			secretKey: this.config.localSecretKey,
			authTimeoutMs: this.config.authTimeoutMs,
			heartbeatTimeoutMs: this.config.heartbeatTimeoutMs,
			maxFrameBytes: this.config.maxFrameBytes,
			processor: (envelope, owner) => this.forward(envelope, owner),
			logger: this.logger,
			clock: this.clock,
			idPrefix: "local",
		});
		const done = session.run().then((reason) => {
			this.locals.delete(session.id);
			const purged = this.correlations.purge(session.id);
			if (purged > 0) {
				this.logger.info({ session: session.id, purged }, "Dropped pending correlations of closed producer");
			}
			this.events.emit("local_closed", session.id, reason, purged);
			return reason;
		});
		this.locals.set(session.id, { session, done });
		this.events.emit("local_opened", session.id, session.peer);
	}

	/**
	 * Queues one producer message. Replies at once unless the response can
	 * come back from upstream: that needs a `client_msg_id` and a live link.
	 */
	private async forward(envelope: Envelope, producer: ServerSession): Promise<ResponseEnvelope | null> {
		const msgId = clientMsgIdOf(envelope) ?? null;
		if (msgId !== null) {
			const displaced = this.correlations.register(msgId, producer.id);
			if (displaced !== undefined) {
				this.logger.warn({ msgId, displaced, owner: producer.id }, "client_msg_id reused while pending");
			}
		}

		const offered = this.outbound.offer({
			envelope,
			owner: producer.id,
			msgId,
			enqueuedAtMs: this.clock.now(),
		});
		if (offered.type === "rejected") {
			if (msgId !== null) this.correlations.releaseIfOwner(msgId, producer.id);
			this.logger.warn({ depth: offered.depth }, "Outbound queue full, message refused");
			return errorResponse(`Relay queue full (${offered.depth} messages)`);
		}
		if (offered.type === "accepted_with_eviction") {
			await this.evicted(offered.evicted);
		}

		if (msgId === null || this.upstream === null) {
			return queuedResponse(RELAY_QUEUED_MESSAGE, { queueDepth: offered.depth });
		}
		return null;
	}

	private async evicted(item: RelayItem): Promise<void> {
		this.logger.warn({ owner: item.owner, msgId: item.msgId }, "Outbound queue full, oldest message dropped");
		this.events.emit("evicted", item);
		if (item.msgId !== null) this.correlations.releaseIfOwner(item.msgId, item.owner);

		const owner = this.locals.get(item.owner);
		if (owner === undefined || owner.session.isClosed) return;
		const notice = withCorrelation(
			errorResponse(`Relay queue full (${this.outbound.capacity} messages), message dropped`),
			item.envelope,
		);
		const sent = await owner.session.send(notice);
		if (!sent.ok) {
			this.logger.warn({ owner: item.owner, err: sent.error.message }, "Could not tell producer about dropped message");
		}
	}

	// ── Upstream side ───────────────────────────────────────────────

	private async superviseUpstream(stop: AbortSignal): Promise<void> {
		const { upstream } = this.config;
		while (!stop.aborted) {
			let failure: RelayError | null = null;
			const connected = await UpstreamSession.connect({
				host: upstream.host,
				port: upstream.port,
				secretKey: upstream.secretKey,
				connectTimeoutMs: this.config.connectTimeoutMs,
				maxFrameBytes: this.config.maxFrameBytes,
				...(upstream.tls !== null && { tls: upstream.tls }),
				logger: this.logger,
				clock: this.clock,
				signal: stop,
			});

			if (connected.ok) {
				const session = connected.value;
				this.upstream = session;
				this.backoff.reset();
				this.logger.info({ queueDepth: this.outbound.depth }, "Upstream link up");
				this.events.emit("upstream_connected");

				const ran = await session.run({
					outbound: this.outbound,
					heartbeatIntervalMs: this.config.heartbeatIntervalMs,
					idleTimeoutMs: this.config.heartbeatTimeoutMs,
					onResponse: (response) => this.route(response),
					onForwarded: (item) => this.events.emit("forwarded", item),
					signal: stop,
				});
				this.upstream = null;
				await session.whenSocketClosed();
				if (!ran.ok) failure = ran.error;
			} else {
				failure = connected.error;
			}
			if (stop.aborted) return;

			const delayMs = this.backoff.nextDelay();
			this.logger.warn(
				{ err: failure?.message ?? null, retryInMs: delayMs, failures: this.backoff.consecutiveFailures },
				"Upstream link down",
			);
			this.events.emit("upstream_disconnected", failure, delayMs);
			await sleep(delayMs, stop);
		}
	}

	private async route(response: Envelope): Promise<void> {
		const msgId = clientMsgIdOf(response);
		const owner = msgId === undefined ? undefined : this.correlations.resolve(msgId);
		const producer = owner === undefined ? undefined : this.locals.get(owner);
		if (producer === undefined || producer.session.isClosed) {
			this.logger.debug({ msgId: msgId ?? null }, "No producer waiting for response");
			this.events.emit("unrouted", response);
			return;
		}

		const sent = await producer.session.send(response);
		if (!sent.ok) {
			this.logger.warn({ owner, err: sent.error.message }, "Response could not be delivered");
			return;
		}
		this.events.emit("routed", producer.session.id, response);
	}
}
