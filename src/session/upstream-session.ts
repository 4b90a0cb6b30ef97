/**
 * UpstreamSession — the initiating side, used by the relay.
 *
 * `connect()` opens the socket (TLS optional), sends the secret and waits
 * for a success reply. `run()` then drives two loops against one socket:
 * the sender drains an OutboundSource and pings when it has been idle for a
 * heartbeat interval; the receiver hands responses to a callback. When
 * either loop fails both stop and the session closes.
 */

import { connect as netConnect } from "node:net";
import type { Socket } from "node:net";
import { connect as tlsConnect } from "node:tls";
import type { Logger } from "../lib/logger/index.js";
import { classifyEnvelope } from "../protocol/envelope.js";
import { PING, PONG, ResponseStatus, authRequest } from "../protocol/types.js";
import type { Envelope } from "../protocol/types.js";
import { AuthError, NetworkError, TimeoutError, classifyError } from "../shared/errors.js";
import type { RelayError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { FrameStream } from "./frame-stream.js";
import { Session } from "./session.js";
import { CloseReason, SessionRole } from "./types.js";
import type { OutboundItem, OutboundSource } from "./types.js";

export interface UpstreamTlsOptions {
	readonly rejectUnauthorized: boolean;
	readonly ca?: string;
	readonly servername?: string;
}

export interface UpstreamConnectOptions {
	readonly host: string;
	readonly port: number;
	readonly secretKey: string;
	readonly connectTimeoutMs: number;
	readonly maxFrameBytes: number;
	readonly tls?: UpstreamTlsOptions;
	readonly logger: Logger;
	readonly clock?: Clock;
	readonly signal?: AbortSignal;
}

export interface UpstreamRunOptions<T extends OutboundItem> {
	readonly outbound: OutboundSource<T>;
	readonly heartbeatIntervalMs: number;
	/** Close when nothing, not even a pong, arrives for this long. */
	readonly idleTimeoutMs: number;
	readonly onResponse: (envelope: Envelope) => Promise<void>;
	/** Called after an item has been written. */
	readonly onForwarded?: (item: T) => void;
	readonly signal?: AbortSignal;
}

export class UpstreamSession extends Session {
	private constructor(stream: FrameStream, logger: Logger, clock: Clock) {
		super(SessionRole.Client, stream, { logger, clock }, "upstream");
	}

	static async connect(
		options: UpstreamConnectOptions,
	): Promise<Result<UpstreamSession, RelayError>> {
		const opened = await openStream(options);
		if (!opened.ok) return opened;

		const session = new UpstreamSession(opened.value, options.logger, options.clock ?? SystemClock);
		const authed = await session.authenticate(options.secretKey, options.connectTimeoutMs);
		return authed.ok ? ok(session) : authed;
	}

	/**
	 * Runs until a loop fails or `signal` aborts. Resolves ok on a requested
	 * stop, err with the failure otherwise. The session is closed either way.
	 */
	async run<T extends OutboundItem>(options: UpstreamRunOptions<T>): Promise<Result<void, RelayError>> {
		const stop = new AbortController();
		const onAbort = (): void => {
			stop.abort();
			this.close(CloseReason.Shutdown);
		};
		if (options.signal?.aborted) {
			onAbort();
			return ok(undefined);
		}
		options.signal?.addEventListener("abort", onAbort, { once: true });

		const sending = this.sendLoop(options, stop.signal);
		const receiving = this.receiveLoop(options, stop.signal);
		const first = await Promise.race([sending, receiving]);

		stop.abort();
		this.close(first.ok ? CloseReason.Shutdown : CloseReason.UpstreamFailed);
		await Promise.all([sending, receiving]);
		options.signal?.removeEventListener("abort", onAbort);
		return first;
	}

	private async authenticate(secretKey: string, timeoutMs: number): Promise<Result<void, RelayError>> {
		this.advance({ type: "connected" });
		const sent = await this.send(authRequest(secretKey));
		if (!sent.ok) {
			this.close(CloseReason.WriteFailed);
			return sent;
		}

		const read = await this.stream.read(timeoutMs);
		if (read.type !== "frame") {
			const error =
				read.type === "timeout"
					? new TimeoutError(`No authentication reply within ${timeoutMs}ms`)
					: read.type === "protocol_error"
						? read.error
						: (this.stream.error ?? new NetworkError("Connection closed during authentication"));
			this.close(read.type === "timeout" ? CloseReason.AuthTimeout : CloseReason.AuthFailed);
			return err(error);
		}

		this.received(read.envelope);
		const reply = classifyEnvelope(read.envelope);
		if (reply.kind !== "response" || reply.response.status !== ResponseStatus.Success) {
			const message = reply.kind === "response" ? reply.response.message : "Unexpected reply";
			this.close(CloseReason.AuthFailed);
			return err(new AuthError(`Upstream rejected authentication: ${message}`));
		}

		this.advance({ type: "authenticated" });
		this.logger.info("Authenticated with upstream");
		return ok(undefined);
	}

	private async sendLoop<T extends OutboundItem>(
		options: UpstreamRunOptions<T>,
		stop: AbortSignal,
	): Promise<Result<void, RelayError>> {
		while (!stop.aborted) {
			const item = await options.outbound.take({
				timeoutMs: options.heartbeatIntervalMs,
				signal: stop,
			});
			if (stop.aborted) {
				if (item !== null) options.outbound.requeue(item);
				break;
			}
			if (item === null) {
				const pinged = await this.send(PING);
				if (!pinged.ok) return pinged;
				continue;
			}
			const sent = await this.send(item.envelope);
			if (!sent.ok) {
				options.outbound.requeue(item);
				return sent;
			}
			options.onForwarded?.(item);
		}
		return ok(undefined);
	}

	private async receiveLoop<T extends OutboundItem>(
		options: UpstreamRunOptions<T>,
		stop: AbortSignal,
	): Promise<Result<void, RelayError>> {
		for (;;) {
			const read = await this.stream.read(options.idleTimeoutMs);
			if (stop.aborted) return ok(undefined);
			switch (read.type) {
				case "timeout":
					return err(new TimeoutError(`Upstream silent for ${options.idleTimeoutMs}ms`));
				case "eof":
					return err(this.stream.error ?? new NetworkError("Upstream closed the connection"));
				case "protocol_error":
					return err(read.error);
				case "frame":
					break;
			}

			this.received(read.envelope);
			const message = classifyEnvelope(read.envelope);
			if (message.kind === "pong") continue;
			if (message.kind === "ping") {
				const ponged = await this.send(PONG);
				if (!ponged.ok) return ponged;
				continue;
			}
			await options.onResponse(read.envelope);
		}
	}
}

function openStream(options: UpstreamConnectOptions): Promise<Result<FrameStream, RelayError>> {
	const { host, port, tls, connectTimeoutMs, maxFrameBytes, signal } = options;
	if (signal?.aborted) {
		return Promise.resolve(err(new NetworkError("Connect aborted")));
	}

	return new Promise((resolve) => {
		const socket: Socket =
			tls === undefined
				? netConnect({ host, port })
				: tlsConnect({
						host,
						port,
						rejectUnauthorized: tls.rejectUnauthorized,
						servername: tls.servername ?? host,
						...(tls.ca !== undefined && { ca: tls.ca }),
					});
		const readyEvent = tls === undefined ? "connect" : "secureConnect";

		const settle = (result: Result<FrameStream, RelayError>): void => {
			clearTimeout(timer);
			signal?.removeEventListener("abort", onAbort);
			socket.off(readyEvent, onReady);
			socket.off("error", onError);
			if (!result.ok) socket.destroy();
			resolve(result);
		};
		const onReady = (): void => settle(ok(new FrameStream(socket, { maxFrameBytes })));
		const onError = (e: Error): void => settle(err(classifyError(e)));
		const onAbort = (): void => settle(err(new NetworkError("Connect aborted")));
		const timer = setTimeout(
			() => settle(err(new TimeoutError(`Connect to ${host}:${port} timed out after ${connectTimeoutMs}ms`))),
			connectTimeoutMs,
		);

		socket.once(readyEvent, onReady);
		socket.once("error", onError);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}
