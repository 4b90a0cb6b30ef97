/**
 * ServerSession — the accepting side of a connection.
 *
 * Used by the signal server for its producers and by the relay for local
 * producers. Authenticates the first frame against a shared secret, then
 * answers heartbeats and hands every signal envelope to the processor, one
 * at a time, so replies leave in the order requests arrived.
 */

import { createHash, timingSafeEqual } from "node:crypto";
import type { Socket } from "node:net";
import type { Logger } from "../lib/logger/index.js";
import { classifyEnvelope } from "../protocol/envelope.js";
import {
	AUTH_FAILURE_MESSAGE,
	AUTH_SUCCESS_MESSAGE,
	INTERNAL_ERROR_MESSAGE,
	PONG,
	errorResponse,
	successResponse,
	withCorrelation,
} from "../protocol/types.js";
import type { Envelope, ResponseEnvelope } from "../protocol/types.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { FrameStream } from "./frame-stream.js";
import { Session } from "./session.js";
import { CloseReason, SessionRole } from "./types.js";

/**
 * Handles one signal envelope. A null reply means the response will be
 * delivered later through `session.send()`.
 */
export type EnvelopeProcessor = (
	envelope: Envelope,
	session: ServerSession,
) => Promise<ResponseEnvelope | null>;

export interface ServerSessionOptions {
	/** Shared secret; null accepts the connection without an auth frame. */
	readonly secretKey: string | null;
	readonly authTimeoutMs: number;
	readonly heartbeatTimeoutMs: number;
	readonly maxFrameBytes: number;
	readonly processor: EnvelopeProcessor;
	readonly logger: Logger;
	readonly clock?: Clock;
	readonly idPrefix?: string;
}

export class ServerSession extends Session {
	private readonly options: ServerSessionOptions;

	private constructor(stream: FrameStream, options: ServerSessionOptions) {
		super(
			SessionRole.Server,
			stream,
			{ logger: options.logger, clock: options.clock ?? SystemClock },
			options.idPrefix ?? "conn",
		);
		this.options = options;
	}

	static accept(socket: Socket, options: ServerSessionOptions): ServerSession {
		return new ServerSession(new FrameStream(socket, { maxFrameBytes: options.maxFrameBytes }), options);
	}

	/** Drives the session until it closes. Never rejects. */
	async run(): Promise<CloseReason> {
		this.advance({ type: "connected" });
		this.logger.info("Connection accepted");

		const authenticated = await this.authenticate();
		if (authenticated) {
			await this.serve();
		}
		// Tasks end only after close; this covers a close that raced the loop.
		this.close(CloseReason.Shutdown);
		return this.closeReason ?? CloseReason.Shutdown;
	}

	private async authenticate(): Promise<boolean> {
		const secret = this.options.secretKey;
		if (secret === null) {
			return this.advance({ type: "authenticated" });
		}

		const read = await this.stream.read(this.options.authTimeoutMs);
		switch (read.type) {
			case "timeout":
				this.logger.warn("Authentication timed out");
				await this.send(errorResponse("Authentication timeout"));
				this.close(CloseReason.AuthTimeout);
				return false;
			case "eof":
				this.close(CloseReason.PeerClosed);
				return false;
			case "protocol_error":
				this.logger.warn({ kind: read.error.kind }, read.error.message);
				await this.send(errorResponse(read.error.message));
				this.close(CloseReason.ProtocolError);
				return false;
			case "frame":
				break;
		}

		this.received(read.envelope);
		const message = classifyEnvelope(read.envelope);
		if (message.kind !== "auth" || !secretsMatch(message.secretKey, secret)) {
			this.logger.warn({ kind: message.kind }, "Authentication failed");
			await this.send(errorResponse(AUTH_FAILURE_MESSAGE));
			this.close(CloseReason.AuthFailed);
			return false;
		}

		const sent = await this.send(successResponse(AUTH_SUCCESS_MESSAGE));
		if (!sent.ok) {
			this.close(CloseReason.WriteFailed);
			return false;
		}
		this.logger.info("Authenticated");
		return this.advance({ type: "authenticated" });
	}

	private async serve(): Promise<void> {
		while (!this.isClosed) {
			const read = await this.stream.read(this.options.heartbeatTimeoutMs);
			switch (read.type) {
				case "timeout":
					this.logger.warn(
						{ idleMs: this.clock.now() - this.lastActivityAtMs },
						"No traffic within heartbeat timeout",
					);
					this.close(CloseReason.IdleTimeout);
					return;
				case "eof":
					this.close(CloseReason.PeerClosed);
					return;
				case "protocol_error":
					this.logger.warn({ kind: read.error.kind }, read.error.message);
					await this.send(errorResponse(read.error.message));
					this.close(CloseReason.ProtocolError);
					return;
				case "frame":
					break;
			}

			this.received(read.envelope);
			const keepGoing = await this.dispatch(read.envelope);
			if (!keepGoing) return;
		}
	}

	private async dispatch(envelope: Envelope): Promise<boolean> {
		const message = classifyEnvelope(envelope);
		switch (message.kind) {
			case "ping":
				return this.reply(PONG);
			case "pong":
				return true;
			case "signal": {
				const response = await this.process(envelope);
				return response === null ? true : this.reply(withCorrelation(response, envelope));
			}
			case "auth":
			case "response":
			case "unknown":
				this.logger.warn({ kind: message.kind }, "Unexpected envelope");
				await this.send(withCorrelation(errorResponse("Unrecognized message"), envelope));
				this.close(CloseReason.ProtocolError);
				return false;
		}
	}

	private async process(envelope: Envelope): Promise<ResponseEnvelope | null> {
		try {
			return await this.options.processor(envelope, this);
		} catch (e) {
			this.logger.error(
				{ err: e instanceof Error ? e.message : String(e) },
				"Processor failed",
			);
			return errorResponse(INTERNAL_ERROR_MESSAGE);
		}
	}

	private async reply(envelope: Envelope): Promise<boolean> {
		const result = await this.send(envelope);
		if (!result.ok) {
			this.close(CloseReason.WriteFailed);
		}
		return result.ok;
	}
}

/** Constant-time comparison; digests give both sides the same length. */
function secretsMatch(given: string, expected: string): boolean {
	const a = createHash("sha256").update(given, "utf8").digest();
	const b = createHash("sha256").update(expected, "utf8").digest();
	return timingSafeEqual(a, b);
}
