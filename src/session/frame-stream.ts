/**
 * FrameStream — framed reads and writes over one socket.
 *
 * Incoming chunks go through a FrameDecoder into a queue of decode results,
 * so reads never miss a frame that arrived while nobody was waiting. After
 * EOF or a protocol error the stream stops reading and every later read
 * returns that terminal result again.
 */

import type { Socket } from "node:net";
import { AsyncQueue } from "../lib/queue/index.js";
import { DEFAULT_MAX_FRAME_BYTES, FrameDecoder, encodeFrame } from "../protocol/frame-codec.js";
import type { DecodeResult } from "../protocol/frame-codec.js";
import type { Envelope } from "../protocol/types.js";
import { NetworkError, RelayError, classifyError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";

export type ReadResult = DecodeResult | { readonly type: "timeout" };

export interface FrameStreamOptions {
	readonly maxFrameBytes?: number;
}

export class FrameStream {
	private readonly decoder: FrameDecoder;
	private readonly results = new AsyncQueue<DecodeResult>();
	private terminal: DecodeResult | null = null;
	private closing = false;
	private lastError: RelayError | null = null;
	private readonly closedPromise: Promise<void>;

	constructor(
		private readonly socket: Socket,
		options: FrameStreamOptions = {},
	) {
		this.decoder = new FrameDecoder(options.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES);
		this.closedPromise = new Promise((resolve) => {
			socket.once("close", () => {
				this.finish({ type: "eof" });
				resolve();
			});
		});
		socket.setNoDelay(true);
		socket.on("data", (chunk: Buffer) => this.onData(chunk));
		socket.on("end", () => this.finish(this.decoder.end()));
		socket.on("error", (e: Error) => {
			this.lastError = classifyError(e);
			this.finish({ type: "eof" });
		});
	}

	/** `host:port` of the other end, for logs. */
	get peer(): string {
		return `${this.socket.remoteAddress ?? "unknown"}:${this.socket.remotePort ?? 0}`;
	}

	get isClosed(): boolean {
		return this.closing || this.socket.destroyed;
	}

	/** The socket error that ended the stream, if one did. */
	get error(): RelayError | null {
		return this.lastError;
	}

	/** Next decode result, or `timeout` when nothing arrives within `timeoutMs`. */
	async read(timeoutMs?: number): Promise<ReadResult> {
		const buffered = this.results.poll();
		if (buffered !== undefined) return buffered;
		if (this.terminal !== null) return this.terminal;

		const next = await this.results.take(timeoutMs === undefined ? {} : { timeoutMs });
		return next ?? { type: "timeout" };
	}

	/** Writes one frame; resolves once the socket has accepted it. */
	write(envelope: Envelope): Promise<Result<void, RelayError>> {
		if (this.isClosed) {
			return Promise.resolve(err(new NetworkError(`Connection to ${this.peer} is closed`)));
		}
		let frame: Buffer;
		try {
			frame = encodeFrame(envelope);
		} catch (e) {
			return Promise.resolve(err(classifyError(e)));
		}
		return new Promise((resolve) => {
			this.socket.write(frame, (e) => {
				resolve(e ? err(classifyError(e)) : ok(undefined));
			});
		});
	}

	/**
	 * Flushes pending writes, then tears the socket down. Idempotent; pending
	 * and later reads see EOF.
	 */
	close(): void {
		if (this.closing) return;
		this.closing = true;
		this.finish({ type: "eof" });
		if (this.socket.destroyed) return;
		this.socket.end(() => this.socket.destroy());
		// A peer that never drains its receive window must not hold the socket open.
		setTimeout(() => this.socket.destroy(), 1_000).unref();
	}

	/** Resolves once the underlying socket has fully closed. */
	closed(): Promise<void> {
		return this.closedPromise;
	}

	private onData(chunk: Buffer): void {
		if (this.terminal !== null) return;
		for (const result of this.decoder.push(chunk)) {
			if (result.type === "protocol_error") {
				this.socket.pause();
				this.finish(result);
				return;
			}
			this.results.put(result);
		}
	}

	private finish(result: DecodeResult): void {
		if (this.terminal !== null) return;
		this.terminal = result;
		this.results.put(result);
	}
}
