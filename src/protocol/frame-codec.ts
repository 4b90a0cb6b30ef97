/**
 * Length-prefixed JSON framing.
 *
 * A frame is a 4-byte unsigned big-endian payload length followed by that
 * many bytes of UTF-8 JSON. The payload must decode to a JSON object.
 *
 * FrameDecoder is incremental: feed it socket chunks as they arrive and it
 * yields every complete frame. A length header outside 1..maxFrameBytes is
 * rejected as soon as the header is complete, before any body is buffered.
 */

import { ProtocolError, ProtocolErrorKind } from "../shared/errors.js";
import type { Envelope } from "./types.js";

export const FRAME_HEADER_BYTES = 4;
export const DEFAULT_MAX_FRAME_BYTES = 4 * 1024 * 1024;

export type DecodeResult =
	| { readonly type: "frame"; readonly envelope: Envelope }
	| { readonly type: "eof" }
	| { readonly type: "protocol_error"; readonly error: ProtocolError };

const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Serialize an envelope into one frame. Throws if the envelope cannot be serialized. */
export function encodeFrame(envelope: Envelope): Buffer {
	const payload = Buffer.from(JSON.stringify(envelope), "utf8");
	const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + payload.length);
	frame.writeUInt32BE(payload.length, 0);
	payload.copy(frame, FRAME_HEADER_BYTES);
	return frame;
}

/** Parse a frame payload into an envelope. */
export function parsePayload(payload: Uint8Array): DecodeResult {
	let text: string;
	try {
		text = utf8.decode(payload);
	} catch (e) {
		return protocolError(ProtocolErrorKind.MalformedPayload, "Frame payload is not valid UTF-8", e);
	}

	let value: unknown;
	try {
		value = JSON.parse(text);
	} catch (e) {
		return protocolError(ProtocolErrorKind.MalformedPayload, "Frame payload is not valid JSON", e);
	}

	if (!isEnvelope(value)) {
		return protocolError(ProtocolErrorKind.MalformedPayload, "Frame payload is not a JSON object");
	}
	return { type: "frame", envelope: value };
}

/** Decode a buffer holding exactly one complete frame. */
export function decodeFrame(
	buffer: Uint8Array,
	maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES,
): DecodeResult {
	const decoder = new FrameDecoder(maxFrameBytes);
	const results = decoder.push(buffer);
	const first = results[0];
	if (first === undefined) {
		return decoder.end();
	}
	if (first.type === "frame" && (results.length > 1 || decoder.buffered > 0)) {
		return protocolError(ProtocolErrorKind.MalformedPayload, "Trailing bytes after frame");
	}
	return first;
}

export class FrameDecoder {
	private chunks: Buffer[] = [];
	private pending = 0;
	/** Bytes that must be buffered before the next frame can be read. */
	private needed = FRAME_HEADER_BYTES;
	private failed = false;

	constructor(readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {}

	/** Bytes received but not yet part of a complete frame. */
	get buffered(): number {
		return this.pending;
	}

	/**
	 * Feed a chunk and collect every frame it completes. A protocol error is
	 * always the last result, after which the decoder ignores further input.
	 * Chunks are joined only once a header or a whole frame is available.
	 */
	push(chunk: Uint8Array): DecodeResult[] {
		if (this.failed || chunk.length === 0) return [];
		this.chunks.push(Buffer.from(chunk));
		this.pending += chunk.length;
		if (this.pending < this.needed) return [];

		let buffer = Buffer.concat(this.chunks, this.pending);
		this.needed = FRAME_HEADER_BYTES;
		const results: DecodeResult[] = [];
		while (buffer.length >= FRAME_HEADER_BYTES) {
			const length = buffer.readUInt32BE(0);
			if (length === 0 || length > this.maxFrameBytes) {
				this.fail();
				results.push(
					protocolError(
						ProtocolErrorKind.OversizedFrame,
						`Frame length ${length} outside 1..${this.maxFrameBytes}`,
					),
				);
				return results;
			}
			if (buffer.length < FRAME_HEADER_BYTES + length) {
				this.needed = FRAME_HEADER_BYTES + length;
				break;
			}

			const payload = buffer.subarray(FRAME_HEADER_BYTES, FRAME_HEADER_BYTES + length);
			buffer = buffer.subarray(FRAME_HEADER_BYTES + length);
			const result = parsePayload(payload);
			results.push(result);
			if (result.type === "protocol_error") {
				this.fail();
				return results;
			}
		}
		this.chunks = buffer.length === 0 ? [] : [buffer];
		this.pending = buffer.length;
		return results;
	}

	/** The peer finished sending: clean EOF only on a frame boundary. */
	end(): DecodeResult {
		if (this.failed || this.pending === 0) {
			return { type: "eof" };
		}
		const pending = this.pending;
		this.fail();
		return protocolError(
			ProtocolErrorKind.Truncated,
			`Connection closed with ${pending} bytes of an incomplete frame`,
		);
	}

	private fail(): void {
		this.failed = true;
		this.chunks = [];
		this.pending = 0;
		this.needed = FRAME_HEADER_BYTES;
	}
}

function isEnvelope(value: unknown): value is Envelope {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function protocolError(kind: ProtocolErrorKind, message: string, cause?: unknown): DecodeResult {
	const error =
		cause === undefined
			? new ProtocolError(kind, message)
			: new ProtocolError(kind, message, { cause });
	return { type: "protocol_error", error };
}
