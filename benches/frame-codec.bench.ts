import { bench, describe } from "vitest";
import { FrameDecoder, encodeFrame } from "../src/protocol/frame-codec.js";

const signal = { action: "BUY", symbol: "EURUSD", price: 1.0855, sl: 1.08, tp1: 1.09, client_msg_id: "b-1" };
const frame = encodeFrame(signal);
const burst = Buffer.concat(Array.from({ length: 100 }, () => frame));

describe("frame codec", () => {
	bench("encode 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			const _frame = encodeFrame(signal);
		}
	});

	bench("decode 100 frames from one chunk", () => {
		const _results = new FrameDecoder().push(burst);
	});

	bench("decode 100 frames fed 7 bytes at a time", () => {
		const decoder = new FrameDecoder();
		for (let offset = 0; offset < burst.length; offset += 7) {
			decoder.push(burst.subarray(offset, offset + 7));
		}
	});
});
