import * as fc from "fast-check";
import { describe, expect, it } from "vitest";
import { FrameDecoder, decodeFrame, encodeFrame } from "./frame-codec.js";
import type { Envelope } from "./types.js";

const key = fc.string().filter((k) => k !== "__proto__");
const scalar = fc.oneof(fc.string(), fc.integer(), fc.boolean(), fc.constant(null));
const nested = fc.dictionary(key, scalar, { maxKeys: 4 }).map((d) => ({ ...d }));
const envelope: fc.Arbitrary<Envelope> = fc
	.dictionary(key, fc.oneof(scalar, fc.array(scalar, { maxLength: 4 }), nested), { maxKeys: 8 })
	.map((d) => ({ ...d }));

describe("frame codec (property-based)", () => {
	it("decodes what it encodes", () => {
		fc.assert(
			fc.property(envelope, (value) => {
				expect(decodeFrame(encodeFrame(value))).toEqual({ type: "frame", envelope: value });
			}),
			{ numRuns: 300 },
		);
	});

	it("yields the same frames however the byte stream is chunked", () => {
		fc.assert(
			fc.property(
				fc.array(envelope, { minLength: 1, maxLength: 5 }),
				fc.array(fc.integer({ min: 1, max: 64 }), { minLength: 1, maxLength: 20 }),
				(values, cuts) => {
					const stream = Buffer.concat(values.map((v) => encodeFrame(v)));
					const decoder = new FrameDecoder();
					const decoded: Envelope[] = [];
					let offset = 0;
					let i = 0;
					while (offset < stream.length) {
						const size = cuts[i % cuts.length] ?? 1;
						for (const r of decoder.push(stream.subarray(offset, offset + size))) {
							if (r.type === "frame") decoded.push(r.envelope);
						}
						offset += size;
						i += 1;
					}
					expect(decoded).toEqual(values);
					expect(decoder.end()).toEqual({ type: "eof" });
				},
			),
			{ numRuns: 200 },
		);
	});
});
