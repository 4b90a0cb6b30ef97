import { describe, expect, it } from "vitest";
import { clientMsgId, idToString, nextSessionId } from "./identifiers.js";

describe("clientMsgId", () => {
	it("keeps the token verbatim, whitespace included", () => {
		expect(idToString(clientMsgId("  p-1:42 "))).toBe("  p-1:42 ");
	});

	it("rejects an empty token", () => {
		expect(() => clientMsgId("")).toThrow("ClientMsgId cannot be empty");
	});
});

describe("nextSessionId", () => {
	it("allocates distinct ids with the given prefix", () => {
		const a = nextSessionId("local");
		const b = nextSessionId("local");
		expect(a).not.toBe(b);
		expect(idToString(a).startsWith("local-")).toBe(true);
	});
});
