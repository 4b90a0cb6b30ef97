/**
 * Domain primitive identifiers — branded types for compile-time safety.
 *
 * A ClientMsgId is the caller's correlation token. It is carried byte for
 * byte: no trimming or normalisation, and nothing reads its structure.
 */

// ── Brand infrastructure ─────────────────────────────────────────────

declare const __brand: unique symbol;
type Brand<T, B extends string> = T & { readonly [__brand]: B };

// ── Identifier types ─────────────────────────────────────────────────

/** Caller-generated correlation token, echoed unchanged in the eventual response. */
export type ClientMsgId = Brand<string, "ClientMsgId">;
/** Process-unique identifier for one accepted or initiated connection. */
export type SessionId = Brand<string, "SessionId">;

// ── Factory functions ────────────────────────────────────────────────

/** Create a ClientMsgId from a raw string. Throws if empty; the value is kept verbatim. */
export function clientMsgId(value: string): ClientMsgId {
	if (value.length === 0) {
		throw new Error("ClientMsgId cannot be empty");
	}
	return value as ClientMsgId;
}

let sessionCounter = 0;

/** Allocate the next SessionId, e.g. `local-3` or `upstream-7`. */
export function nextSessionId(prefix: string): SessionId {
	sessionCounter += 1;
	return `${prefix}-${sessionCounter}` as SessionId;
}

/** Extract the raw string from a branded identifier. */
export function idToString(id: ClientMsgId | SessionId): string {
	return id;
}
