import { describe, expect, it } from "vitest";
import {
	AuthError,
	ConfigError,
	ErrorCategory,
	NetworkError,
	ProtocolError,
	ProtocolErrorKind,
	type RelayError,
	SignalNotFoundError,
	StoreUnavailableError,
	SystemError,
	TimeoutError,
	classifyError,
	isAuthError,
	isConfigError,
	isNetworkError,
	isProtocolError,
	isTimeoutError,
} from "./errors.js";

function errnoError(message: string, code: string): Error {
	return Object.assign(new Error(message), { code });
}

describe("RelayError hierarchy", () => {
	const cases: Array<[string, RelayError, ErrorCategory]> = [
		[
			"ProtocolError",
			new ProtocolError(ProtocolErrorKind.Truncated, "short read"),
			ErrorCategory.NonRetryable,
		],
		["AuthError", new AuthError("Invalid secret key"), ErrorCategory.NonRetryable],
		["NetworkError", new NetworkError("refused"), ErrorCategory.Retryable],
		["TimeoutError", new TimeoutError("timed out"), ErrorCategory.Retryable],
		["StoreUnavailableError", new StoreUnavailableError("locked"), ErrorCategory.Retryable],
		["SignalNotFoundError", new SignalNotFoundError(9), ErrorCategory.NonRetryable],
		["ConfigError", new ConfigError("bad port"), ErrorCategory.Fatal],
		["SystemError", new SystemError("panic"), ErrorCategory.Fatal],
	];

	it.each(cases)("%s has category %s", (_name, error, expected) => {
		expect(error.category).toBe(expected);
		expect(error.isRetryable).toBe(expected === ErrorCategory.Retryable);
	});

	it("keeps the cause out of the serialized context", () => {
		const cause = new Error("root");
		const error = new NetworkError("upstream reset", { cause, peer: "10.0.0.1:5200" });
		expect(error.cause).toBe(cause);
		expect(error.toJSON()).toEqual({
			name: "NetworkError",
			message: "upstream reset",
			code: "NETWORK_ERROR",
			category: "retryable",
			retryable: true,
			context: { peer: "10.0.0.1:5200" },
		});
	});

	it("ProtocolError serializes its kind", () => {
		const error = new ProtocolError(ProtocolErrorKind.OversizedFrame, "too big", { length: 99 });
		expect(error.toJSON()).toMatchObject({ kind: "oversized_frame", context: { length: 99 } });
	});

	it("SignalNotFoundError formats the id into the message", () => {
		const error = new SignalNotFoundError(42);
		expect(error.message).toBe("Signal with ID 42 not found.");
		expect(error.signalId).toBe(42);
	});
});

describe("classifyError", () => {
	it("returns RelayErrors unchanged", () => {
		const error = new AuthError("nope");
		expect(classifyError(error)).toBe(error);
	});

	it("maps ECONNREFUSED to NetworkError", () => {
		const classified = classifyError(errnoError("connect ECONNREFUSED 127.0.0.1:5200", "ECONNREFUSED"));
		expect(isNetworkError(classified)).toBe(true);
		expect(classified.context).toEqual({ errno: "ECONNREFUSED" });
	});

	it("maps ECONNRESET and EPIPE to NetworkError", () => {
		expect(isNetworkError(classifyError(errnoError("read ECONNRESET", "ECONNRESET")))).toBe(true);
		expect(isNetworkError(classifyError(errnoError("write EPIPE", "EPIPE")))).toBe(true);
	});

	it("maps ETIMEDOUT and timeout messages to TimeoutError", () => {
		expect(isTimeoutError(classifyError(errnoError("connect ETIMEDOUT", "ETIMEDOUT")))).toBe(true);
		expect(isTimeoutError(classifyError(new Error("Connect timed out after 10000ms")))).toBe(true);
	});

	it("maps anything else to SystemError", () => {
		expect(classifyError(new Error("unexpected"))).toBeInstanceOf(SystemError);
		expect(classifyError("plain string").message).toBe("plain string");
	});
});

describe("type guards", () => {
	it("recognise their own types only", () => {
		expect(isProtocolError(new ProtocolError(ProtocolErrorKind.MalformedPayload, "bad json"))).toBe(
			true,
		);
		expect(isAuthError(new AuthError("x"))).toBe(true);
		expect(isAuthError(new NetworkError("x"))).toBe(false);
		expect(isConfigError(new ConfigError("x"))).toBe(true);
		expect(isTimeoutError(new NetworkError("x"))).toBe(false);
	});
});
