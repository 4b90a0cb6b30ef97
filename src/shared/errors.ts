/**
 * RelayError hierarchy — structured error classification.
 *
 * Every error carries a category (retryable, non-retryable, fatal). The
 * category decides whether a failed signal goes back to the retry queue and
 * whether the relay keeps reconnecting.
 */

/** Error severity categories that drive retry behavior. */
export const ErrorCategory = {
	Retryable: "retryable",
	NonRetryable: "non_retryable",
	Fatal: "fatal",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** Framing and envelope violations. All of them close the connection. */
export const ProtocolErrorKind = {
	Truncated: "truncated",
	OversizedFrame: "oversized_frame",
	MalformedPayload: "malformed_payload",
	UnknownMessage: "unknown_message",
} as const;

export type ProtocolErrorKind = (typeof ProtocolErrorKind)[keyof typeof ProtocolErrorKind];

interface RelayErrorOptions {
	readonly cause?: unknown;
}

type ErrorContext = Record<string, unknown> & RelayErrorOptions;

/** Base error class for the relay, with category-based retry semantics. */
export class RelayError extends Error {
	readonly category: ErrorCategory;
	readonly code: string;
	readonly context: Record<string, unknown>;

	constructor(
		message: string,
		code: string,
		category: ErrorCategory,
		context: ErrorContext = {},
	) {
		super(message);
		const { cause, ...rest } = context;
		this.name = "RelayError";
		this.category = category;
		this.code = code;
		this.context = rest;
		if (cause !== undefined) this.cause = cause;
	}

	get isRetryable(): boolean {
		return this.category === ErrorCategory.Retryable;
	}

	toJSON(): Record<string, unknown> {
		return {
			name: this.name,
			message: this.message,
			code: this.code,
			category: this.category,
			retryable: this.isRetryable,
			context: this.context,
		};
	}
}

// ── Specific error types ─────────────────────────────────────────────

/** Non-retryable framing or envelope violation; fatal to the connection. */
export class ProtocolError extends RelayError {
	readonly kind: ProtocolErrorKind;

	constructor(kind: ProtocolErrorKind, message: string, context: ErrorContext = {}) {
		super(message, "PROTOCOL_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "ProtocolError";
		this.kind = kind;
	}

	override toJSON(): Record<string, unknown> {
		return { ...super.toJSON(), kind: this.kind };
	}
}

/** Non-retryable bad-secret or rejected-handshake failure. */
export class AuthError extends RelayError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "AUTH_ERROR", ErrorCategory.NonRetryable, context);
		this.name = "AuthError";
	}
}

/** Retryable connectivity failure (refused, reset, broken pipe). */
export class NetworkError extends RelayError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "NETWORK_ERROR", ErrorCategory.Retryable, context);
		this.name = "NetworkError";
	}
}

/** Retryable connect, auth or read timeout. */
export class TimeoutError extends RelayError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "TIMEOUT_ERROR", ErrorCategory.Retryable, context);
		this.name = "TimeoutError";
	}
}

/** Retryable failure of the persistence provider. */
export class StoreUnavailableError extends RelayError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "STORE_UNAVAILABLE", ErrorCategory.Retryable, context);
		this.name = "StoreUnavailableError";
	}
}

/** Non-retryable: a CLOSE referenced a signal id the store does not know. */
export class SignalNotFoundError extends RelayError {
	readonly signalId: number;

	constructor(signalId: number, context: ErrorContext = {}) {
		super(`Signal with ID ${signalId} not found.`, "SIGNAL_NOT_FOUND", ErrorCategory.NonRetryable, {
			...context,
			signalId,
		});
		this.name = "SignalNotFoundError";
		this.signalId = signalId;
	}
}

/** Fatal error for invalid or missing configuration. */
export class ConfigError extends RelayError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "CONFIG_ERROR", ErrorCategory.Fatal, context);
		this.name = "ConfigError";
	}
}

/** Fatal error for unexpected internal failures. */
export class SystemError extends RelayError {
	constructor(message: string, context: ErrorContext = {}) {
		super(message, "SYSTEM_ERROR", ErrorCategory.Fatal, context);
		this.name = "SystemError";
	}
}

// ── Classification helper ────────────────────────────────────────────

const NETWORK_CODES = new Set([
	"ECONNREFUSED",
	"ECONNRESET",
	"ENOTFOUND",
	"EPIPE",
	"EHOSTUNREACH",
	"ENETUNREACH",
	"ECONNABORTED",
	"ERR_STREAM_DESTROYED",
	"ERR_STREAM_WRITE_AFTER_END",
]);

function errnoCode(error: Error): string | undefined {
	const code: unknown = Reflect.get(error, "code");
	return typeof code === "string" ? code : undefined;
}

/** Classify an unknown error into the appropriate RelayError subtype by inspecting its code and message. */
export function classifyError(error: unknown): RelayError {
	if (error instanceof RelayError) return error;
	if (error instanceof Error) {
		const code = errnoCode(error);
		if (code === "ETIMEDOUT") {
			return new TimeoutError(error.message, { cause: error, errno: code });
		}
		if (code !== undefined && NETWORK_CODES.has(code)) {
			return new NetworkError(error.message, { cause: error, errno: code });
		}

		const msg = error.message.toLowerCase();
		if (msg.includes("timeout") || msg.includes("timed out")) {
			return new TimeoutError(error.message, { cause: error });
		}
		if (msg.includes("econnrefused") || msg.includes("socket hang up")) {
			return new NetworkError(error.message, { cause: error });
		}
		return new SystemError(error.message, { cause: error });
	}
	return new SystemError(String(error), { cause: error });
}

// ── Type guards ──────────────────────────────────────────────────────

/** Type guard for ProtocolError. */
export function isProtocolError(e: unknown): e is ProtocolError {
	return e instanceof ProtocolError;
}

/** Type guard for AuthError. */
export function isAuthError(e: unknown): e is AuthError {
	return e instanceof AuthError;
}

/** Type guard for NetworkError. */
export function isNetworkError(e: unknown): e is NetworkError {
	return e instanceof NetworkError;
}

/** Type guard for TimeoutError. */
export function isTimeoutError(e: unknown): e is TimeoutError {
	return e instanceof TimeoutError;
}

/** Type guard for ConfigError. */
export function isConfigError(e: unknown): e is ConfigError {
	return e instanceof ConfigError;
}
