/**
 * Wire-level message types.
 *
 * Every frame carries one JSON object. The relay forwards signal envelopes
 * without reinterpreting them, so an envelope is kept as the decoded object
 * and only the fields a hop needs are read from it.
 */

import type { ClientMsgId } from "../shared/identifiers.js";

/** A decoded frame payload: any JSON object. */
export type Envelope = Readonly<Record<string, unknown>>;

export const SignalAction = {
	Buy: "BUY",
	Sell: "SELL",
	Close: "CLOSE",
} as const;

export type SignalAction = (typeof SignalAction)[keyof typeof SignalAction];

export const ResponseStatus = {
	Success: "success",
	Error: "error",
	Queued: "queued",
} as const;

export type ResponseStatus = (typeof ResponseStatus)[keyof typeof ResponseStatus];

/** Reply to a signal or an authentication attempt. A type alias so it is assignable to Envelope. */
export type ResponseEnvelope = {
	readonly status: ResponseStatus;
	readonly message: string;
	readonly signal_id?: number;
	readonly client_msg_id?: string;
	readonly queue_depth?: number;
};

/** A validated trading instruction. Prices are kept as the numbers received. */
export interface SignalRequest {
	readonly action: SignalAction;
	readonly symbol: string;
	readonly price: number;
	readonly sl?: number;
	readonly tp1?: number;
	readonly tp2?: number;
	readonly tp3?: number;
	readonly atr?: number;
	readonly openSignalId?: number;
	readonly clientMsgId?: ClientMsgId;
}

export const AUTH_SUCCESS_MESSAGE = "Authentication successful";
export const AUTH_FAILURE_MESSAGE = "Invalid secret key";
export const INTERNAL_ERROR_MESSAGE = "An internal server error occurred.";

export const PING: Envelope = { type: "ping" };
export const PONG: Envelope = { type: "pong" };

export function authRequest(secretKey: string): Envelope {
	return { secret_key: secretKey };
}

export function successResponse(
	message: string,
	extra: { readonly signalId?: number } = {},
): ResponseEnvelope {
	return extra.signalId === undefined
		? { status: ResponseStatus.Success, message }
		: { status: ResponseStatus.Success, message, signal_id: extra.signalId };
}

export function errorResponse(message: string): ResponseEnvelope {
	return { status: ResponseStatus.Error, message };
}

export function queuedResponse(
	message: string,
	extra: { readonly queueDepth?: number } = {},
): ResponseEnvelope {
	return extra.queueDepth === undefined
		? { status: ResponseStatus.Queued, message }
		: { status: ResponseStatus.Queued, message, queue_depth: extra.queueDepth };
}

/**
 * Copies the request's client_msg_id onto a response. A response that
 * already names one keeps it; a request without one leaves it untouched.
 */
export function withCorrelation(response: ResponseEnvelope, request: Envelope): ResponseEnvelope {
	const id = request["client_msg_id"];
	if (response.client_msg_id !== undefined || typeof id !== "string" || id.length === 0) {
		return response;
	}
	return { ...response, client_msg_id: id };
}
