/**
 * Session lifecycle types.
 *
 * Both ends of a connection walk the same four states. Closed is terminal
 * and is entered exactly once, with the reason recorded.
 */

import type { Envelope } from "../protocol/types.js";
import type { TakeOptions } from "../lib/queue/index.js";

// ── Session States ──────────────────────────────────────────────────

export const SessionState = {
	/** Socket open, nothing exchanged yet */
	Connecting: "connecting",
	/** Waiting for (server) or awaiting a reply to (client) the auth frame */
	Authenticating: "authenticating",
	/** Authenticated; signals, responses and heartbeats flow */
	Active: "active",
	/** Terminal */
	Closed: "closed",
} as const;

export type SessionState = (typeof SessionState)[keyof typeof SessionState];

export const SessionRole = {
	/** Accepted by a listener: the signal server or the relay's local side */
	Server: "server",
	/** Initiated by the relay towards the upstream server */
	Client: "client",
} as const;

export type SessionRole = (typeof SessionRole)[keyof typeof SessionRole];

export const CloseReason = {
	PeerClosed: "peer_closed",
	IdleTimeout: "idle_timeout",
	AuthFailed: "auth_failed",
	AuthTimeout: "auth_timeout",
	ProtocolError: "protocol_error",
	WriteFailed: "write_failed",
	UpstreamFailed: "upstream_failed",
	Shutdown: "shutdown",
} as const;

export type CloseReason = (typeof CloseReason)[keyof typeof CloseReason];

// ── Transitions ─────────────────────────────────────────────────────

export type SessionTransition =
	| { readonly type: "connected" }
	| { readonly type: "authenticated" }
	| { readonly type: "close"; readonly reason: CloseReason };

export interface SessionSnapshot {
	readonly state: SessionState;
	readonly enteredAt: number;
	readonly closeReason: CloseReason | null;
}

export const SessionErrorKind = {
	InvalidTransition: "invalid_transition",
	AlreadyClosed: "already_closed",
} as const;

export type SessionErrorKind = (typeof SessionErrorKind)[keyof typeof SessionErrorKind];

export interface SessionStateError {
	readonly kind: SessionErrorKind;
	readonly message: string;
	readonly from: SessionState;
	readonly transition: SessionTransition["type"];
}

// ── Observation ─────────────────────────────────────────────────────

export type SessionEvents = {
	state: (change: { readonly from: SessionState; readonly to: SessionState }) => void;
	frame_in: (envelope: Envelope) => void;
	frame_out: (envelope: Envelope) => void;
	closed: (reason: CloseReason) => void;
};

// ── Outbound work for a client session ──────────────────────────────

/** Something that carries an envelope to send upstream. */
export interface OutboundItem {
	readonly envelope: Envelope;
}

/** Where a client session's send loop pulls its work from. */
export interface OutboundSource<T extends OutboundItem> {
	take(options: TakeOptions): Promise<T | null>;
	/** Put an item that could not be written back at the head. */
	requeue(item: T): void;
}
