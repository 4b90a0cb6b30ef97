/**
 * Relay types: queued work, overflow policy, status and events.
 */

import type { Envelope } from "../protocol/types.js";
import type { CloseReason, OutboundItem } from "../session/types.js";
import type { RelayError } from "../shared/errors.js";
import type { ClientMsgId, SessionId } from "../shared/identifiers.js";

/** What happens when a producer offers a message to a full outbound queue. */
export const OverflowPolicy = {
	/** Refuse the new message; the producer gets an error and may re-send. */
	Reject: "reject",
	/** Evict the oldest queued message; its producer gets an error. */
	DropOldest: "drop_oldest",
} as const;

export type OverflowPolicy = (typeof OverflowPolicy)[keyof typeof OverflowPolicy];

/** A local producer's message waiting for the upstream link. */
export interface RelayItem extends OutboundItem {
	readonly owner: SessionId;
	readonly msgId: ClientMsgId | null;
	readonly enqueuedAtMs: number;
}

export interface RelayStatus {
	readonly upstreamConnected: boolean;
	readonly queueDepth: number;
	readonly localSessions: number;
	readonly pendingCorrelations: number;
	readonly consecutiveFailures: number;
}

export type RelayEvents = {
	listening: (port: number) => void;
	local_opened: (id: SessionId, peer: string) => void;
	local_closed: (id: SessionId, reason: CloseReason, purged: number) => void;
	upstream_connected: () => void;
	upstream_disconnected: (error: RelayError | null, retryInMs: number) => void;
	forwarded: (item: RelayItem) => void;
	routed: (owner: SessionId, response: Envelope) => void;
	/** A response nobody is waiting for: no id, an unknown id, or a closed owner. */
	unrouted: (response: Envelope) => void;
	evicted: (item: RelayItem) => void;
};
