/**
 * Retry queue types.
 */

import type { SignalRequest } from "../protocol/types.js";
import type { RelayError } from "../shared/errors.js";

export const RetryDisposition = {
	Pending: "pending",
	Succeeded: "succeeded",
	Rejected: "rejected",
	Stale: "stale",
	Exhausted: "exhausted",
} as const;

export type RetryDisposition = (typeof RetryDisposition)[keyof typeof RetryDisposition];

/** A signal that failed transiently, waiting for another attempt. */
export interface RetryItem {
	readonly id: number;
	readonly signal: SignalRequest;
	readonly enqueuedAtMs: number;
	/** Number of the attempt about to be made, starting at 1. */
	attempt: number;
	disposition: RetryDisposition;
	lastError: RelayError | null;
}

/** What an attempt produced when it did not fail. */
export type RetryOutcome =
	| { readonly type: "processed"; readonly message: string }
	| { readonly type: "rejected"; readonly reason: string };

export interface RetryConfig {
	/** Items older than this when dequeued are discarded. */
	readonly stalenessMs: number;
	readonly maxRetries: number;
	readonly retryDelayMs: number;
}

export type RetryEvents = {
	enqueued: (item: RetryItem) => void;
	attempt_failed: (item: RetryItem, error: RelayError) => void;
	succeeded: (item: RetryItem, outcome: RetryOutcome) => void;
	discarded: (item: RetryItem) => void;
};
