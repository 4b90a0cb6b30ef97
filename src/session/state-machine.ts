/**
 * SessionStateMachine — validated connection lifecycle.
 *
 * Connecting → Authenticating → Active → Closed. Any non-closed state may
 * close; nothing leaves Closed. History is bounded for debugging.
 */

import type { Result } from "../shared/result.js";
import { err, ok } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import {
	type CloseReason,
	SessionErrorKind,
	type SessionSnapshot,
	SessionState,
	type SessionStateError,
	type SessionTransition,
} from "./types.js";

const MAX_HISTORY = 20;

interface HistoryEntry {
	readonly from: SessionState;
	readonly to: SessionState;
	readonly transition: SessionTransition["type"];
	readonly timestamp: number;
}

export class SessionStateMachine {
	private current: SessionState = SessionState.Connecting;
	private currentEnteredAt: number;
	private reason: CloseReason | null = null;
	private readonly transitions: HistoryEntry[] = [];

	constructor(private readonly clock: Clock = SystemClock) {
		this.currentEnteredAt = clock.now();
	}

	state(): SessionState {
		return this.current;
	}

	isClosed(): boolean {
		return this.current === SessionState.Closed;
	}

	closeReason(): CloseReason | null {
		return this.reason;
	}

	snapshot(): SessionSnapshot {
		return { state: this.current, enteredAt: this.currentEnteredAt, closeReason: this.reason };
	}

	history(): readonly HistoryEntry[] {
		return this.transitions;
	}

	transition(t: SessionTransition): Result<SessionState, SessionStateError> {
		const from = this.current;
		if (from === SessionState.Closed) {
			return err({
				kind: SessionErrorKind.AlreadyClosed,
				message: "Session already closed",
				from,
				transition: t.type,
			});
		}

		const next = nextState(from, t);
		if (next === null) {
			return err({
				kind: SessionErrorKind.InvalidTransition,
				message: `Cannot transition from ${from} via ${t.type}`,
				from,
				transition: t.type,
			});
		}

		if (this.transitions.length >= MAX_HISTORY) {
			this.transitions.shift();
		}
		this.transitions.push({ from, to: next, transition: t.type, timestamp: this.clock.now() });
		this.current = next;
		this.currentEnteredAt = this.clock.now();
		if (t.type === "close") this.reason = t.reason;
		return ok(next);
	}
}

function nextState(from: SessionState, t: SessionTransition): SessionState | null {
	switch (t.type) {
		case "connected":
			return from === SessionState.Connecting ? SessionState.Authenticating : null;
		case "authenticated":
			return from === SessionState.Authenticating ? SessionState.Active : null;
		case "close":
			return SessionState.Closed;
	}
}
