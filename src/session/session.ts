/**
 * Session — one framed, authenticated connection.
 *
 * Owns the socket's FrameStream and the lifecycle state machine. Listeners
 * on `events` observe transitions and frame traffic; a listener that throws
 * is counted and logged, and never changes the session's course.
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import type { Envelope } from "../protocol/types.js";
import { NetworkError } from "../shared/errors.js";
import type { RelayError } from "../shared/errors.js";
import { nextSessionId } from "../shared/identifiers.js";
import type { SessionId } from "../shared/identifiers.js";
import { err } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import type { FrameStream } from "./frame-stream.js";
import { SessionStateMachine } from "./state-machine.js";
import type { CloseReason, SessionEvents, SessionRole, SessionState, SessionTransition } from "./types.js";

export interface SessionDeps {
	readonly logger: Logger;
	readonly clock: Clock;
}

export abstract class Session {
	readonly id: SessionId;
	readonly events = new TypedEmitter<SessionEvents>((event, e) => {
		this.failedListeners += 1;
		this.logger.warn({ event, err: e instanceof Error ? e.message : String(e) }, "Session listener threw");
	});
	protected readonly logger: Logger;
	protected readonly clock: Clock;
	private readonly fsm: SessionStateMachine;
	private lastActivity: number;
	private failedListeners = 0;

	protected constructor(
		readonly role: SessionRole,
		protected readonly stream: FrameStream,
		deps: SessionDeps,
		idPrefix: string,
	) {
		this.id = nextSessionId(idPrefix);
		this.clock = deps.clock;
		this.fsm = new SessionStateMachine(deps.clock);
		this.lastActivity = deps.clock.now();
		this.logger = deps.logger.child({ session: this.id, role, peer: stream.peer });
	}

	get state(): SessionState {
		return this.fsm.state();
	}

	get isClosed(): boolean {
		return this.fsm.isClosed();
	}

	get closeReason(): CloseReason | null {
		return this.fsm.closeReason();
	}

	get peer(): string {
		return this.stream.peer;
	}

	/** When a frame last arrived. */
	get lastActivityAtMs(): number {
		return this.lastActivity;
	}

	/** Listener exceptions swallowed so far. */
	get listenerFailures(): number {
		return this.failedListeners;
	}

	/** Sends one envelope. Safe to call from any task; each frame is a single socket write. */
	async send(envelope: Envelope): Promise<Result<void, RelayError>> {
		if (this.isClosed) {
			return err(new NetworkError(`Session ${this.id} is closed`));
		}
		const result = await this.stream.write(envelope);
		if (result.ok) {
			this.events.emit("frame_out", envelope);
		} else {
			this.logger.warn({ err: result.error.message }, "Write failed");
		}
		return result;
	}

	/** Closes the session once. Returns false when it was already closed. */
	close(reason: CloseReason): boolean {
		const from = this.fsm.state();
		const result = this.fsm.transition({ type: "close", reason });
		if (!result.ok) return false;
		this.stream.close();
		this.logger.info({ reason }, "Session closed");
		this.events.emit("state", { from, to: result.value });
		this.events.emit("closed", reason);
		return true;
	}

	/** Resolves once the socket is fully released. */
	whenSocketClosed(): Promise<void> {
		return this.stream.closed();
	}

	protected advance(transition: SessionTransition): boolean {
		const from = this.fsm.state();
		const result = this.fsm.transition(transition);
		if (!result.ok) {
			this.logger.warn({ from, transition: transition.type }, result.error.message);
			return false;
		}
		this.logger.debug({ from, to: result.value }, "Session state changed");
		this.events.emit("state", { from, to: result.value });
		return true;
	}

	protected received(envelope: Envelope): void {
		this.lastActivity = this.clock.now();
		this.events.emit("frame_in", envelope);
	}
}
