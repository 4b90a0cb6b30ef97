/**
 * Admission types.
 *
 * A check sees a snapshot of the process-wide state that decides whether a
 * new BUY or SELL may proceed. Checks never mutate anything.
 */

// ── Verdict ─────────────────────────────────────────────────────────

export type AdmissionVerdict =
	| { readonly type: "accept" }
	| {
			readonly type: "reject";
			readonly check: string;
			readonly reason: string;
			/** How long until this check could pass, where that is knowable. */
			readonly retryAfterMs?: number | undefined;
	  };

export function accept(): AdmissionVerdict {
	return { type: "accept" };
}

export function reject(check: string, reason: string, retryAfterMs?: number): AdmissionVerdict {
	return { type: "reject", check, reason, retryAfterMs };
}

export function isAccepted(verdict: AdmissionVerdict): verdict is { readonly type: "accept" } {
	return verdict.type === "accept";
}

// ── Context ─────────────────────────────────────────────────────────

export interface AdmissionContext {
	readonly nowMs: number;
	/** Admin switch; false pauses all new signals. */
	readonly active: boolean;
	/** When the last BUY or SELL was accepted, or null if none yet. */
	readonly lastAcceptedAtMs: number | null;
	/** BUY and SELL signals stored since UTC midnight. */
	readonly todayCount: number;
}

export interface AdmissionCheck {
	readonly name: string;
	check(ctx: AdmissionContext): AdmissionVerdict;
}

// ── Configuration ───────────────────────────────────────────────────

/** Inclusive UTC window, as milliseconds since midnight. */
export interface TradingHours {
	readonly startMs: number;
	readonly endMs: number;
}

export interface AdmissionConfig {
	/** 0 disables the cap. */
	readonly dailyCap: number;
	readonly minIntervalMs: number;
	readonly tradingHours: TradingHours | null;
}
