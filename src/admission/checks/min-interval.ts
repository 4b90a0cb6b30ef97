import type { AdmissionCheck, AdmissionContext, AdmissionVerdict } from "../types.js";
import { accept, reject } from "../types.js";

/**
 * Enforces a minimum spacing between accepted signals, across all
 * producers.
 */
export class MinIntervalCheck implements AdmissionCheck {
	readonly name = "MinInterval";

	private constructor(private readonly intervalMs: number) {}

	static create(intervalMs: number): MinIntervalCheck {
		return new MinIntervalCheck(intervalMs);
	}

	check(ctx: AdmissionContext): AdmissionVerdict {
		if (ctx.lastAcceptedAtMs === null) return accept();
		const remainingMs = this.intervalMs - (ctx.nowMs - ctx.lastAcceptedAtMs);
		if (remainingMs <= 0) return accept();
		const seconds = Math.round(remainingMs / 1_000);
		return reject(this.name, `Rate limit active. Please wait ${seconds} more seconds.`, remainingMs);
	}
}
