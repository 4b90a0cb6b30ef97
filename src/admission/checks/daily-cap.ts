import type { AdmissionCheck, AdmissionContext, AdmissionVerdict } from "../types.js";
import { accept, reject } from "../types.js";

/** Caps BUY and SELL signals per UTC day. A cap of 0 means unlimited. */
export class DailyCapCheck implements AdmissionCheck {
	readonly name = "DailyCap";

	private constructor(private readonly cap: number) {}

	static create(cap: number): DailyCapCheck {
		return new DailyCapCheck(cap);
	}

	get limited(): boolean {
		return this.cap > 0;
	}

	check(ctx: AdmissionContext): AdmissionVerdict {
		if (!this.limited || ctx.todayCount < this.cap) return accept();
		return reject(this.name, `Daily signal limit of ${this.cap} has been reached.`);
	}
}
