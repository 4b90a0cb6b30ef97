import type { AdmissionCheck, AdmissionContext, AdmissionVerdict } from "../types.js";
import { accept, reject } from "../types.js";

export const PAUSED_REASON = "Bot is currently paused by an admin.";

/** Rejects every new signal while the admin switch is off. */
export class PausedCheck implements AdmissionCheck {
	readonly name = "Paused";

	check(ctx: AdmissionContext): AdmissionVerdict {
		return ctx.active ? accept() : reject(this.name, PAUSED_REASON);
	}
}
