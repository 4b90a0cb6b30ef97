import { DailyCapCheck } from "./checks/daily-cap.js";
import { MinIntervalCheck } from "./checks/min-interval.js";
import { PausedCheck } from "./checks/paused.js";
import { TradingHoursCheck } from "./checks/trading-hours.js";
import type { AdmissionCheck, AdmissionConfig, AdmissionContext, AdmissionVerdict } from "./types.js";
import { accept } from "./types.js";

export const DEFAULT_ADMISSION_CONFIG: AdmissionConfig = {
	dailyCap: 10,
	minIntervalMs: 60_000,
	tradingHours: null,
};

/**
 * Ordered admission checks for new BUY and SELL signals.
 *
 * The first rejecting check decides; later checks are not consulted.
 * CLOSE signals never pass through here.
 *
 * @example
 * ```ts
 * const admission = AdmissionController.fromConfig({ dailyCap: 10, minIntervalMs: 60_000, tradingHours: null });
 * const verdict = admission.canAccept({ nowMs, active: true, lastAcceptedAtMs: null, todayCount: 0 });
 * ```
 */
export class AdmissionController {
	private constructor(private readonly checks: readonly AdmissionCheck[]) {}

	static create(): AdmissionController {
		return new AdmissionController([]);
	}

	/** Paused, then trading hours (when set), then minimum interval, then daily cap. */
	static fromConfig(config: AdmissionConfig): AdmissionController {
		let controller = AdmissionController.create().with(new PausedCheck());
		if (config.tradingHours !== null) {
			controller = controller.with(TradingHoursCheck.create(config.tradingHours));
		}
		return controller
			.with(MinIntervalCheck.create(config.minIntervalMs))
			.with(DailyCapCheck.create(config.dailyCap));
	}

	with(check: AdmissionCheck): AdmissionController {
		return new AdmissionController([...this.checks, check]);
	}

	/** Whether the daily count is needed at all, so callers can skip the query. */
	needsDailyCount(): boolean {
		return this.checks.some((c) => c instanceof DailyCapCheck && c.limited);
	}

	canAccept(ctx: AdmissionContext): AdmissionVerdict {
		for (const check of this.checks) {
			const verdict = check.check(ctx);
			if (verdict.type === "reject") return verdict;
		}
		return accept();
	}

	checkNames(): readonly string[] {
		return this.checks.map((c) => c.name);
	}
}
