import { formatTimeOfDay, utcTimeOfDay } from "../time-of-day.js";
import type { AdmissionCheck, AdmissionContext, AdmissionVerdict, TradingHours } from "../types.js";
import { accept, reject } from "../types.js";

/**
 * Accepts only inside a UTC window, boundaries included. A window whose
 * start is after its end spans midnight.
 *
 * @example
 * ```ts
 * const check = TradingHoursCheck.create({ startMs: 8 * 3_600_000, endMs: 17 * 3_600_000 });
 * ```
 */
export class TradingHoursCheck implements AdmissionCheck {
	readonly name = "TradingHours";

	private constructor(private readonly hours: TradingHours) {}

	static create(hours: TradingHours): TradingHoursCheck {
		return new TradingHoursCheck(hours);
	}

	contains(timeOfDayMs: number): boolean {
		const { startMs, endMs } = this.hours;
		return startMs <= endMs
			? timeOfDayMs >= startMs && timeOfDayMs <= endMs
			: timeOfDayMs >= startMs || timeOfDayMs <= endMs;
	}

	check(ctx: AdmissionContext): AdmissionVerdict {
		if (this.contains(utcTimeOfDay(ctx.nowMs))) return accept();
		const window = `${formatTimeOfDay(this.hours.startMs)} - ${formatTimeOfDay(this.hours.endMs)} UTC`;
		return reject(this.name, `Signal rejected: Outside of trading hours (${window}).`);
	}
}
