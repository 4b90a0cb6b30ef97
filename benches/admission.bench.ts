import { bench, describe } from "vitest";
import { AdmissionController } from "../src/admission/admission-controller.js";
import { parseTimeOfDay } from "../src/admission/time-of-day.js";

const open = AdmissionController.fromConfig({ dailyCap: 10, minIntervalMs: 60_000, tradingHours: null });

describe("admission", () => {
	bench("accept 1000x", () => {
		for (let i = 0; i < 1000; i++) {
			open.canAccept({ nowMs: i * 120_000, active: true, lastAcceptedAtMs: 0, todayCount: 3 });
		}
	});

	const startMs = parseTimeOfDay("22:00");
	const endMs = parseTimeOfDay("06:00");
	if (startMs !== null && endMs !== null) {
		const overnight = AdmissionController.fromConfig({
			dailyCap: 0,
			minIntervalMs: 0,
			tradingHours: { startMs, endMs },
		});
		bench("overnight window 1000x", () => {
			for (let i = 0; i < 1000; i++) {
				overnight.canAccept({ nowMs: i * 60_000, active: true, lastAcceptedAtMs: null, todayCount: 0 });
			}
		});
	}
});
