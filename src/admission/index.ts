export { AdmissionController, DEFAULT_ADMISSION_CONFIG } from "./admission-controller.js";
export { DailyCapCheck } from "./checks/daily-cap.js";
export { MinIntervalCheck } from "./checks/min-interval.js";
export { PAUSED_REASON, PausedCheck } from "./checks/paused.js";
export { TradingHoursCheck } from "./checks/trading-hours.js";
export { formatTimeOfDay, parseTimeOfDay, utcDate, utcTimeOfDay } from "./time-of-day.js";
export { accept, isAccepted, reject } from "./types.js";
export type {
	AdmissionCheck,
	AdmissionConfig,
	AdmissionContext,
	AdmissionVerdict,
	TradingHours,
} from "./types.js";
