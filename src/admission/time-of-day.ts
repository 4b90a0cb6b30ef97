/**
 * UTC time-of-day helpers. A time of day is milliseconds since midnight.
 */

const MS_PER_DAY = 86_400_000;
const PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;

/** Parse "HH:MM" or "HH:MM:SS". Returns null for anything else. */
export function parseTimeOfDay(text: string): number | null {
	const match = PATTERN.exec(text.trim());
	if (match === null) return null;
	const hours = Number(match[1]);
	const minutes = Number(match[2]);
	const seconds = match[3] === undefined ? 0 : Number(match[3]);
	if (hours > 23 || minutes > 59 || seconds > 59) return null;
	return ((hours * 60 + minutes) * 60 + seconds) * 1_000;
}

/** "HH:MM:SS", dropping milliseconds. */
export function formatTimeOfDay(ms: number): string {
	const totalSeconds = Math.floor(ms / 1_000);
	const hours = Math.floor(totalSeconds / 3_600);
	const minutes = Math.floor((totalSeconds % 3_600) / 60);
	const seconds = totalSeconds % 60;
	return [hours, minutes, seconds].map((n) => String(n).padStart(2, "0")).join(":");
}

/** Time of day in UTC for an epoch timestamp. */
export function utcTimeOfDay(epochMs: number): number {
	return ((epochMs % MS_PER_DAY) + MS_PER_DAY) % MS_PER_DAY;
}

/** "YYYY-MM-DD" in UTC for an epoch timestamp. */
export function utcDate(epochMs: number): string {
	return new Date(epochMs).toISOString().slice(0, 10);
}
