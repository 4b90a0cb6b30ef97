/**
 * MemoryReportSink — keeps operator reports in an array.
 */

import type { Report, ReportKind, Reporter } from "../server/types.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

export interface MemoryReportSinkConfig {
	readonly maxReports?: number;
	readonly clock?: Clock;
}

export class MemoryReportSink implements Reporter {
	private readonly store: Report[] = [];
	private readonly maxReports: number;
	private readonly clock: Clock;

	constructor(config?: MemoryReportSinkConfig) {
		this.maxReports = config?.maxReports ?? Number.POSITIVE_INFINITY;
		this.clock = config?.clock ?? SystemClock;
	}

	async report(kind: ReportKind, details: string): Promise<void> {
		this.store.push({ kind, details, createdAtMs: this.clock.now() });
		const excess = this.store.length - this.maxReports;
		if (excess > 0) {
			this.store.splice(0, excess);
		}
	}

	/** Shallow copy, oldest first. */
	reports(): Report[] {
		return [...this.store];
	}

	ofKind(kind: ReportKind): Report[] {
		return this.store.filter((r) => r.kind === kind);
	}

	clear(): void {
		this.store.length = 0;
	}

	get size(): number {
		return this.store.length;
	}
}
