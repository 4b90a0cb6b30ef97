/**
 * FileReportSink — JSONL file of operator reports.
 *
 * Appends one JSON object per line. Writes are serialised through a promise
 * chain so lines never interleave. restore() reads reports back and lists
 * corrupt lines separately.
 */

import { appendFile, readFile, rename, stat } from "node:fs/promises";
import type { Report, ReportKind, Reporter } from "../server/types.js";
import { ReportKind as Kinds } from "../server/types.js";
import { tryCatch } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

export interface FileReportSinkConfig {
	readonly filePath: string;
	/** Rotate to `<file>.1` once the file reaches this size. */
	readonly maxFileSizeBytes?: number;
	/** Rotated files kept; defaults to 5 when rotation is on. */
	readonly maxFiles?: number;
	readonly clock?: Clock;
}

/** A line that could not be read back as a report. */
export interface CorruptLine {
	readonly lineNumber: number;
	readonly raw: string;
}

export interface RestoreResult {
	readonly reports: readonly Report[];
	readonly corruptLines: readonly CorruptLine[];
}

const MAX_WRITE_ERRORS = 10;

export class FileReportSink implements Reporter {
	private readonly config: FileReportSinkConfig;
	private readonly clock: Clock;
	private closed = false;
	private writeQueue: Promise<void> = Promise.resolve();
	private readonly recentErrors: Error[] = [];

	private constructor(config: FileReportSinkConfig) {
		this.config = config;
		this.clock = config.clock ?? SystemClock;
	}

	static create(config: FileReportSinkConfig): FileReportSink {
		return new FileReportSink(config);
	}

	get filePath(): string {
		return this.config.filePath;
	}

	private get maxFiles(): number {
		if (this.config.maxFiles !== undefined) return this.config.maxFiles;
		return this.config.maxFileSizeBytes !== undefined ? 5 : 0;
	}

	async report(kind: ReportKind, details: string): Promise<void> {
		if (this.closed) {
			throw new Error("FileReportSink is closed");
		}
		const line = `${JSON.stringify({ kind, details, createdAt: new Date(this.clock.now()).toISOString() })}\n`;
		const write = (): Promise<void> => this.writeOnce(line);
		// Each write runs after the previous one settles, whatever its outcome.
		this.writeQueue = this.writeQueue.then(write, write);
		await this.writeQueue;
	}

	async restore(): Promise<RestoreResult> {
		let content: string;
		try {
			content = await readFile(this.filePath, "utf-8");
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") {
				return { reports: [], corruptLines: [] };
			}
			throw e;
		}

		const reports: Report[] = [];
		const corruptLines: CorruptLine[] = [];
		const lines = content.split("\n");
		for (let i = 0; i < lines.length; i++) {
			const trimmed = lines[i]?.trim() ?? "";
			if (trimmed.length === 0) continue;
			const report = parseReport(trimmed);
			if (report === null) {
				corruptLines.push({ lineNumber: i + 1, raw: trimmed.slice(0, 200) });
			} else {
				reports.push(report);
			}
		}
		return { reports, corruptLines };
	}

	/** Waits for queued writes; their failures were already reported to the callers. */
	async flush(): Promise<void> {
		await Promise.allSettled([this.writeQueue]);
	}

	async close(): Promise<void> {
		this.closed = true;
		await this.flush();
	}

	/** The most recent write failures, oldest first. */
	writeErrors(): readonly Error[] {
		return this.recentErrors;
	}

	private async writeOnce(line: string): Promise<void> {
		try {
			if (this.config.maxFileSizeBytes !== undefined && this.config.maxFileSizeBytes > 0) {
				await this.rotateIfNeeded(this.config.maxFileSizeBytes);
			}
			await appendFile(this.filePath, line, "utf-8");
		} catch (e: unknown) {
			const code = isNodeError(e) ? e.code : "UNKNOWN";
			const msg = e instanceof Error ? e.message : String(e);
			const error = new Error(`Report write to ${this.filePath} failed: [${code}] ${msg}`, { cause: e });
			this.recentErrors.push(error);
			if (this.recentErrors.length > MAX_WRITE_ERRORS) {
				this.recentErrors.shift();
			}
			throw error;
		}
	}

	private async rotateIfNeeded(maxSize: number): Promise<void> {
		try {
			const stats = await stat(this.filePath);
			if (stats.size < maxSize) return;
		} catch (e: unknown) {
			if (isNodeError(e) && e.code === "ENOENT") return;
			throw e;
		}

		for (let i = this.maxFiles - 1; i >= 1; i--) {
			await renameIfExists(`${this.filePath}.${i}`, `${this.filePath}.${i + 1}`);
		}
		await renameIfExists(this.filePath, `${this.filePath}.1`);
	}
}

async function renameIfExists(src: string, dst: string): Promise<void> {
	try {
		await rename(src, dst);
	} catch (e: unknown) {
		if (!isNodeError(e) || e.code !== "ENOENT") throw e;
	}
}

function parseReport(line: string): Report | null {
	const parsed = tryCatch((): unknown => JSON.parse(line));
	if (!parsed.ok) return null;
	const value = parsed.value;
	if (typeof value !== "object" || value === null) return null;
	const kind: unknown = Reflect.get(value, "kind");
	const details: unknown = Reflect.get(value, "details");
	const createdAt: unknown = Reflect.get(value, "createdAt");
	if (kind !== Kinds.StaleSignal && kind !== Kinds.RetryFailure) return null;
	if (typeof details !== "string" || typeof createdAt !== "string") return null;
	const createdAtMs = Date.parse(createdAt);
	if (Number.isNaN(createdAtMs)) return null;
	return { kind, details, createdAtMs };
}

function isNodeError(e: unknown): e is NodeJS.ErrnoException {
	return e instanceof Error && "code" in e;
}
