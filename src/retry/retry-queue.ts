/**
 * RetryQueue — background re-processing of transiently failed signals.
 *
 * A single worker drains a FIFO. Each item is checked for staleness when it
 * is dequeued, then handed to the attempt function. A failed attempt goes to
 * the back of the queue after a fixed delay until the attempt limit is hit,
 * or at once on a non-retryable error such as an unknown signal id. Stale
 * and exhausted items are reported to operators and dropped.
 *
 * @example
 * ```ts
 * const queue = new RetryQueue((signal) => processor.retry(signal), { reporter, notifier });
 * queue.start();
 * queue.enqueue(signal);
 * await queue.stop();
 * ```
 */

import { TypedEmitter } from "../lib/events/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { AsyncQueue } from "../lib/queue/index.js";
import { signalToWire } from "../protocol/envelope.js";
import type { SignalRequest } from "../protocol/types.js";
import { ReportKind } from "../server/types.js";
import type { Notifier, Reporter } from "../server/types.js";
import { ErrorCategory, classifyError } from "../shared/errors.js";
import type { RelayError } from "../shared/errors.js";
import { err } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock, sleep } from "../shared/time.js";
import { RetryDisposition } from "./types.js";
import type { RetryConfig, RetryEvents, RetryItem, RetryOutcome } from "./types.js";

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
	stalenessMs: 3 * 60_000,
	maxRetries: 5,
	retryDelayMs: 10_000,
};

/** Makes one attempt. May resolve an error result or throw; both count as a failed attempt. */
export type RetryAttempt = (signal: SignalRequest) => Promise<Result<RetryOutcome, RelayError>>;

export interface RetryQueueDeps {
	readonly reporter: Reporter;
	readonly notifier: Notifier;
	readonly logger?: Logger;
	readonly clock?: Clock;
}

const STOP = Symbol("stop");

export class RetryQueue {
	readonly events = new TypedEmitter<RetryEvents>((event, e) => {
		this.logger.warn({ event, err: e instanceof Error ? e.message : String(e) }, "Retry listener threw");
	});
	private readonly queue = new AsyncQueue<RetryItem | typeof STOP>();
	private readonly config: RetryConfig;
	private readonly reporter: Reporter;
	private readonly notifier: Notifier;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private worker: Promise<void> | null = null;
	private stopping: AbortController | null = null;
	private nextId = 1;
	private current: RetryItem | null = null;

	constructor(
		private readonly attempt: RetryAttempt,
		deps: RetryQueueDeps,
		config: Partial<RetryConfig> = {},
	) {
		this.config = { ...DEFAULT_RETRY_CONFIG, ...config };
		this.reporter = deps.reporter;
		this.notifier = deps.notifier;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "retry-queue" });
		this.clock = deps.clock ?? SystemClock;
	}

	get running(): boolean {
		return this.worker !== null;
	}

	/** Items waiting, not counting the one in progress. */
	get size(): number {
		return this.queue.size;
	}

	get inProgress(): RetryItem | null {
		return this.current;
	}

	/** Adds a signal for background retry. Non-blocking. */
	enqueue(signal: SignalRequest): RetryItem {
		const item: RetryItem = {
			id: this.nextId++,
			signal,
			enqueuedAtMs: this.clock.now(),
			attempt: 1,
			disposition: RetryDisposition.Pending,
			lastError: null,
		};
		this.queue.put(item);
		this.logger.info({ item: item.id, symbol: signal.symbol, action: signal.action }, "Signal queued for retry");
		this.events.emit("enqueued", item);
		return item;
	}

	start(): void {
		if (this.worker !== null) return;
		this.stopping = new AbortController();
		this.worker = this.work(this.stopping.signal);
		this.logger.info("Retry worker started");
	}

	/** Lets the in-progress item finish, then stops the worker. Queued items stay queued. */
	async stop(): Promise<void> {
		const worker = this.worker;
		if (worker === null) return;
		this.stopping?.abort();
		this.queue.put(STOP);
		await worker;
		this.worker = null;
		this.stopping = null;
		this.dropSentinels();
		if (this.queue.size > 0) {
			this.logger.warn({ pending: this.queue.size }, "Retry worker stopped with items pending");
		} else {
			this.logger.info("Retry worker stopped");
		}
	}

	private async work(stop: AbortSignal): Promise<void> {
		for (;;) {
			const next = await this.queue.take();
			if (next === STOP || stop.aborted) {
				if (next !== null && next !== STOP) this.queue.putFront(next);
				return;
			}
			if (next === null) continue;
			this.current = next;
			await this.process(next, stop);
			this.current = null;
		}
	}

	private async process(item: RetryItem, stop: AbortSignal): Promise<void> {
		const ageMs = this.clock.now() - item.enqueuedAtMs;
		if (ageMs > this.config.stalenessMs) {
			await this.discard(item, RetryDisposition.Stale);
			return;
		}

		const outcome = await this.tryAttempt(item.signal);
		if (outcome.ok) {
			item.disposition =
				outcome.value.type === "processed" ? RetryDisposition.Succeeded : RetryDisposition.Rejected;
			this.logger.info(
				{ item: item.id, attempt: item.attempt, outcome: outcome.value.type },
				outcome.value.type === "processed" ? outcome.value.message : outcome.value.reason,
			);
			this.events.emit("succeeded", item, outcome.value);
			return;
		}

		item.lastError = outcome.error;
		this.logger.warn(
			{ item: item.id, attempt: item.attempt, err: outcome.error.message },
			"Retry attempt failed",
		);
		this.events.emit("attempt_failed", item, outcome.error);

		if (item.attempt >= this.config.maxRetries || outcome.error.category === ErrorCategory.NonRetryable) {
			await this.discard(item, RetryDisposition.Exhausted);
			return;
		}

		item.attempt += 1;
		await sleep(this.config.retryDelayMs, stop);
		this.queue.put(item);
	}

	private async tryAttempt(signal: SignalRequest): Promise<Result<RetryOutcome, RelayError>> {
		try {
			return await this.attempt(signal);
		} catch (e) {
			return err(classifyError(e));
		}
	}

	private async discard(item: RetryItem, disposition: RetryDisposition): Promise<void> {
		item.disposition = disposition;
		const wire = JSON.stringify(signalToWire(item.signal));
		const { symbol } = item.signal;

		if (disposition === RetryDisposition.Stale) {
			const minutes = Math.round(this.config.stalenessMs / 60_000);
			this.logger.warn({ item: item.id, symbol }, "Discarding stale signal");
			await this.bestEffort("report", () =>
				this.reporter.report(
					ReportKind.StaleSignal,
					`Signal ${wire} discarded as stale after ${minutes} minutes.`,
				),
			);
			await this.bestEffort("notify", () =>
				this.notifier.notify(`A stale signal for ${symbol} was discarded.`),
			);
		} else {
			const reason = item.lastError?.message ?? "unknown error";
			this.logger.error({ item: item.id, symbol, attempts: item.attempt }, "Giving up on signal");
			await this.bestEffort("report", () =>
				this.reporter.report(
					ReportKind.RetryFailure,
					`Signal ${wire} discarded after ${item.attempt} failed attempts: ${reason}`,
				),
			);
			await this.bestEffort("notify", () =>
				this.notifier.notify(`A signal for ${symbol} failed after ${item.attempt} attempts.`),
			);
		}
		this.events.emit("discarded", item);
	}

	private async bestEffort(what: string, fn: () => Promise<void>): Promise<void> {
		try {
			await fn();
		} catch (e) {
			this.logger.error({ err: e instanceof Error ? e.message : String(e) }, `Retry ${what} failed`);
		}
	}

	private dropSentinels(): void {
		const rest = this.queue.drain().filter((x): x is RetryItem => x !== STOP);
		for (const item of rest) this.queue.put(item);
	}
}
