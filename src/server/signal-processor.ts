/**
 * SignalProcessor — the server's business step for one signal.
 *
 * Validates, applies admission to BUY and SELL, then stores the signal (or
 * closes the referenced one) through a connection opened for this unit of
 * work alone. A retryable failure parks the signal on the RetryQueue, which
 * later calls back into `retry()` and runs the same steps.
 */

import { AdmissionController, DEFAULT_ADMISSION_CONFIG } from "../admission/admission-controller.js";
import type { AdmissionConfig, AdmissionVerdict } from "../admission/types.js";
import type { LibDecimal } from "../lib/decimal/index.js";
import type { Logger } from "../lib/logger/index.js";
import { silentLogger } from "../lib/logger/index.js";
import { ValidationError } from "../lib/validation/index.js";
import { parseSignal } from "../protocol/envelope.js";
import {
	INTERNAL_ERROR_MESSAGE,
	SignalAction,
	errorResponse,
	queuedResponse,
	successResponse,
	withCorrelation,
} from "../protocol/types.js";
import type { Envelope, ResponseEnvelope, SignalRequest } from "../protocol/types.js";
import { RetryQueue } from "../retry/retry-queue.js";
import type { RetryConfig, RetryOutcome } from "../retry/types.js";
import { RelayError, SignalNotFoundError, StoreUnavailableError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";
import { formatClosedMessage, formatOpenedMessage } from "./messages.js";
import type {
	Notifier,
	OpenAction,
	Reporter,
	SignalStore,
	SignalStoreConnection,
	TodayStats,
} from "./types.js";

export interface SignalProcessorDeps {
	readonly store: SignalStore;
	readonly notifier: Notifier;
	readonly reporter: Reporter;
	readonly logger?: Logger;
	readonly clock?: Clock;
}

export interface SignalProcessorConfig {
	readonly admission?: Partial<AdmissionConfig>;
	readonly retry?: Partial<RetryConfig>;
}

type Execution =
	| { readonly type: "opened"; readonly action: OpenAction; readonly signalId: number }
	| { readonly type: "closed"; readonly signalId: number; readonly pnl: LibDecimal }
	| { readonly type: "rejected"; readonly reason: string };

export const QUEUED_FOR_RETRY_MESSAGE = "Signal queued for retry";

export class SignalProcessor {
	readonly retryQueue: RetryQueue;
	private readonly admission: AdmissionController;
	private readonly admissionConfig: AdmissionConfig;
	private readonly store: SignalStore;
	private readonly notifier: Notifier;
	private readonly logger: Logger;
	private readonly clock: Clock;
	private lastAccepted: number | null = null;
	private admissionChain: Promise<void> = Promise.resolve();

	constructor(deps: SignalProcessorDeps, config: SignalProcessorConfig = {}) {
		this.store = deps.store;
		this.notifier = deps.notifier;
		this.clock = deps.clock ?? SystemClock;
		this.logger = (deps.logger ?? silentLogger()).child({ component: "signal-processor" });
		this.admissionConfig = { ...DEFAULT_ADMISSION_CONFIG, ...config.admission };
		this.admission = AdmissionController.fromConfig(this.admissionConfig);
		this.retryQueue = new RetryQueue(
			(signal) => this.retry(signal),
			{ reporter: deps.reporter, notifier: deps.notifier, logger: this.logger, clock: this.clock },
			config.retry,
		);
	}

	/** When the last BUY or SELL was accepted, process-wide. */
	get lastAcceptedAtMs(): number | null {
		return this.lastAccepted;
	}

	/** Handles one signal envelope and returns the reply for its producer. */
	async handle(envelope: Envelope): Promise<ResponseEnvelope> {
		const parsed = parseSignal(envelope);
		if (!parsed.ok) {
			this.logger.warn({ issues: parsed.error.issues }, "Invalid signal");
			return withCorrelation(errorResponse(parsed.error.firstMessage()), envelope);
		}
		const signal = parsed.value;
		this.logger.info({ action: signal.action, symbol: signal.symbol, price: signal.price }, "Signal received");

		const result = await this.execute(signal);
		return withCorrelation(this.toResponse(signal, result), envelope);
	}

	/** One attempt from the retry queue. An admission rejection ends the item. */
	async retry(signal: SignalRequest): Promise<Result<RetryOutcome, RelayError>> {
		const result = await this.execute(signal);
		if (!result.ok) return result;
		const outcome = result.value;
		switch (outcome.type) {
			case "rejected":
				return ok({ type: "rejected", reason: outcome.reason });
			case "opened":
				return ok({ type: "processed", message: openedMessage(outcome.action) });
			case "closed":
				return ok({ type: "processed", message: closedMessage(outcome.signalId) });
		}
	}

	/** Admin switch: pause or resume acceptance of new BUY and SELL signals. */
	async setActive(active: boolean): Promise<Result<void, RelayError>> {
		return this.withConnection((conn) => storeCall(() => conn.setBotActive(active)));
	}

	private toResponse(signal: SignalRequest, result: Result<Execution, RelayError>): ResponseEnvelope {
		if (result.ok) {
			const outcome = result.value;
			switch (outcome.type) {
				case "opened":
					return successResponse(openedMessage(outcome.action), { signalId: outcome.signalId });
				case "closed":
					return successResponse(closedMessage(outcome.signalId), { signalId: outcome.signalId });
				case "rejected":
					this.logger.info({ symbol: signal.symbol }, outcome.reason);
					return errorResponse(outcome.reason);
			}
		}

		const error = result.error;
		if (error.isRetryable) {
			this.logger.warn({ err: error.message, symbol: signal.symbol }, "Transient failure, queueing for retry");
			this.retryQueue.enqueue(signal);
			return queuedResponse(QUEUED_FOR_RETRY_MESSAGE);
		}
		if (error instanceof SignalNotFoundError || error instanceof ValidationError) {
			this.logger.warn({ err: error.message }, "Signal refused");
			return errorResponse(error.message);
		}
		this.logger.error({ err: error.message, code: error.code }, "Signal processing failed");
		return errorResponse(INTERNAL_ERROR_MESSAGE);
	}

	private execute(signal: SignalRequest): Promise<Result<Execution, RelayError>> {
		const { action } = signal;
		return this.withConnection((conn) =>
			action === SignalAction.Close ? this.closeSignal(conn, signal) : this.openSignal(conn, signal, action),
		);
	}

	private async openSignal(
		conn: SignalStoreConnection,
		signal: SignalRequest,
		action: OpenAction,
	): Promise<Result<Execution, RelayError>> {
		const committed = await this.oneAtATime(() => this.admitAndSave(conn, signal, action));
		if (!committed.ok || committed.value.type !== "opened") return committed;

		const { signalId } = committed.value;
		await this.notify(conn, (stats) =>
			formatOpenedMessage(
				{ action, symbol: signal.symbol, price: signal.price, signalId },
				stats,
				this.admissionConfig.dailyCap,
				this.clock.now(),
			),
		);
		return committed;
	}

	/** Admission, save and the accepted timestamp, with no other BUY or SELL in between. */
	private async admitAndSave(
		conn: SignalStoreConnection,
		signal: SignalRequest,
		action: OpenAction,
	): Promise<Result<Execution, RelayError>> {
		const verdict = await this.admit(conn);
		if (!verdict.ok) return verdict;
		if (verdict.value.type === "reject") {
			return ok({ type: "rejected", reason: verdict.value.reason });
		}

		const saved = await storeCall(() =>
			conn.saveSignal({
				action,
				symbol: signal.symbol,
				price: signal.price,
				...(signal.sl !== undefined && { sl: signal.sl }),
				...(signal.tp1 !== undefined && { tp1: signal.tp1 }),
				...(signal.tp2 !== undefined && { tp2: signal.tp2 }),
				...(signal.tp3 !== undefined && { tp3: signal.tp3 }),
				...(signal.atr !== undefined && { atr: signal.atr }),
			}),
		);
		if (!saved.ok) return saved;

		const signalId = saved.value;
		this.lastAccepted = this.clock.now();
		this.logger.info({ signalId, action, symbol: signal.symbol }, "Signal stored");
		return ok({ type: "opened", action, signalId });
	}

	private oneAtATime<T>(task: () => Promise<T>): Promise<T> {
		const run = this.admissionChain.then(task);
		// The caller observes a failure through `run`; the chain only orders tasks.
		this.admissionChain = run.then(
			() => undefined,
			() => undefined,
		);
		return run;
	}

	private async closeSignal(
		conn: SignalStoreConnection,
		signal: SignalRequest,
	): Promise<Result<Execution, RelayError>> {
		const signalId = signal.openSignalId;
		if (signalId === undefined) {
			return err(
				new ValidationError("open_signal_id is required for CLOSE action", [
					{ path: ["open_signal_id"], message: "open_signal_id is required for CLOSE action" },
				]),
			);
		}

		const closed = await storeCall(() => conn.closeSignal(signalId, signal.price));
		if (!closed.ok) return closed;

		const pnl = closed.value;
		this.logger.info({ signalId, pnl: pnl.toString() }, "Signal closed");
		await this.notify(conn, (stats) =>
			formatClosedMessage(
				{ symbol: signal.symbol, closePrice: signal.price, signalId, pnl },
				stats,
				this.admissionConfig.dailyCap,
			),
		);
		return ok({ type: "closed", signalId, pnl });
	}

	private async admit(conn: SignalStoreConnection): Promise<Result<AdmissionVerdict, RelayError>> {
		const active = await storeCall(() => conn.getBotActive());
		if (!active.ok) return active;
		let todayCount = 0;
		if (this.admission.needsDailyCount()) {
			const count = await storeCall(() => conn.getTodayCount());
			if (!count.ok) return count;
			todayCount = count.value;
		}
		return ok(
			this.admission.canAccept({
				nowMs: this.clock.now(),
				active: active.value,
				lastAcceptedAtMs: this.lastAccepted,
				todayCount,
			}),
		);
	}

	/** Best effort: a failed notification is logged and never fails the signal. */
	private async notify(
		conn: SignalStoreConnection,
		compose: (stats: TodayStats) => string,
	): Promise<void> {
		try {
			const stats = await conn.getTodayStats();
			await this.notifier.notify(compose(stats));
		} catch (e) {
			this.logger.warn({ err: e instanceof Error ? e.message : String(e) }, "Notification failed");
		}
	}

	private async withConnection<T>(
		work: (conn: SignalStoreConnection) => Promise<Result<T, RelayError>>,
	): Promise<Result<T, RelayError>> {
		const connected = await storeCall(() => this.store.connect());
		if (!connected.ok) return connected;
		const conn = connected.value;
		try {
			return await work(conn);
		} finally {
			try {
				await conn.close();
			} catch (e) {
				this.logger.warn({ err: e instanceof Error ? e.message : String(e) }, "Store connection close failed");
			}
		}
	}
}

function openedMessage(action: OpenAction): string {
	return `Signal ${action} processed successfully`;
}

function closedMessage(signalId: number): string {
	return `Close signal for #${signalId} processed successfully`;
}

/** Runs a store call; foreign failures count as the store being unavailable. */
async function storeCall<T>(fn: () => Promise<T>): Promise<Result<T, RelayError>> {
	try {
		return ok(await fn());
	} catch (e) {
		if (e instanceof RelayError) return err(e);
		const message = e instanceof Error ? e.message : String(e);
		return err(new StoreUnavailableError(`Signal store failed: ${message}`, { cause: e }));
	}
}
