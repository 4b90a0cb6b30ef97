/**
 * Server-side collaborator contracts: persistence, notification, reporting.
 *
 * Implementations may throw; the SignalProcessor and RetryQueue contain
 * every failure and decide whether it is retryable.
 */

import type { LibDecimal } from "../lib/decimal/index.js";
import type { SignalAction } from "../protocol/types.js";

export type OpenAction = typeof SignalAction.Buy | typeof SignalAction.Sell;

export interface NewSignal {
	readonly action: OpenAction;
	readonly symbol: string;
	readonly price: number;
	readonly sl?: number;
	readonly tp1?: number;
	readonly tp2?: number;
	readonly tp3?: number;
	readonly atr?: number;
}

export interface StoredSignal extends NewSignal {
	readonly id: number;
	readonly createdAtMs: number;
	readonly closed: boolean;
	readonly closePrice?: number;
	readonly closedAtMs?: number;
	readonly pnl?: LibDecimal;
}

export interface TodayStats {
	readonly totalSignals: number;
	readonly buys: number;
	readonly sells: number;
	readonly closed: number;
	readonly wins: number;
	readonly losses: number;
	readonly totalPnl: LibDecimal;
}

/** One unit of work against the store. Callers close it when done. */
export interface SignalStoreConnection {
	saveSignal(signal: NewSignal): Promise<number>;
	/** Marks a signal closed and returns its P&L. Unknown ids fail with SignalNotFoundError. */
	closeSignal(signalId: number, closePrice: number): Promise<LibDecimal>;
	getTodayCount(): Promise<number>;
	getTodayStats(): Promise<TodayStats>;
	getBotActive(): Promise<boolean>;
	setBotActive(active: boolean): Promise<void>;
	close(): Promise<void>;
}

export interface SignalStore {
	connect(): Promise<SignalStoreConnection>;
}

export interface Notifier {
	notify(message: string): Promise<void>;
}

export const ReportKind = {
	StaleSignal: "STALE_SIGNAL",
	RetryFailure: "RETRY_FAILURE",
} as const;

export type ReportKind = (typeof ReportKind)[keyof typeof ReportKind];

export interface Report {
	readonly kind: ReportKind;
	readonly details: string;
	readonly createdAtMs: number;
}

export interface Reporter {
	report(kind: ReportKind, details: string): Promise<void>;
}
