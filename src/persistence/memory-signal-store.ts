/**
 * MemorySignalStore — in-process SignalStore.
 *
 * Every connect() hands out a fresh connection over the shared state, the
 * same unit-of-work shape a database-backed store would have. Not persisted
 * across restarts.
 */

import { utcDate } from "../admission/time-of-day.js";
import { LibDecimal } from "../lib/decimal/index.js";
import type {
	NewSignal,
	SignalStore,
	SignalStoreConnection,
	StoredSignal,
	TodayStats,
} from "../server/types.js";
import { SignalNotFoundError, StoreUnavailableError } from "../shared/errors.js";
import type { Clock } from "../shared/time.js";
import { SystemClock } from "../shared/time.js";

export interface MemorySignalStoreConfig {
	readonly clock?: Clock;
	readonly botActive?: boolean;
}

interface StoreState {
	readonly signals: Map<number, StoredSignal>;
	nextId: number;
	botActive: boolean;
}

export class MemorySignalStore implements SignalStore {
	private readonly state: StoreState;
	private readonly clock: Clock;
	private opened = 0;
	private open = 0;

	constructor(config: MemorySignalStoreConfig = {}) {
		this.clock = config.clock ?? SystemClock;
		this.state = { signals: new Map(), nextId: 1, botActive: config.botActive ?? true };
	}

	async connect(): Promise<SignalStoreConnection> {
		this.opened += 1;
		this.open += 1;
		return new MemoryConnection(this.state, this.clock, () => {
			this.open -= 1;
		});
	}

	/** Connections handed out so far. */
	get connectionsOpened(): number {
		return this.opened;
	}

	/** Connections not yet closed. */
	get openConnections(): number {
		return this.open;
	}

	signals(): readonly StoredSignal[] {
		return [...this.state.signals.values()];
	}

	get(signalId: number): StoredSignal | undefined {
		return this.state.signals.get(signalId);
	}
}

class MemoryConnection implements SignalStoreConnection {
	private closed = false;

	constructor(
		private readonly state: StoreState,
		private readonly clock: Clock,
		private readonly onClose: () => void,
	) {}

	async saveSignal(signal: NewSignal): Promise<number> {
		this.ensureOpen();
		const id = this.state.nextId;
		this.state.nextId += 1;
		this.state.signals.set(id, { ...signal, id, createdAtMs: this.clock.now(), closed: false });
		return id;
	}

	async closeSignal(signalId: number, closePrice: number): Promise<LibDecimal> {
		this.ensureOpen();
		const signal = this.state.signals.get(signalId);
		if (signal === undefined) {
			throw new SignalNotFoundError(signalId);
		}
		const open = LibDecimal.from(signal.price);
		const close = LibDecimal.from(closePrice);
		const pnl = signal.action === "BUY" ? close.sub(open) : open.sub(close);
		this.state.signals.set(signalId, {
			...signal,
			closed: true,
			closePrice,
			closedAtMs: this.clock.now(),
			pnl,
		});
		return pnl;
	}

	async getTodayCount(): Promise<number> {
		this.ensureOpen();
		return this.today().length;
	}

	async getTodayStats(): Promise<TodayStats> {
		this.ensureOpen();
		const today = this.today();
		let totalPnl = LibDecimal.zero();
		let wins = 0;
		let losses = 0;
		for (const s of today) {
			if (s.pnl === undefined) continue;
			totalPnl = totalPnl.add(s.pnl);
			if (s.pnl.isPositive()) wins += 1;
			if (s.pnl.isNegative()) losses += 1;
		}
		return {
			totalSignals: today.length,
			buys: today.filter((s) => s.action === "BUY").length,
			sells: today.filter((s) => s.action === "SELL").length,
			closed: today.filter((s) => s.closed).length,
			wins,
			losses,
			totalPnl,
		};
	}

	async getBotActive(): Promise<boolean> {
		this.ensureOpen();
		return this.state.botActive;
	}

	async setBotActive(active: boolean): Promise<void> {
		this.ensureOpen();
		this.state.botActive = active;
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		this.onClose();
	}

	private today(): StoredSignal[] {
		const date = utcDate(this.clock.now());
		return [...this.state.signals.values()].filter((s) => utcDate(s.createdAtMs) === date);
	}

	private ensureOpen(): void {
		if (this.closed) {
			throw new StoreUnavailableError("Store connection is closed");
		}
	}
}
