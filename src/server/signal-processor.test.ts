import { describe, expect, it } from "vitest";
import { MemoryReportSink } from "../persistence/memory-report-sink.js";
import { MemorySignalStore } from "../persistence/memory-signal-store.js";
import type { RetryItem } from "../retry/types.js";
import { FakeClock } from "../shared/time.js";
import { SignalProcessor } from "./signal-processor.js";
import type { SignalProcessorConfig } from "./signal-processor.js";
import type { Notifier, SignalStore, SignalStoreConnection } from "./types.js";

const T0 = Date.UTC(2024, 2, 4, 12, 0, 0);

class StubNotifier implements Notifier {
	readonly messages: string[] = [];
	failing = false;

	async notify(message: string): Promise<void> {
		if (this.failing) throw new Error("chat service down");
		this.messages.push(message);
	}
}

/** Fails the first `failures` connects, then delegates. */
class FlakyStore implements SignalStore {
	constructor(
		private readonly inner: SignalStore,
		private failures: number,
	) {}

	async connect(): Promise<SignalStoreConnection> {
		if (this.failures > 0) {
			this.failures -= 1;
			throw new Error("db down");
		}
		return this.inner.connect();
	}
}

/** Every connection call waits a few milliseconds, so concurrent signals interleave. */
class SlowStore implements SignalStore {
	constructor(private readonly inner: SignalStore) {}

	async connect(): Promise<SignalStoreConnection> {
		await pause();
		const conn = await this.inner.connect();
		return {
			saveSignal: async (signal) => {
				await pause();
				return conn.saveSignal(signal);
			},
			closeSignal: async (id, price) => {
				await pause();
				return conn.closeSignal(id, price);
			},
			getTodayCount: async () => {
				await pause();
				return conn.getTodayCount();
			},
			getTodayStats: async () => {
				await pause();
				return conn.getTodayStats();
			},
			getBotActive: async () => {
				await pause();
				return conn.getBotActive();
			},
			setBotActive: async (active) => {
				await pause();
				return conn.setBotActive(active);
			},
			close: () => conn.close(),
		};
	}
}

function pause(): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, 5));
}

function setup(config: SignalProcessorConfig = {}, failures = 0) {
	const clock = new FakeClock(T0);
	const memory = new MemorySignalStore({ clock });
	const notifier = new StubNotifier();
	const reporter = new MemoryReportSink({ clock });
	const processor = new SignalProcessor(
		{ store: new FlakyStore(memory, failures), notifier, reporter, clock },
		config,
	);
	return { processor, memory, notifier, reporter, clock };
}

describe("SignalProcessor", () => {
	it("stores an accepted BUY and replies with its id", async () => {
		const { processor, memory, notifier } = setup();

		const reply = await processor.handle({ action: "buy", symbol: "EURUSD", price: 1.1, client_msg_id: "m-1" });

		expect(reply).toEqual({
			status: "success",
			message: "Signal BUY processed successfully",
			signal_id: 1,
			client_msg_id: "m-1",
		});
		expect(memory.get(1)).toMatchObject({ action: "BUY", symbol: "EURUSD", price: 1.1, closed: false });
		expect(memory.openConnections).toBe(0);
		expect(processor.lastAcceptedAtMs).toBe(T0);
		expect(notifier.messages).toHaveLength(1);
		expect(notifier.messages[0]?.split("\n")[0]).toBe("<b>BUY SIGNAL</b>");
	});

	it("answers validation failures with the first issue", async () => {
		const { processor, memory } = setup();

		expect(await processor.handle({ action: "BUY" })).toEqual({
			status: "error",
			message: "Missing required fields: action, symbol, price",
		});
		expect(await processor.handle({ action: "HOLD", symbol: "EURUSD", price: 1 })).toEqual({
			status: "error",
			message: "Invalid action",
		});
		expect(await processor.handle({ action: "CLOSE", symbol: "EURUSD", price: 1, client_msg_id: "m-2" })).toEqual({
			status: "error",
			message: "open_signal_id is required for CLOSE action",
			client_msg_id: "m-2",
		});
		expect(memory.connectionsOpened).toBe(0);
	});

	it("rate-limits BUY and SELL across producers", async () => {
		const { processor, clock } = setup({ admission: { minIntervalMs: 60_000 } });
		await processor.handle({ action: "BUY", symbol: "EURUSD", price: 1.1 });

		clock.advance(15_000);
		expect(await processor.handle({ action: "SELL", symbol: "GBPUSD", price: 1.2 })).toEqual({
			status: "error",
			message: "Rate limit active. Please wait 45 more seconds.",
		});

		clock.advance(45_000);
		const reply = await processor.handle({ action: "SELL", symbol: "GBPUSD", price: 1.2 });
		expect(reply).toEqual({ status: "success", message: "Signal SELL processed successfully", signal_id: 2 });
	});

	it("admits concurrent BUY and SELL one at a time", async () => {
		const clock = new FakeClock(T0);
		const memory = new MemorySignalStore({ clock });
		const processor = new SignalProcessor(
			{ store: new SlowStore(memory), notifier: new StubNotifier(), reporter: new MemoryReportSink({ clock }), clock },
			{ admission: { dailyCap: 1, minIntervalMs: 60_000 } },
		);

		const replies = await Promise.all([
			processor.handle({ action: "BUY", symbol: "EURUSD", price: 1.1, client_msg_id: "a" }),
			processor.handle({ action: "SELL", symbol: "GBPUSD", price: 1.2, client_msg_id: "b" }),
		]);

		expect(replies).toEqual([
			{ status: "success", message: "Signal BUY processed successfully", signal_id: 1, client_msg_id: "a" },
			{ status: "error", message: "Rate limit active. Please wait 60 more seconds.", client_msg_id: "b" },
		]);
		expect(memory.get(2)).toBeUndefined();
		expect(memory.openConnections).toBe(0);
	});

	it("enforces the daily cap but still accepts CLOSE", async () => {
		const { processor } = setup({ admission: { dailyCap: 2, minIntervalMs: 0 } });
		await processor.handle({ action: "BUY", symbol: "EURUSD", price: 1.1 });
		await processor.handle({ action: "SELL", symbol: "EURUSD", price: 1.2 });

		expect(await processor.handle({ action: "BUY", symbol: "EURUSD", price: 1.15 })).toEqual({
			status: "error",
			message: "Daily signal limit of 2 has been reached.",
		});
		expect(await processor.handle({ action: "CLOSE", symbol: "EURUSD", price: 1.2, open_signal_id: 1 })).toEqual({
			status: "success",
			message: "Close signal for #1 processed successfully",
			signal_id: 1,
		});
	});

	it("refuses new signals while paused", async () => {
		const { processor } = setup();
		const paused = await processor.setActive(false);
		expect(paused.ok).toBe(true);

		expect(await processor.handle({ action: "BUY", symbol: "EURUSD", price: 1.1 })).toEqual({
			status: "error",
			message: "Bot is currently paused by an admin.",
		});

		await processor.setActive(true);
		const reply = await processor.handle({ action: "BUY", symbol: "EURUSD", price: 1.1 });
		expect(reply.status).toBe("success");
	});

	it("closes a signal and records its P&L", async () => {
		const { processor, memory, notifier } = setup();
		await processor.handle({ action: "SELL", symbol: "EURUSD", price: 1.2 });

		await processor.handle({ action: "CLOSE", symbol: "EURUSD", price: 1.15, open_signal_id: 1 });

		const stored = memory.get(1);
		expect(stored?.closed).toBe(true);
		expect(stored?.closePrice).toBe(1.15);
		expect(stored?.pnl?.toString()).toBe("0.05");
		expect(notifier.messages[1]?.split("\n")[5]).toBe("<b>P&L:</b> +0.05000");
	});

	it("reports an unknown CLOSE id without queueing it", async () => {
		const { processor } = setup();

		const reply = await processor.handle({ action: "CLOSE", symbol: "EURUSD", price: 1.1, open_signal_id: 42 });

		expect(reply).toEqual({ status: "error", message: "Signal with ID 42 not found." });
		expect(processor.retryQueue.size).toBe(0);
	});

	it("keeps the reply successful when notification fails", async () => {
		const { processor, notifier, memory } = setup();
		notifier.failing = true;

		const reply = await processor.handle({ action: "BUY", symbol: "EURUSD", price: 1.1 });

		expect(reply.status).toBe("success");
		expect(memory.signals()).toHaveLength(1);
		expect(memory.openConnections).toBe(0);
	});

	it("queues a signal when the store is unavailable and stores it on retry", async () => {
		const { processor, memory } = setup({ retry: { retryDelayMs: 0 } }, 1);

		const reply = await processor.handle({ action: "BUY", symbol: "EURUSD", price: 1.1, client_msg_id: "m-9" });
		expect(reply).toEqual({ status: "queued", message: "Signal queued for retry", client_msg_id: "m-9" });
		expect(processor.retryQueue.size).toBe(1);

		const done = new Promise<RetryItem>((resolve) => {
			processor.retryQueue.events.once("succeeded", (item: RetryItem) => resolve(item));
		});
		processor.retryQueue.start();
		const item = await done;
		await processor.retryQueue.stop();

		expect(item.disposition).toBe("succeeded");
		expect(memory.signals().map((s) => s.symbol)).toEqual(["EURUSD"]);
	});

	it("turns an admission rejection on retry into a rejected outcome", async () => {
		const { processor } = setup();
		await processor.handle({ action: "BUY", symbol: "EURUSD", price: 1.1 });

		const outcome = await processor.retry({ action: "SELL", symbol: "EURUSD", price: 1.2 });

		expect(outcome).toEqual({
			ok: true,
			value: { type: "rejected", reason: "Rate limit active. Please wait 60 more seconds." },
		});
	});
});
