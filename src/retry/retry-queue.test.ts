import { describe, expect, it, vi } from "vitest";
import { MemoryReportSink } from "../persistence/memory-report-sink.js";
import type { SignalRequest } from "../protocol/types.js";
import type { Notifier } from "../server/types.js";
import { NetworkError, SignalNotFoundError } from "../shared/errors.js";
import type { RelayError } from "../shared/errors.js";
import { err, ok } from "../shared/result.js";
import type { Result } from "../shared/result.js";
import { FakeClock } from "../shared/time.js";
import { RetryQueue } from "./retry-queue.js";
import type { RetryAttempt } from "./retry-queue.js";
import type { RetryItem, RetryOutcome } from "./types.js";

const T0 = Date.UTC(2024, 2, 4, 12, 0, 0);
const BUY: SignalRequest = { action: "BUY", symbol: "EURUSD", price: 1.1 };

class StubNotifier implements Notifier {
	readonly messages: string[] = [];
	async notify(message: string): Promise<void> {
		this.messages.push(message);
	}
}

function processed(): Result<RetryOutcome, RelayError> {
	return ok({ type: "processed", message: "Signal BUY processed successfully" });
}

function setup(attempt: RetryAttempt, clock = new FakeClock(T0)) {
	const reporter = new MemoryReportSink({ clock });
	const notifier = new StubNotifier();
	const queue = new RetryQueue(attempt, { reporter, notifier, clock }, {
		stalenessMs: 180_000,
		maxRetries: 5,
		retryDelayMs: 0,
	});
	return { queue, reporter, notifier, clock };
}

function next(queue: RetryQueue, event: "succeeded" | "discarded"): Promise<RetryItem> {
	return new Promise((resolve) => {
		queue.events.once(event, (item: RetryItem) => resolve(item));
	});
}

describe("RetryQueue", () => {
	it("retries until an attempt succeeds", async () => {
		const attempt = vi
			.fn<RetryAttempt>()
			.mockResolvedValueOnce(err(new NetworkError("upstream down")))
			.mockResolvedValueOnce(processed());
		const { queue } = setup(attempt);
		queue.start();
		const done = next(queue, "succeeded");
		queue.enqueue(BUY);

		const item = await done;
		expect(attempt).toHaveBeenCalledTimes(2);
		expect(item.attempt).toBe(2);
		expect(item.disposition).toBe("succeeded");
		await queue.stop();
	});

	it("gives up after the attempt limit with one report", async () => {
		const attempt = vi.fn<RetryAttempt>().mockResolvedValue(err(new NetworkError("down")));
		const { queue, reporter, notifier } = setup(attempt);
		queue.start();
		const done = next(queue, "discarded");
		queue.enqueue(BUY);

		const item = await done;
		expect(attempt).toHaveBeenCalledTimes(5);
		expect(item.disposition).toBe("exhausted");
		expect(reporter.reports()).toEqual([
			{
				kind: "RETRY_FAILURE",
				details: 'Signal {"action":"BUY","symbol":"EURUSD","price":1.1} discarded after 5 failed attempts: down',
				createdAtMs: T0,
			},
		]);
		expect(notifier.messages).toEqual(["A signal for EURUSD failed after 5 attempts."]);
		await queue.stop();
	});

	it("stops at once on a non-retryable error", async () => {
		const attempt = vi.fn<RetryAttempt>().mockResolvedValue(err(new SignalNotFoundError(7)));
		const { queue } = setup(attempt);
		queue.start();
		const done = next(queue, "discarded");
		queue.enqueue({ action: "CLOSE", symbol: "EURUSD", price: 1.2, openSignalId: 7 });

		expect((await done).disposition).toBe("exhausted");
		expect(attempt).toHaveBeenCalledTimes(1);
		await queue.stop();
	});

	it("counts a thrown exception as a failed attempt", async () => {
		const attempt = vi
			.fn<RetryAttempt>()
			.mockRejectedValueOnce(new Error("boom"))
			.mockResolvedValueOnce(processed());
		const { queue } = setup(attempt);
		queue.start();
		const done = next(queue, "succeeded");
		queue.enqueue(BUY);

		expect((await done).lastError?.message).toBe("boom");
		expect(attempt).toHaveBeenCalledTimes(2);
		await queue.stop();
	});

	it("discards an item that is stale when dequeued, without attempting it", async () => {
		const attempt = vi.fn<RetryAttempt>().mockResolvedValue(processed());
		const { queue, reporter, notifier, clock } = setup(attempt);
		queue.enqueue(BUY);
		clock.advance(181_000);

		const done = next(queue, "discarded");
		queue.start();
		const item = await done;

		expect(item.disposition).toBe("stale");
		expect(attempt).not.toHaveBeenCalled();
		expect(reporter.reports()).toEqual([
			{
				kind: "STALE_SIGNAL",
				details: 'Signal {"action":"BUY","symbol":"EURUSD","price":1.1} discarded as stale after 3 minutes.',
				createdAtMs: T0 + 181_000,
			},
		]);
		expect(notifier.messages).toEqual(["A stale signal for EURUSD was discarded."]);
		await queue.stop();
	});

	it("checks staleness again on every dequeue", async () => {
		const clock = new FakeClock(T0);
		const attempt = vi.fn<RetryAttempt>(async () => {
			clock.advance(200_000);
			return err(new NetworkError("down"));
		});
		const { queue } = setup(attempt, clock);
		queue.start();
		const done = next(queue, "discarded");
		queue.enqueue(BUY);

		expect((await done).disposition).toBe("stale");
		expect(attempt).toHaveBeenCalledTimes(1);
		await queue.stop();
	});

	it("ends an item that admission rejects on retry", async () => {
		const attempt = vi
			.fn<RetryAttempt>()
			.mockResolvedValue(ok({ type: "rejected", reason: "Bot is currently paused by an admin." }));
		const { queue, reporter } = setup(attempt);
		queue.start();
		const done = next(queue, "succeeded");
		queue.enqueue(BUY);

		expect((await done).disposition).toBe("rejected");
		expect(attempt).toHaveBeenCalledTimes(1);
		expect(reporter.size).toBe(0);
		await queue.stop();
	});

	it("processes items in arrival order", async () => {
		const seen: string[] = [];
		const attempt = vi.fn<RetryAttempt>(async (signal) => {
			seen.push(signal.symbol);
			return processed();
		});
		const { queue } = setup(attempt);
		for (const symbol of ["A", "B", "C"]) queue.enqueue({ ...BUY, symbol });
		let count = 0;
		const done = new Promise<void>((resolve) => {
			queue.events.on("succeeded", () => {
				count += 1;
				if (count === 3) resolve();
			});
		});
		queue.start();
		await done;
		expect(seen).toEqual(["A", "B", "C"]);
		await queue.stop();
	});

	it("lets the in-progress item finish on stop and keeps the rest queued", async () => {
		let release: () => void = () => undefined;
		const gate = new Promise<void>((resolve) => {
			release = resolve;
		});
		const attempt = vi.fn<RetryAttempt>(async () => {
			await gate;
			return processed();
		});
		const { queue } = setup(attempt);
		queue.enqueue(BUY);
		queue.enqueue({ ...BUY, symbol: "GBPUSD" });
		queue.start();
		await vi.waitFor(() => expect(queue.inProgress).not.toBeNull());

		let stopped = false;
		const stopping = queue.stop().then(() => {
			stopped = true;
		});
		await Promise.resolve();
		expect(stopped).toBe(false);

		release();
		await stopping;
		expect(attempt).toHaveBeenCalledTimes(1);
		expect(queue.size).toBe(1);
		expect(queue.running).toBe(false);
	});

	it("keeps working when the reporter fails", async () => {
		const attempt = vi.fn<RetryAttempt>().mockResolvedValue(err(new NetworkError("down")));
		const clock = new FakeClock(T0);
		const notifier = new StubNotifier();
		const queue = new RetryQueue(
			attempt,
			{
				reporter: {
					report: async () => {
						throw new Error("disk full");
					},
				},
				notifier,
				clock,
			},
			{ maxRetries: 1, retryDelayMs: 0 },
		);
		queue.start();
		const done = next(queue, "discarded");
		queue.enqueue(BUY);
		expect((await done).disposition).toBe("exhausted");
		expect(notifier.messages).toHaveLength(1);
		await queue.stop();
	});

	it("tolerates repeated start and stop", async () => {
		const { queue } = setup(vi.fn<RetryAttempt>());
		await queue.stop();
		queue.start();
		queue.start();
		await queue.stop();
		await queue.stop();
		expect(queue.running).toBe(false);
		expect(queue.size).toBe(0);
	});
});
