import { describe, expect, it } from "vitest";
import { FakeClock, SystemClock, sleep } from "./time.js";

describe("Clock", () => {
	it("SystemClock returns the current time", () => {
		const before = Date.now();
		const now = SystemClock.now();
		expect(now).toBeGreaterThanOrEqual(before);
		expect(now).toBeLessThanOrEqual(Date.now());
	});

	it("FakeClock starts at the given time and advances", () => {
		const clock = new FakeClock(1_000);
		expect(clock.now()).toBe(1_000);
		clock.advance(250);
		expect(clock.now()).toBe(1_250);
		clock.set(10);
		expect(clock.now()).toBe(10);
	});

	it("FakeClock starts at 0 by default", () => {
		expect(new FakeClock().now()).toBe(0);
	});
});

describe("sleep", () => {
	it("resolves true after the delay", async () => {
		expect(await sleep(5)).toBe(true);
	});

	it("resolves true immediately for a non-positive delay", async () => {
		expect(await sleep(0)).toBe(true);
	});

	it("resolves false when aborted mid-wait", async () => {
		const controller = new AbortController();
		const pending = sleep(60_000, controller.signal);
		controller.abort();
		expect(await pending).toBe(false);
	});

	it("resolves false when the signal is already aborted", async () => {
		const controller = new AbortController();
		controller.abort();
		expect(await sleep(60_000, controller.signal)).toBe(false);
	});
});
