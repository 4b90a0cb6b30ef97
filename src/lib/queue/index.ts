/**
 * AsyncQueue — FIFO with awaitable `take()`.
 *
 * Any number of producers call `put()`; consumers await `take()`, which
 * resolves with the next item, or with null once its timeout elapses or its
 * abort signal fires. An item handed to a waiter never stays in the buffer.
 */

/** Options for a single `take()` call. */
export interface TakeOptions {
	readonly timeoutMs?: number;
	readonly signal?: AbortSignal;
}

interface Waiter<T> {
	resolve(item: T | null): void;
}

export class AsyncQueue<T> {
	private readonly items: T[] = [];
	private readonly waiters: Waiter<T>[] = [];

	get size(): number {
		return this.items.length;
	}

	/** Number of consumers currently blocked in `take()`. */
	get pendingTakers(): number {
		return this.waiters.length;
	}

	/** Appends an item, or hands it straight to the oldest waiting consumer. */
	put(item: T): void {
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve(item);
			return;
		}
		this.items.push(item);
	}

	/** Puts an item back at the head, ahead of everything already queued. */
	putFront(item: T): void {
		const waiter = this.waiters.shift();
		if (waiter) {
			waiter.resolve(item);
			return;
		}
		this.items.unshift(item);
	}

	/** Removes and returns the head without waiting. */
	poll(): T | undefined {
		return this.items.shift();
	}

	/** Removes and returns every buffered item. */
	drain(): T[] {
		return this.items.splice(0, this.items.length);
	}

	take(options: TakeOptions = {}): Promise<T | null> {
		if (this.items.length > 0) {
			return Promise.resolve(this.items.shift() ?? null);
		}
		const { timeoutMs, signal } = options;
		if (signal?.aborted) return Promise.resolve(null);

		return new Promise<T | null>((resolve) => {
			let timer: ReturnType<typeof setTimeout> | null = null;

			const settle = (item: T | null): void => {
				if (timer !== null) clearTimeout(timer);
				signal?.removeEventListener("abort", onAbort);
				resolve(item);
			};
			const waiter: Waiter<T> = { resolve: settle };
			const abandon = (): void => {
				const idx = this.waiters.indexOf(waiter);
				if (idx !== -1) this.waiters.splice(idx, 1);
				settle(null);
			};
			const onAbort = (): void => abandon();

			this.waiters.push(waiter);
			if (timeoutMs !== undefined) {
				timer = setTimeout(abandon, Math.max(0, timeoutMs));
			}
			signal?.addEventListener("abort", onAbort, { once: true });
		});
	}
}
