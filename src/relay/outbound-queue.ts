/**
 * OutboundQueue — bounded FIFO between local sessions and the upstream
 * send loop.
 */

import { AsyncQueue } from "../lib/queue/index.js";
import type { TakeOptions } from "../lib/queue/index.js";
import type { OutboundItem, OutboundSource } from "../session/types.js";
import { OverflowPolicy } from "./types.js";

export type OfferResult<T> =
	| { readonly type: "accepted"; readonly depth: number }
	| { readonly type: "accepted_with_eviction"; readonly depth: number; readonly evicted: T }
	| { readonly type: "rejected"; readonly depth: number };

export class OutboundQueue<T extends OutboundItem> implements OutboundSource<T> {
	private readonly queue = new AsyncQueue<T>();

	constructor(
		readonly capacity: number,
		readonly policy: OverflowPolicy,
	) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Outbound queue capacity must be a positive integer, got ${capacity}`);
		}
	}

	get depth(): number {
		return this.queue.size;
	}

	offer(item: T): OfferResult<T> {
		if (this.queue.size < this.capacity) {
			this.queue.put(item);
			return { type: "accepted", depth: this.queue.size };
		}
		if (this.policy === OverflowPolicy.Reject) {
			return { type: "rejected", depth: this.queue.size };
		}
		const evicted = this.queue.poll();
		this.queue.put(item);
		return evicted === undefined
			? { type: "accepted", depth: this.queue.size }
			: { type: "accepted_with_eviction", depth: this.queue.size, evicted };
	}

	take(options: TakeOptions): Promise<T | null> {
		return this.queue.take(options);
	}

	/** Back at the head after a failed write. May briefly exceed capacity. */
	requeue(item: T): void {
		this.queue.putFront(item);
	}

	/** Removes every waiting item, oldest first. */
	drain(): T[] {
		return this.queue.drain();
	}
}
