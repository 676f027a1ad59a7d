/**
 * Bounded queue — fixed-capacity FIFO between producers and the delivery
 * worker.
 *
 * Ring buffer; push never blocks and never grows memory past `capacity`.
 * Producers only push and the single worker only drains, all on one event
 * loop, so no locking is involved.
 */

import type { OverflowPolicy } from '@logwire/sdk';

export class BoundedQueue<T> {
	private readonly slots: (T | undefined)[];
	private head = 0;
	private count = 0;
	private evictedCount = 0;
	private rejectedCount = 0;

	readonly capacity: number;
	readonly policy: OverflowPolicy;

	constructor(capacity: number, policy: OverflowPolicy = 'drop_oldest') {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new RangeError(`Queue capacity must be a positive integer, got ${capacity}`);
		}
		this.capacity = capacity;
		this.policy = policy;
		this.slots = new Array<T | undefined>(capacity);
	}

	/**
	 * Add an item. Under drop_newest a full queue rejects the item and returns
	 * false; under drop_oldest the head is evicted and the push succeeds.
	 */
	push(item: T): boolean {
		if (this.count === this.capacity) {
			if (this.policy === 'drop_newest') {
				this.rejectedCount++;
				return false;
			}
			// Overwrite the head and advance it
			this.slots[this.head] = item;
			this.head = (this.head + 1) % this.capacity;
			this.evictedCount++;
			return true;
		}

		this.slots[(this.head + this.count) % this.capacity] = item;
		this.count++;
		return true;
	}

	/** Remove and return up to `maxCount` items, oldest first. */
	drain(maxCount: number): T[] {
		const n = Math.min(Math.max(0, Math.floor(maxCount)), this.count);
		const out: T[] = [];
		for (let i = 0; i < n; i++) {
			const item = this.slots[this.head];
			this.slots[this.head] = undefined;
			this.head = (this.head + 1) % this.capacity;
			if (item !== undefined) out.push(item);
		}
		this.count -= n;
		return out;
	}

	/** Look at the oldest item without removing it */
	peek(): T | undefined {
		return this.count === 0 ? undefined : this.slots[this.head];
	}

	clear(): number {
		const cleared = this.count;
		this.drain(this.count);
		return cleared;
	}

	get size(): number {
		return this.count;
	}

	get isEmpty(): boolean {
		return this.count === 0;
	}

	/** Items discarded by drop_oldest */
	get evicted(): number {
		return this.evictedCount;
	}

	/** Items refused by drop_newest */
	get rejected(): number {
		return this.rejectedCount;
	}
}
