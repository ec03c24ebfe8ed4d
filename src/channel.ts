/**
 * Ordered single-producer, single-consumer queue. Values pushed before the
 * consumer starts iterating are buffered; iteration ends once the channel is
 * closed and drained.
 */
export class EventChannel<T> implements AsyncIterable<T> {
	private readonly buffer: Array<{ value: T }> = [];
	private waiting: ((result: IteratorResult<T, undefined>) => void) | null =
		null;
	private closed = false;
	private consumed = false;

	push(value: T) {
		if (this.closed) {
			throw new Error("Cannot push to a closed channel.");
		}
		if (this.waiting) {
			const resolve = this.waiting;
			this.waiting = null;
			resolve({ value, done: false });
			return;
		}
		this.buffer.push({ value });
	}

	close() {
		if (this.closed) return;
		this.closed = true;
		if (this.waiting) {
			const resolve = this.waiting;
			this.waiting = null;
			resolve({ value: undefined, done: true });
		}
	}

	private next(): Promise<IteratorResult<T, undefined>> {
		const entry = this.buffer.shift();
		if (entry) {
			return Promise.resolve({ value: entry.value, done: false });
		}
		if (this.closed) {
			return Promise.resolve({ value: undefined, done: true });
		}
		return new Promise((resolve) => {
			this.waiting = resolve;
		});
	}

	[Symbol.asyncIterator](): AsyncIterator<T, undefined> {
		if (this.consumed) {
			throw new Error("Channel already has a consumer.");
		}
		this.consumed = true;
		return { next: () => this.next() };
	}
}
