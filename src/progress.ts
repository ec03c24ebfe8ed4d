import type { ProgressSink } from "./types/backup";

export const LISTING_START = 0;
export const LISTING_DONE = 10;
export const COMPLETE = 100;

const TRANSFER_SPAN = COMPLETE - LISTING_DONE;

/**
 * Map the number of finished repositories onto the transfer phase `(10, 100]`.
 */
export const percentFor = (completed: number, total: number) => {
	if (total <= 0) {
		return COMPLETE;
	}
	const ratio = Math.min(Math.max(completed, 0), total) / total;
	return LISTING_DONE + Math.floor(ratio * TRANSFER_SPAN);
};

/**
 * Forwards progress to a sink, dropping values that would move it backwards.
 * Repeated values are forwarded.
 */
export class ProgressTracker {
	private current = -1;

	constructor(private readonly sink: ProgressSink) {}

	report(percent: number) {
		const next = Math.min(Math.max(Math.trunc(percent), 0), COMPLETE);
		if (next < this.current) {
			return;
		}
		this.current = next;
		this.sink(next);
	}

	complete() {
		this.report(COMPLETE);
	}
}
