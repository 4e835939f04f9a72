import createDebug from "debug";
import { abortedError, invalidArgument } from "../error.js";

const debug = createDebug("cdp:pool");

type QueuedTask = {
	run: () => Promise<void>;
	cancel: (reason: unknown) => void;
};

/**
 * Runs async tasks with at most `maxWorkers` of them in flight.
 *
 * Queued tasks start first in first out. One pool is shared by everything a client runs
 * in the background, so the cap holds across concurrent calls.
 */
export class TaskPool {
	public readonly maxWorkers: number;
	private readonly queue: QueuedTask[] = [];
	private running = 0;
	private closed = false;

	constructor(maxWorkers: number) {
		if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
			throw invalidArgument(`Number of workers should be >= 1, was ${maxWorkers}`);
		}
		this.maxWorkers = maxWorkers;
	}

	/** Number of tasks currently running. */
	get active(): number {
		return this.running;
	}

	/** Number of tasks waiting for a free worker. */
	get pending(): number {
		return this.queue.length;
	}

	/**
	 * Schedule `fn` to run once a worker is free.
	 *
	 * @returns Settles with the outcome of `fn`
	 */
	submit<T>(fn: () => Promise<T>): Promise<T> {
		if (this.closed) {
			return Promise.reject(abortedError("Task pool is shut down"));
		}
		return new Promise<T>((resolve, reject) => {
			this.queue.push({
				run: () => Promise.resolve().then(fn).then(resolve, reject),
				cancel: reject,
			});
			this.drain();
		});
	}

	/** Reject every queued task and refuse new ones. Running tasks finish. */
	shutdown(): void {
		this.closed = true;
		const cancelled = this.queue.splice(0);
		if (cancelled.length > 0) {
			debug("shutdown: cancelling %d queued tasks", cancelled.length);
		}
		for (const task of cancelled) {
			task.cancel(abortedError("Task pool is shut down"));
		}
	}

	private drain(): void {
		while (this.running < this.maxWorkers) {
			const task = this.queue.shift();
			if (!task) return;
			this.running++;
			void task.run().finally(() => {
				this.running--;
				this.drain();
			});
		}
	}
}
