import createDebug from "debug";
import type { TaskPool } from "./pool.js";
import { settle } from "./result.js";
import { sleep } from "./retry.js";

const debug = createDebug("cdp:paginate");

export type PartitionedReadOptions<T> = {
	/** One server-issued cursor per partition. */
	cursors: readonly string[];
	/** Reads the pages of one partition, in order, starting at its cursor. */
	readPartition: (cursor: string) => AsyncIterable<T[]>;
	/** Pool the partitions run on. */
	pool: TaskPool;
	/** Total number of records to yield. Omit to read everything. */
	limit?: number;
	/**
	 * A producer that finds the queue full sleeps a uniformly random
	 * `[0, partitions)` multiple of this before checking again.
	 * @default 1000
	 */
	backoffUnitMillis?: number;
};

/**
 * Read every partition concurrently and yield their pages as they arrive.
 *
 * Pages of one partition keep their order; pages of different partitions
 * interleave in arrival order. Producers stop fetching while `partitions`
 * pages wait unconsumed, so at most `2 * partitions` pages are held at once.
 *
 * With a `limit`, the page that reaches it is trimmed to the remaining count
 * and every partition is told to stop. Stopping the iteration early does the
 * same. A fetch already in flight is allowed to finish, but no partition
 * starts another one. Errors from any partition are re-thrown once all
 * partitions have stopped.
 */
export async function* readPartitioned<T>({
	cursors,
	readPartition,
	pool,
	limit,
	backoffUnitMillis = 1000,
}: PartitionedReadOptions<T>): AsyncGenerator<T[], void, undefined> {
	const partitions = cursors.length;
	if (partitions === 0 || (limit !== undefined && limit <= 0)) return;

	const queue: T[][] = [];
	const quit = new AbortController();
	let finished = 0;
	let failure: { error: unknown } | undefined;
	let wake: (() => void) | undefined;

	const notify = () => {
		const resolve = wake;
		wake = undefined;
		resolve?.();
	};

	const exhaust = async (cursor: string) => {
		if (quit.signal.aborted) return;
		for await (const chunk of readPartition(cursor)) {
			queue.push(chunk);
			notify();
			if (quit.signal.aborted) return;
			// The consumer is slower than the producers: hold off
			while (queue.length >= partitions) {
				await sleep(Math.random() * partitions * backoffUnitMillis, quit.signal, {
					resolveOnAbort: true,
				});
				if (quit.signal.aborted) return;
			}
		}
	};

	debug("reading %d partitions, limit=%s", partitions, limit ?? "none");
	const tasks = cursors.map((cursor) =>
		settle(
			pool
				.submit(() => exhaust(cursor))
				.catch((error: unknown) => {
					failure ??= { error };
					throw error;
				})
				.finally(() => {
					finished++;
					notify();
				}),
		),
	);

	let total = 0;
	try {
		while (!failure) {
			const part = queue.shift();
			if (part !== undefined) {
				if (limit === undefined) {
					yield part;
				} else if (total + part.length < limit) {
					total += part.length;
					yield part;
				} else {
					quit.abort();
					yield part.slice(0, limit - total);
					return;
				}
				continue;
			}
			if (finished === partitions) break;
			await new Promise<void>((resolve) => {
				wake = resolve;
			});
		}
	} finally {
		quit.abort();
		const outcomes = await Promise.all(tasks);
		debug("all %d partitions stopped", partitions);
		for (const outcome of outcomes) {
			if (!outcome.ok) throw outcome.error;
		}
	}
}
