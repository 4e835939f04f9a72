import { describe, expect, it } from "vitest";
import { readPartitioned } from "../lib/partitioned.js";
import { TaskPool } from "../lib/pool.js";
import { sleep } from "../lib/retry.js";

type Source = {
	fetched: number;
	readPartition: (cursor: string) => AsyncIterable<string[]>;
};

/** Partitions of `chunks` chunks of `size` rows each; `Infinity` never ends. */
function source(chunks: number, size: number, fetchMillis = 1): Source {
	const state: Source = {
		fetched: 0,
		readPartition: async function* (cursor: string) {
			for (let c = 0; c < chunks; c++) {
				await sleep(fetchMillis);
				state.fetched++;
				yield Array.from({ length: size }, (_, i) => `${cursor}:${c}:${i}`);
			}
		},
	};
	return state;
}

async function readAll(iterable: AsyncIterable<string[]>): Promise<string[][]> {
	const chunks: string[][] = [];
	for await (const chunk of iterable) chunks.push(chunk);
	return chunks;
}

describe("readPartitioned", () => {
	it("yields every chunk of every partition, in order within a partition", async () => {
		const { readPartition } = source(4, 2);
		const chunks = await readAll(
			readPartitioned({
				cursors: ["a", "b", "c"],
				readPartition,
				pool: new TaskPool(3),
				backoffUnitMillis: 1,
			}),
		);

		expect(chunks).toHaveLength(12);
		for (const cursor of ["a", "b", "c"]) {
			const own = chunks.filter((chunk) => chunk[0]?.startsWith(`${cursor}:`));
			expect(own.map((chunk) => chunk[0])).toEqual([
				`${cursor}:0:0`,
				`${cursor}:1:0`,
				`${cursor}:2:0`,
				`${cursor}:3:0`,
			]);
		}
	});

	it("reads a single partition exactly like a serial read", async () => {
		const { readPartition } = source(3, 2);
		const serial = await readAll(readPartition("only"));
		const partitioned = await readAll(
			readPartitioned({
				cursors: ["only"],
				readPartition,
				pool: new TaskPool(1),
				backoffUnitMillis: 1,
			}),
		);

		expect(partitioned).toEqual(serial);
	});

	it("yields exactly `limit` rows, trimming the last chunk", async () => {
		const { readPartition } = source(10, 3);
		const chunks = await readAll(
			readPartitioned({
				cursors: ["a", "b"],
				readPartition,
				pool: new TaskPool(2),
				limit: 10,
				backoffUnitMillis: 1,
			}),
		);

		expect(chunks.flat()).toHaveLength(10);
		expect(chunks.at(-1)).toHaveLength(1);
	});

	it("yields nothing for a zero limit or no cursors", async () => {
		const { readPartition } = source(2, 2);
		const pool = new TaskPool(1);

		expect(await readAll(readPartitioned({ cursors: [], readPartition, pool }))).toEqual([]);
		expect(
			await readAll(readPartitioned({ cursors: ["a"], readPartition, pool, limit: 0 })),
		).toEqual([]);
	});

	it("holds at most twice the partition count of chunks when the consumer is slow", async () => {
		const partitions = 3;
		const state = source(8, 1);
		let consumed = 0;
		let peak = 0;

		for await (const _chunk of readPartitioned({
			cursors: ["a", "b", "c"],
			readPartition: state.readPartition,
			pool: new TaskPool(partitions),
			backoffUnitMillis: 1,
		})) {
			peak = Math.max(peak, state.fetched - consumed);
			await sleep(5);
			consumed++;
		}

		expect(consumed).toBe(24);
		expect(peak).toBeGreaterThan(1);
		expect(peak).toBeLessThanOrEqual(2 * partitions);
	});

	it("stops fetching once the consumer stops", async () => {
		const state = source(Number.POSITIVE_INFINITY, 5);
		let seen = 0;

		for await (const _chunk of readPartitioned({
			cursors: ["a", "b"],
			readPartition: state.readPartition,
			pool: new TaskPool(2),
			backoffUnitMillis: 1,
		})) {
			if (++seen === 3) break;
		}
		const fetchedAtStop = state.fetched;
		await sleep(30);

		expect(state.fetched).toBe(fetchedAtStop);
	});

	it("stops fetching once the limit is reached", async () => {
		const state = source(Number.POSITIVE_INFINITY, 5);
		const chunks = await readAll(
			readPartitioned({
				cursors: ["a", "b", "c"],
				readPartition: state.readPartition,
				pool: new TaskPool(3),
				limit: 12,
				backoffUnitMillis: 1,
			}),
		);
		const fetchedAtStop = state.fetched;
		await sleep(30);

		expect(chunks.flat()).toHaveLength(12);
		expect(state.fetched).toBe(fetchedAtStop);
	});

	it("rethrows the error of a failing partition after the others stop", async () => {
		const healthy = source(Number.POSITIVE_INFINITY, 1);
		const iterable = readPartitioned({
			cursors: ["good", "bad"],
			readPartition: (cursor) =>
				cursor === "bad"
					? (async function* () {
							await sleep(5);
							yield ["bad:0"];
							throw new Error("partition failed");
						})()
					: healthy.readPartition(cursor),
			pool: new TaskPool(2),
			backoffUnitMillis: 1,
		});

		await expect(readAll(iterable)).rejects.toThrow("partition failed");
		const fetchedAfterError = healthy.fetched;
		await sleep(30);
		expect(healthy.fetched).toBe(fetchedAfterError);
	});
});
