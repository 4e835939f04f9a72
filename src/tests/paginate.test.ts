import { describe, expect, it, vi } from "vitest";
import {
	collect,
	finiteLimit,
	isUnlimited,
	type Page,
	type PageFetcher,
	paginate,
	paginateChunks,
} from "../lib/paginate.js";

/** A listing of `total` numbers served from cursor "0", "1", ... */
function listing(total: number) {
	const calls: Array<{ cursor?: string; limit: number }> = [];
	const fetcher: PageFetcher<number> = async ({ cursor, limit }) => {
		calls.push({ cursor, limit });
		const start = cursor === undefined ? 0 : Number(cursor);
		const end = Math.min(start + limit, total);
		const items = Array.from({ length: end - start }, (_, i) => start + i);
		const page: Page<number> = {
			items,
			nextCursor: end < total ? String(end) : undefined,
		};
		return page;
	};
	return { fetcher, calls };
}

describe("paginate", () => {
	it("follows cursors until the listing ends", async () => {
		const { fetcher, calls } = listing(7);
		const items = await collect(paginate(fetcher, { listLimit: 3, limit: null }));

		expect(items).toEqual([0, 1, 2, 3, 4, 5, 6]);
		expect(calls).toEqual([
			{ cursor: undefined, limit: 3 },
			{ cursor: "3", limit: 3 },
			{ cursor: "6", limit: 3 },
		]);
	});

	it("requests only what is left of the limit", async () => {
		const { fetcher, calls } = listing(100);
		const items = await collect(paginate(fetcher, { listLimit: 4, limit: 10 }));

		expect(items).toHaveLength(10);
		expect(calls.map((c) => c.limit)).toEqual([4, 4, 2]);
	});

	it("trims a page that returns more than asked", async () => {
		const fetcher: PageFetcher<number> = async () => ({ items: [1, 2, 3, 4, 5], nextCursor: "x" });
		const items = await collect(paginate(fetcher, { listLimit: 10, limit: 2 }));

		expect(items).toEqual([1, 2]);
	});

	it("stops on an empty page even when a cursor is returned", async () => {
		const fetcher = vi
			.fn<PageFetcher<number>>()
			.mockResolvedValueOnce({ items: [1], nextCursor: "a" })
			.mockResolvedValueOnce({ items: [], nextCursor: "b" });

		expect(await collect(paginate(fetcher, { listLimit: 10 }))).toEqual([1]);
		expect(fetcher).toHaveBeenCalledTimes(2);
	});

	it("does not fetch for a zero limit", async () => {
		const { fetcher, calls } = listing(5);
		expect(await collect(paginate(fetcher, { listLimit: 10, limit: 0 }))).toEqual([]);
		expect(calls).toHaveLength(0);
	});

	it("resumes from an initial cursor", async () => {
		const { fetcher } = listing(6);
		const items = await collect(
			paginate(fetcher, { listLimit: 10, initialCursor: "4", limit: -1 }),
		);
		expect(items).toEqual([4, 5]);
	});

	it("is lazy: nothing is fetched until iteration starts", async () => {
		const { fetcher, calls } = listing(5);
		const iterable = paginate(fetcher, { listLimit: 2 });
		expect(calls).toHaveLength(0);

		for await (const item of iterable) {
			expect(item).toBe(0);
			break;
		}
		expect(calls).toHaveLength(1);
	});
});

describe("paginateChunks", () => {
	it("re-chunks pages into arrays of chunkSize", async () => {
		const { fetcher, calls } = listing(10);
		const chunks = await collect(
			paginateChunks(fetcher, { listLimit: 3, chunkSize: 4, limit: null }),
		);

		expect(chunks).toEqual([
			[0, 1, 2, 3],
			[4, 5, 6, 7],
			[8, 9],
		]);
		expect(calls.every((c) => c.limit === 3)).toBe(true);
	});

	it("requests pages of chunkSize when it fits in one request", async () => {
		const { fetcher, calls } = listing(10);
		const chunks = await collect(
			paginateChunks(fetcher, { listLimit: 1000, chunkSize: 5, limit: null }),
		);

		expect(chunks).toHaveLength(2);
		expect(calls.map((c) => c.limit)).toEqual([5, 5]);
	});

	it("rejects a chunk size below 1", () => {
		const { fetcher } = listing(1);
		expect(() => paginateChunks(fetcher, { listLimit: 10, chunkSize: 0 })).toThrow(
			"chunkSize must be a positive integer, was 0",
		);
	});
});

describe("limits", () => {
	it("treats undefined, null, -1 and Infinity as unlimited", () => {
		expect([undefined, null, -1, Number.POSITIVE_INFINITY].map(isUnlimited)).toEqual([
			true,
			true,
			true,
			true,
		]);
		expect(isUnlimited(0)).toBe(false);
		expect(finiteLimit(-1)).toBeUndefined();
		expect(finiteLimit(25)).toBe(25);
	});

	it("rejects other negative or fractional limits", () => {
		expect(() => finiteLimit(-2)).toThrow("limit must be a non-negative integer");
		expect(() => finiteLimit(1.5)).toThrow("limit must be a non-negative integer");
	});
});
