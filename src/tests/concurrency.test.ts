import { describe, expect, it } from "vitest";
import { CdpApiError, CdpError, CdpNotFoundError } from "../error.js";
import { classifyFailure, executeTasks } from "../lib/concurrency.js";
import { sleep } from "../lib/retry.js";

describe("executeTasks", () => {
	it("returns results in task order", async () => {
		const summary = await executeTasks(
			async (n: number) => {
				await sleep(n === 1 ? 20 : 1);
				return n * 10;
			},
			[1, 2, 3],
			{ maxWorkers: 3 },
		);

		expect(summary.results).toEqual([10, 20, 30]);
		expect(summary.successfulTasks).toEqual([1, 2, 3]);
		expect(summary.hasErrors).toBe(false);
	});

	it("never runs more than maxWorkers tasks at once", async () => {
		let running = 0;
		let peak = 0;
		await executeTasks(
			async () => {
				running++;
				peak = Math.max(peak, running);
				await sleep(5);
				running--;
			},
			Array.from({ length: 12 }, (_, i) => i),
			{ maxWorkers: 4 },
		);

		expect(peak).toBe(4);
	});

	it("rejects maxWorkers below 1", async () => {
		await expect(executeTasks(async () => 1, [1], { maxWorkers: 0 })).rejects.toThrow(
			"Number of workers should be >= 1, was 0",
		);
	});

	it("sorts failures into failed and unknown", async () => {
		const summary = await executeTasks(
			async (task: string) => {
				if (task === "bad") throw new CdpApiError({ message: "Bad", status: 400 });
				if (task === "lost") throw new CdpApiError({ message: "Lost", status: 503 });
				return task;
			},
			["ok", "bad", "lost"],
			{ maxWorkers: 2 },
		);

		expect(summary.successfulTasks).toEqual(["ok"]);
		expect(summary.failedTasks).toEqual(["bad"]);
		expect(summary.unknownTasks).toEqual(["lost"]);
		expect(summary.errors).toHaveLength(2);
	});

	it("keeps running the remaining tasks after a failure", async () => {
		const seen: number[] = [];
		const summary = await executeTasks(
			async (n: number) => {
				seen.push(n);
				if (n === 1) throw new Error("boom");
				return n;
			},
			[1, 2, 3, 4],
			{ maxWorkers: 1 },
		);

		expect(seen).toEqual([1, 2, 3, 4]);
		expect(summary.results).toEqual([2, 3, 4]);
	});
});

describe("TasksSummary", () => {
	it("joins array and single results", async () => {
		const summary = await executeTasks(
			async (chunk: number[]) => (chunk.length === 1 ? chunk[0] ?? 0 : chunk),
			[[1, 2], [3], [4, 5]],
			{ maxWorkers: 2 },
		);

		expect(summary.joinedResults<number>((result) => result)).toEqual([1, 2, 3, 4, 5]);
	});

	it("raises a compound error with the items of every task by outcome", async () => {
		const summary = await executeTasks(
			async (chunk: Array<{ externalId: string }>) => {
				const first = chunk[0]?.externalId;
				if (first === "c") throw new CdpApiError({ message: "Rejected", status: 400 });
				if (first === "e") throw new CdpApiError({ message: "Timeout", status: 504 });
				return chunk;
			},
			[
				[{ externalId: "a" }, { externalId: "b" }],
				[{ externalId: "c" }, { externalId: "d" }],
				[{ externalId: "e" }],
			],
			{ maxWorkers: 3 },
		);

		let caught: unknown;
		try {
			summary.raiseCompoundErrorIfFailedTasks({
				taskUnwrap: (chunk) => chunk,
				elementUnwrap: (item: { externalId: string }) => item.externalId,
			});
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(CdpApiError);
		expect(caught).toMatchObject({
			successful: ["a", "b"],
			failed: ["c", "d"],
			unknown: ["e"],
		});
	});

	it("merges not-found errors across chunks", async () => {
		const summary = await executeTasks(
			async (id: number) => {
				throw new CdpNotFoundError({ notFound: [{ id }] });
			},
			[1, 2],
			{ maxWorkers: 2 },
		);

		expect(() =>
			summary.raiseCompoundErrorIfFailedTasks({ taskUnwrap: (id) => [id] }),
		).toThrow(CdpNotFoundError);
	});

	it("does nothing when every task succeeded", async () => {
		const summary = await executeTasks(async (n: number) => n, [1], { maxWorkers: 1 });
		expect(() => summary.raiseCompoundErrorIfFailedTasks({ taskUnwrap: (n) => [n] })).not.toThrow();
	});
});

describe("classifyFailure", () => {
	it("treats 5xx as unknown and everything else as failed", () => {
		expect(classifyFailure(new CdpError({ message: "x", status: 500 }))).toBe("unknown");
		expect(classifyFailure(new CdpError({ message: "x", status: 502 }))).toBe("unknown");
		expect(classifyFailure(new CdpError({ message: "x", status: 409 }))).toBe("failed");
		expect(classifyFailure(new Error("x"))).toBe("failed");
	});
});
