import createDebug from "debug";
import { CdpError, collectErrorsAndThrow, invalidArgument } from "../error.js";
import { type Result, settle } from "./result.js";

const debug = createDebug("cdp:tasks");

export type ExecuteTasksOptions = {
	/** Upper bound on tasks in flight at the same time. */
	maxWorkers: number;
};

export type CompoundErrorOptions<TTask, TItem> = {
	/** Items carried by a task, e.g. the chunk of rows it sent. */
	taskUnwrap: (task: TTask) => readonly TItem[];
	/** Identifier reported for each item, e.g. its `externalId`. */
	elementUnwrap?: (item: TItem) => unknown;
};

type Outcome = "successful" | "failed" | "unknown";

/**
 * Whether a failed task may still have taken effect.
 *
 * 4xx responses were rejected by the API and had no effect. 5xx responses,
 * and connection errors surfaced as 5xx, leave the outcome unknown.
 */
export function classifyFailure(error: unknown): Exclude<Outcome, "successful"> {
	if (error instanceof CdpError) {
		return error.status >= 500 ? "unknown" : "failed";
	}
	return "failed";
}

/**
 * Outcome of {@link executeTasks}: tasks split by outcome, results of the
 * successful tasks and the errors of the others, all in task order.
 */
export class TasksSummary<TTask, TResult> {
	constructor(
		public readonly successfulTasks: TTask[],
		public readonly failedTasks: TTask[],
		public readonly unknownTasks: TTask[],
		public readonly results: TResult[],
		public readonly errors: unknown[],
	) {}

	get hasErrors(): boolean {
		return this.errors.length > 0;
	}

	/**
	 * Flatten the results of all successful tasks.
	 *
	 * @example
	 * summary.joinedResults((res) => res.items);
	 */
	joinedResults<TItem>(unwrap: (result: TResult) => TItem | readonly TItem[]): TItem[] {
		const joined: TItem[] = [];
		for (const result of this.results) {
			const unwrapped = unwrap(result);
			if (isReadonlyArray(unwrapped)) {
				joined.push(...unwrapped);
			} else {
				joined.push(unwrapped);
			}
		}
		return joined;
	}

	/**
	 * Throw a single error describing every failed task, with the items of
	 * all tasks reported as `successful`, `failed` or `unknown`.
	 * Does nothing when every task succeeded.
	 */
	raiseCompoundErrorIfFailedTasks<TItem>(
		options: CompoundErrorOptions<TTask, TItem>,
	): void {
		if (!this.hasErrors) return;
		const { taskUnwrap } = options;
		const elementUnwrap: (item: TItem) => unknown =
			options.elementUnwrap ?? ((item) => item);
		const items = (tasks: TTask[]) =>
			tasks.flatMap((task) => taskUnwrap(task).map((item) => elementUnwrap(item)));

		collectErrorsAndThrow(this.errors, {
			successful: items(this.successfulTasks),
			failed: items(this.failedTasks),
			unknown: items(this.unknownTasks),
		});
	}
}

function isReadonlyArray<T>(value: T | readonly T[]): value is readonly T[] {
	return Array.isArray(value);
}

/**
 * Run `fn` for every task with at most `maxWorkers` calls in flight, and
 * collect every outcome instead of stopping at the first failure.
 *
 * @example
 * ```ts
 * const summary = await executeTasks(
 *   (chunk) => http.post("/assets", { items: chunk }),
 *   chunks,
 *   { maxWorkers: 5 },
 * );
 * summary.raiseCompoundErrorIfFailedTasks({ taskUnwrap: (chunk) => chunk });
 * ```
 */
export async function executeTasks<TTask, TResult>(
	fn: (task: TTask) => Promise<TResult>,
	tasks: readonly TTask[],
	{ maxWorkers }: ExecuteTasksOptions,
): Promise<TasksSummary<TTask, TResult>> {
	if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
		throw invalidArgument(`Number of workers should be >= 1, was ${maxWorkers}`);
	}

	const outcomes: Array<Result<TResult> | undefined> = new Array(tasks.length);
	let next = 0;

	const worker = async () => {
		while (next < tasks.length) {
			const index = next++;
			const task = tasks[index];
			if (task === undefined) continue;
			outcomes[index] = await settle(Promise.resolve().then(() => fn(task)));
		}
	};

	const workers = Math.min(maxWorkers, tasks.length);
	debug("executing %d tasks on %d workers", tasks.length, workers);
	await Promise.all(Array.from({ length: workers }, worker));

	const summary = new TasksSummary<TTask, TResult>([], [], [], [], []);
	tasks.forEach((task, index) => {
		const outcome = outcomes[index];
		if (!outcome) return;
		if (outcome.ok) {
			summary.successfulTasks.push(task);
			summary.results.push(outcome.value);
			return;
		}
		summary.errors.push(outcome.error);
		if (classifyFailure(outcome.error) === "unknown") {
			summary.unknownTasks.push(task);
		} else {
			summary.failedTasks.push(task);
		}
	});

	if (summary.hasErrors) {
		debug(
			"tasks done: %d successful, %d failed, %d unknown",
			summary.successfulTasks.length,
			summary.failedTasks.length,
			summary.unknownTasks.length,
		);
	}
	return summary;
}
