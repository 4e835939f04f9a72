import createDebug from "debug";
import { invalidArgument } from "../error.js";

const debug = createDebug("cdp:paginate");

/** Default number of items returned by eager `list` calls. */
export const DEFAULT_LIMIT_READ = 25;

/**
 * A page of a cursor-paginated listing.
 *
 * @template T The type of items in the page
 */
export interface Page<T> {
	readonly items: readonly T[];
	/** Cursor of the next page. Absent on the last page. */
	readonly nextCursor?: string | null;
}

/**
 * Fetches one page.
 * `limit` is the page size to request; `cursor` is absent for the first page.
 */
export type PageFetcher<T> = (request: {
	cursor?: string;
	limit: number;
}) => Promise<Page<T>>;

export type PaginateOptions = {
	/** Stop after this many items. `undefined`, `null`, `-1` and `Infinity` read everything. */
	limit?: number | null;
	/** Largest page the API accepts. */
	listLimit: number;
	/** Resume from this cursor instead of the start of the listing. */
	initialCursor?: string;
};

export type PaginateChunksOptions = PaginateOptions & {
	/** Number of items per yielded chunk; the last chunk may be shorter. */
	chunkSize: number;
};

export function isUnlimited(limit: number | null | undefined): boolean {
	return (
		limit === undefined || limit === null || limit === -1 || limit === Number.POSITIVE_INFINITY
	);
}

/** A finite, validated limit, or `undefined` when the limit means "everything". */
export function finiteLimit(limit: number | null | undefined): number | undefined {
	if (limit === undefined || limit === null || isUnlimited(limit)) return undefined;
	if (!Number.isInteger(limit) || limit < 0) {
		throw invalidArgument(
			`limit must be a non-negative integer, -1, Infinity or null, was ${limit}`,
		);
	}
	return limit;
}

async function* pages<T>(
	fetcher: PageFetcher<T>,
	pageSize: number,
	options: PaginateOptions,
): AsyncGenerator<readonly T[], void, undefined> {
	const limit = finiteLimit(options.limit);
	let cursor = options.initialCursor;
	let retrieved = 0;

	while (limit === undefined || retrieved < limit) {
		const requested =
			limit === undefined ? pageSize : Math.min(pageSize, limit - retrieved);
		debug({ cursor, requested });
		const page = await fetcher({ cursor, limit: requested });
		const items =
			limit !== undefined && page.items.length > limit - retrieved
				? page.items.slice(0, limit - retrieved)
				: page.items;
		retrieved += items.length;
		if (items.length > 0) yield items;

		if (!page.nextCursor || page.items.length === 0) break;
		cursor = page.nextCursor;
	}
}

/**
 * Creates a lazy async iterable that follows `nextCursor` until the listing
 * or the limit is exhausted, yielding items one at a time.
 *
 * @example
 * ```ts
 * const assets = paginate(
 *   ({ cursor, limit }) => http.post("/assets/list", { cursor, limit }).then(parsePage),
 *   { listLimit: 1000, limit: 5000 },
 * );
 * for await (const asset of assets) {
 *   console.log(asset.externalId);
 * }
 * ```
 */
export function paginate<T>(
	fetcher: PageFetcher<T>,
	options: PaginateOptions,
): AsyncIterable<T> {
	return {
		[Symbol.asyncIterator]: async function* () {
			for await (const items of pages(fetcher, options.listLimit, options)) {
				yield* items;
			}
		},
	};
}

/**
 * Like {@link paginate}, but yields arrays of `chunkSize` items.
 * Pages are requested at `chunkSize` when it fits in one request.
 */
export function paginateChunks<T>(
	fetcher: PageFetcher<T>,
	options: PaginateChunksOptions,
): AsyncIterable<T[]> {
	const { chunkSize } = options;
	if (!Number.isInteger(chunkSize) || chunkSize < 1) {
		throw invalidArgument(`chunkSize must be a positive integer, was ${chunkSize}`);
	}
	return {
		[Symbol.asyncIterator]: async function* () {
			let buffer: T[] = [];
			const pageSize = Math.min(options.listLimit, chunkSize);
			for await (const items of pages(fetcher, pageSize, options)) {
				buffer.push(...items);
				while (buffer.length >= chunkSize) {
					yield buffer.slice(0, chunkSize);
					buffer = buffer.slice(chunkSize);
				}
			}
			if (buffer.length > 0) yield buffer;
		},
	};
}

/** Collect all items from an async iterable into an array. */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
	const result: T[] = [];
	for await (const item of iterable) {
		result.push(item);
	}
	return result;
}
