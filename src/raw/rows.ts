import createDebug from "debug";
import { z } from "zod";
import { ResourceApi } from "../api-client.js";
import type { CdpRequestOptions } from "../common.js";
import { invalidArgument } from "../error.js";
import { executeTasks } from "../lib/concurrency.js";
import { parseItems, type Schema } from "../lib/decode.js";
import { type HttpClient, interpolatePath } from "../lib/http.js";
import { DEFAULT_LIMIT_READ, finiteLimit } from "../lib/paginate.js";
import { readPartitioned } from "../lib/partitioned.js";
import type { TaskPool } from "../lib/pool.js";
import { splitIntoChunks } from "../lib/utils.js";

const debug = createDebug("cdp:raw:rows");

/** Largest limit one partition is given when the total is finite. */
const ROWS_PER_PARTITION = 20_000;
const MIN_PARTITIONED_CHUNK_SIZE = 1000;
const DEFAULT_PARTITIONED_CHUNK_SIZE = 10_000;

export type RowColumns = Record<string, unknown>;

export type Row = {
	key: string;
	columns: RowColumns;
	lastUpdatedTime: number;
};

export type RowWrite = {
	key: string;
	columns: RowColumns;
};

export type RowsFilter = {
	/** Rows last updated after this time (exclusive), ms since epoch. */
	minLastUpdatedTime?: number;
	/** Rows last updated before this time (inclusive), ms since epoch. */
	maxLastUpdatedTime?: number;
	/** Columns to return. `undefined` returns all, `[]` returns only the row keys. */
	columns?: readonly string[];
};

export type RowsChunksArgs = RowsFilter & {
	/**
	 * Rows per chunk. Serial reads default to pages of 10000; partitioned
	 * reads default to 10000 and never go below 1000.
	 */
	chunkSize?: number;
	/** Total number of rows to read. Omit (or -1) to read the whole table. */
	limit?: number | null;
	/**
	 * Read through this many concurrent partitions, capped at the client's
	 * `maxWorkers`. Serial when omitted.
	 */
	partitions?: number;
};

export type RowsListArgs = RowsFilter & {
	/**
	 * @default 25
	 */
	limit?: number | null;
	/**
	 * Concurrent partitions. Defaults to `maxWorkers` for an unlimited
	 * limit, and to a serial read otherwise.
	 */
	partitions?: number;
};

export type RawRowsOptions = {
	/**
	 * Unit of the random sleep of a partition that finds the queue of
	 * unconsumed chunks full.
	 * @default 1000
	 */
	backoffUnitMillis?: number;
};

const RowSchema: Schema<Row> = z
	.object({ key: z.string(), columns: z.record(z.unknown()), lastUpdatedTime: z.number() })
	.passthrough();

/** The `columns` query parameter: all columns, keys only, or a selection. */
export function columnsParam(columns: readonly string[] | undefined): string | undefined {
	if (columns === undefined) return undefined;
	if (columns.length === 0) return ",";
	return columns.join(",");
}

/**
 * Rows of raw tables: keyed JSON objects, read serially or through
 * concurrent server-issued partitions.
 */
export class RawRows extends ResourceApi {
	protected readonly resourcePath = "/raw/dbs/{}/tables/{}/rows";
	protected override readonly createLimit = 5000;
	protected override readonly listLimit = 10_000;

	private readonly pool: TaskPool;
	private readonly backoffUnitMillis: number | undefined;

	constructor(http: HttpClient, pool: TaskPool, options: RawRowsOptions = {}) {
		super(http);
		this.pool = pool;
		this.backoffUnitMillis = options.backoffUnitMillis;
	}

	private path(dbName: string, tableName: string): string {
		return interpolatePath(this.resourcePath, dbName, tableName);
	}

	/**
	 * Iterate over the rows of a table one at a time, fetching pages as
	 * needed. Reads serially; use {@link RawRows.chunks} with `partitions`
	 * for concurrent reads.
	 */
	public async *iterate(
		dbName: string,
		tableName: string,
		args: RowsFilter & { limit?: number | null } = {},
		options?: CdpRequestOptions,
	): AsyncGenerator<Row, void, undefined> {
		for await (const chunk of this.chunks(dbName, tableName, args, options)) {
			yield* chunk;
		}
	}

	/**
	 * Iterate over the rows of a table in chunks.
	 *
	 * With `partitions`, the table is read through that many concurrent
	 * cursors. Memory stays bounded at about `2 * partitions * chunkSize`
	 * rows: partitions pause while the caller is slower than the reads.
	 * Chunks of different partitions arrive in no particular order.
	 *
	 * @example
	 * ```ts
	 * for await (const rows of cdp.raw.rows.chunks("db", "events", {
	 *   partitions: 5,
	 *   chunkSize: 5000,
	 *   limit: 1_000_000,
	 * })) {
	 *   await process(rows);
	 * }
	 * ```
	 */
	public chunks(
		dbName: string,
		tableName: string,
		args: RowsChunksArgs = {},
		options?: CdpRequestOptions,
	): AsyncIterable<Row[]> {
		if (args.partitions === undefined) {
			return this.iterateChunks(
				{
					method: "GET",
					path: this.path(dbName, tableName),
					limit: args.limit,
					extra: {
						minLastUpdatedTime: args.minLastUpdatedTime,
						maxLastUpdatedTime: args.maxLastUpdatedTime,
						columns: columnsParam(args.columns),
					},
				},
				args.chunkSize ?? this.listLimit,
				RowSchema,
				options,
			);
		}
		return this.chunksPartitioned(dbName, tableName, args.partitions, args, options);
	}

	private async *chunksPartitioned(
		dbName: string,
		tableName: string,
		requested: number,
		args: RowsChunksArgs,
		options?: CdpRequestOptions,
	): AsyncGenerator<Row[], void, undefined> {
		if (!Number.isInteger(requested) || requested < 1) {
			throw invalidArgument(`partitions must be a positive integer, was ${requested}`);
		}
		const limit = finiteLimit(args.limit);
		let partitions = Math.min(requested, this.maxWorkers);
		if (limit !== undefined) {
			if (limit === 0) return;
			partitions = Math.min(partitions, Math.ceil(limit / ROWS_PER_PARTITION));
			if (args.chunkSize !== undefined && limit < args.chunkSize) {
				throw invalidArgument(
					`chunkSize (${args.chunkSize}) should be much smaller than limit (${limit})`,
				);
			}
		}
		const chunkSize = Math.max(
			MIN_PARTITIONED_CHUNK_SIZE,
			args.chunkSize ?? DEFAULT_PARTITIONED_CHUNK_SIZE,
		);

		const cursors = await this.parallelCursors(dbName, tableName, args, partitions, options);
		debug("reading %s/%s through %d partitions", dbName, tableName, cursors.length);

		// The last-updated-time range is encoded in the cursors
		const columns = columnsParam(args.columns);
		yield* readPartitioned({
			cursors,
			pool: this.pool,
			limit,
			backoffUnitMillis: this.backoffUnitMillis,
			readPartition: (cursor) =>
				this.iterateChunks(
					{
						method: "GET",
						path: this.path(dbName, tableName),
						limit: null,
						extra: { columns },
					},
					chunkSize,
					RowSchema,
					{ ...options, initialCursor: cursor },
				),
		});
	}

	private async parallelCursors(
		dbName: string,
		tableName: string,
		filter: RowsFilter,
		numberOfCursors: number,
		options?: CdpRequestOptions,
	): Promise<string[]> {
		const data = await this.http.get(
			interpolatePath("/raw/dbs/{}/tables/{}/cursors", dbName, tableName),
			{
				minLastUpdatedTime: filter.minLastUpdatedTime,
				maxLastUpdatedTime: filter.maxLastUpdatedTime,
				numberOfCursors,
			},
			options,
		);
		return parseItems(data, z.string());
	}

	/**
	 * List rows of a table.
	 *
	 * An unlimited `limit` without `partitions` reads the table through
	 * `maxWorkers` concurrent partitions.
	 */
	public async list(
		dbName: string,
		tableName: string,
		args: RowsListArgs = {},
		options?: CdpRequestOptions,
	): Promise<Row[]> {
		const limit = args.limit === undefined ? DEFAULT_LIMIT_READ : args.limit;
		const finite = finiteLimit(limit);
		let partitions = args.partitions;
		let chunkSize: number | undefined;
		if (partitions === undefined) {
			if (finite === undefined) {
				partitions = this.maxWorkers;
			} else if (finite === 0) {
				return [];
			} else {
				// Serial, in as few requests as possible
				chunkSize = finite;
			}
		}

		const rows: Row[] = [];
		const chunks = this.chunks(
			dbName,
			tableName,
			{ ...args, limit, partitions, chunkSize },
			options,
		);
		for await (const chunk of chunks) rows.push(...chunk);
		return rows;
	}

	/** Retrieve one row by key, or `undefined` if it does not exist. */
	public async retrieve(
		dbName: string,
		tableName: string,
		key: string,
		options?: CdpRequestOptions,
	): Promise<Row | undefined> {
		return await this.getOrUndefined(
			`${this.path(dbName, tableName)}/${encodeURIComponent(key)}`,
			RowSchema,
			options,
		);
	}

	/**
	 * Insert or overwrite rows, in requests of 5000 rows sent concurrently.
	 *
	 * @param rows Rows, or an object mapping each row key to its columns
	 * @param ensureParent Create the database and table when they do not exist
	 *
	 * @example
	 * ```ts
	 * await cdp.raw.rows.insert("db", "table", {
	 *   "key-1": { col1: 1, col2: 2 },
	 *   "key-2": { col1: 3, col2: "high five" },
	 * });
	 * ```
	 */
	public async insert(
		dbName: string,
		tableName: string,
		rows: readonly RowWrite[] | Record<string, RowColumns>,
		ensureParent = false,
		options?: CdpRequestOptions,
	): Promise<void> {
		const items: RowWrite[] = RowSchemaList(rows)
			? rows.map(({ key, columns }) => ({ key, columns }))
			: Object.entries(rows).map(([key, columns]) => ({ key, columns }));
		const summary = await executeTasks(
			(chunk) =>
				this.http.post(
					this.path(dbName, tableName),
					{ items: chunk },
					{ ensureParent },
					options,
				),
			splitIntoChunks(items, this.createLimit),
			{ maxWorkers: this.maxWorkers },
		);
		summary.raiseCompoundErrorIfFailedTasks({
			taskUnwrap: (chunk) => chunk,
			elementUnwrap: (row) => row.key,
		});
	}

	/** Delete rows by key, in requests of 1000 keys sent concurrently. */
	public async delete(
		dbName: string,
		tableName: string,
		keys: string | readonly string[],
		options?: CdpRequestOptions,
	): Promise<void> {
		const items = (typeof keys === "string" ? [keys] : keys).map((key) => ({ key }));
		const summary = await executeTasks(
			(chunk) =>
				this.http.post(
					`${this.path(dbName, tableName)}/delete`,
					{ items: chunk },
					undefined,
					options,
				),
			splitIntoChunks(items, this.deleteLimit),
			{ maxWorkers: this.maxWorkers },
		);
		summary.raiseCompoundErrorIfFailedTasks({
			taskUnwrap: (chunk) => chunk,
			elementUnwrap: (item) => item.key,
		});
	}
}

function RowSchemaList(
	rows: readonly RowWrite[] | Record<string, RowColumns>,
): rows is readonly RowWrite[] {
	return Array.isArray(rows);
}
