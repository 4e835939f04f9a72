import { z } from "zod";
import { ResourceApi } from "../api-client.js";
import type { CdpRequestOptions } from "../common.js";
import { executeTasks } from "../lib/concurrency.js";
import type { Schema } from "../lib/decode.js";
import { splitIntoChunks } from "../lib/utils.js";

export type Database = {
	name: string;
	createdTime?: number;
};

const DatabaseSchema: Schema<Database> = z
	.object({ name: z.string(), createdTime: z.number().optional() })
	.passthrough();

export class RawDatabases extends ResourceApi {
	protected readonly resourcePath = "/raw/dbs";

	/**
	 * List databases.
	 *
	 * @param args.limit Max results (default 25; -1 for all)
	 */
	public async list(
		args: { limit?: number | null } = {},
		options?: CdpRequestOptions,
	): Promise<Database[]> {
		return await this.listItems({ method: "GET", limit: args.limit }, DatabaseSchema, options);
	}

	/** Iterate over all databases, fetching pages as needed. */
	public iterate(
		args: { limit?: number | null } = {},
		options?: CdpRequestOptions,
	): AsyncIterable<Database> {
		return this.iterateItems({ method: "GET", limit: args.limit }, DatabaseSchema, options);
	}

	/**
	 * Create one or more databases.
	 *
	 * @example
	 * ```ts
	 * await cdp.raw.databases.create(["staging", "landing"]);
	 * ```
	 */
	public async create(
		names: string | readonly string[],
		options?: CdpRequestOptions,
	): Promise<Database[]> {
		const items = (typeof names === "string" ? [names] : names).map((name) => ({ name }));
		return await this.createItems(items, DatabaseSchema, {}, options);
	}

	/**
	 * Delete one or more databases.
	 *
	 * @param recursive Also delete every table in the databases
	 */
	public async delete(
		names: string | readonly string[],
		recursive = false,
		options?: CdpRequestOptions,
	): Promise<void> {
		const items = (typeof names === "string" ? [names] : names).map((name) => ({ name }));
		const summary = await executeTasks(
			(chunk) =>
				this.http.post(
					`${this.resourcePath}/delete`,
					{ items: chunk, recursive },
					undefined,
					options,
				),
			splitIntoChunks(items, this.deleteLimit),
			{ maxWorkers: this.maxWorkers },
		);
		summary.raiseCompoundErrorIfFailedTasks({
			taskUnwrap: (chunk) => chunk,
			elementUnwrap: (item) => item.name,
		});
	}
}
