import { z } from "zod";
import { ResourceApi } from "../api-client.js";
import type { CdpRequestOptions } from "../common.js";
import { executeTasks } from "../lib/concurrency.js";
import type { Schema } from "../lib/decode.js";
import { interpolatePath } from "../lib/http.js";
import { splitIntoChunks } from "../lib/utils.js";

export type Table = {
	name: string;
	createdTime?: number;
};

const TableSchema: Schema<Table> = z
	.object({ name: z.string(), createdTime: z.number().optional() })
	.passthrough();

/** Tables of one database. Every method takes the database name first. */
export class RawTables extends ResourceApi {
	protected readonly resourcePath = "/raw/dbs/{}/tables";

	private path(dbName: string): string {
		return interpolatePath(this.resourcePath, dbName);
	}

	public async list(
		dbName: string,
		args: { limit?: number | null } = {},
		options?: CdpRequestOptions,
	): Promise<Table[]> {
		return await this.listItems(
			{ method: "GET", path: this.path(dbName), limit: args.limit },
			TableSchema,
			options,
		);
	}

	public iterate(
		dbName: string,
		args: { limit?: number | null } = {},
		options?: CdpRequestOptions,
	): AsyncIterable<Table> {
		return this.iterateItems(
			{ method: "GET", path: this.path(dbName), limit: args.limit },
			TableSchema,
			options,
		);
	}

	/**
	 * Create one or more tables.
	 *
	 * @param ensureParent Create the database as well when it does not exist
	 */
	public async create(
		dbName: string,
		names: string | readonly string[],
		ensureParent = false,
		options?: CdpRequestOptions,
	): Promise<Table[]> {
		const items = (typeof names === "string" ? [names] : names).map((name) => ({ name }));
		return await this.createItems(
			items,
			TableSchema,
			{ path: this.path(dbName), query: { ensureParent } },
			options,
		);
	}

	public async delete(
		dbName: string,
		names: string | readonly string[],
		options?: CdpRequestOptions,
	): Promise<void> {
		const items = (typeof names === "string" ? [names] : names).map((name) => ({ name }));
		const summary = await executeTasks(
			(chunk) =>
				this.http.post(`${this.path(dbName)}/delete`, { items: chunk }, undefined, options),
			splitIntoChunks(items, this.deleteLimit),
			{ maxWorkers: this.maxWorkers },
		);
		summary.raiseCompoundErrorIfFailedTasks({
			taskUnwrap: (chunk) => chunk,
			elementUnwrap: (item) => item.name,
		});
	}
}
