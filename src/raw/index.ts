import type { HttpClient } from "../lib/http.js";
import type { TaskPool } from "../lib/pool.js";
import { RawDatabases } from "./databases.js";
import { type RawRowsOptions, RawRows } from "./rows.js";
import { RawTables } from "./tables.js";

export type { Database } from "./databases.js";
export type {
	Row,
	RowColumns,
	RowsChunksArgs,
	RowsFilter,
	RowsListArgs,
	RowWrite,
	RawRowsOptions,
} from "./rows.js";
export { columnsParam } from "./rows.js";
export type { Table } from "./tables.js";
export { RawDatabases, RawRows, RawTables };

/** Raw storage: schemaless databases of tables of keyed rows. */
export class Raw {
	public readonly databases: RawDatabases;
	public readonly tables: RawTables;
	public readonly rows: RawRows;

	constructor(http: HttpClient, pool: TaskPool, options?: RawRowsOptions) {
		this.databases = new RawDatabases(http);
		this.tables = new RawTables(http);
		this.rows = new RawRows(http, pool, options);
	}
}
