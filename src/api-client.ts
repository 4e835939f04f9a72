import type { CdpRequestOptions } from "./common.js";
import { CdpApiError, invalidArgument } from "./error.js";
import { executeTasks } from "./lib/concurrency.js";
import { type Schema, parseItem, parseItems, parsePage } from "./lib/decode.js";
import type { HttpClient, QueryParams } from "./lib/http.js";
import {
	type Identifier,
	type IdentifierSequence,
	identifierValue,
	unwrapIdentifier,
} from "./lib/identifier.js";
import {
	DEFAULT_LIMIT_READ,
	finiteLimit,
	type PageFetcher,
	paginate,
	paginateChunks,
} from "./lib/paginate.js";
import {
	type ItemPatch,
	ResourceUpdate,
	toPatchObject,
	type UpdateMode,
	type UpdateSpec,
} from "./lib/update.js";
import { splitIntoChunks } from "./lib/utils.js";

export type ListRequest = {
	/** `GET {path}` with the filter as query, or `POST {path}/list` with it in the body. */
	method: "GET" | "POST";
	/** Defaults to the resource path. */
	path?: string;
	filter?: Record<string, unknown>;
	/** Extra query parameters (GET) or body fields (POST). */
	extra?: Record<string, unknown>;
	limit?: number | null;
};

type ItemIdentity = { id?: number | null; externalId?: string | null };

/** Reports an item in a compound error by its id or external id, when it has one. */
function identityOf(item: unknown): unknown {
	if (item && typeof item === "object") {
		const id = "id" in item && typeof item.id === "number" ? item.id : undefined;
		const externalId =
			"externalId" in item && typeof item.externalId === "string"
				? item.externalId
				: undefined;
		const identifier = unwrapIdentifier({ id, externalId });
		if (identifier) return identifierValue(identifier);
	}
	return item;
}

function toQuery(values: Record<string, unknown> | undefined): QueryParams {
	const query: QueryParams = {};
	for (const [key, value] of Object.entries(values ?? {})) {
		if (
			typeof value === "string" ||
			typeof value === "number" ||
			typeof value === "boolean"
		) {
			query[key] = value;
		} else if (Array.isArray(value)) {
			query[key] = value.map(String);
		} else if (value !== undefined && value !== null) {
			query[key] = JSON.stringify(value);
		}
	}
	return query;
}

/**
 * Base class of every resource API: listing, retrieval and chunked bulk
 * writes on top of the project-scoped HTTP client.
 */
export abstract class ResourceApi {
	protected abstract readonly resourcePath: string;

	protected readonly createLimit: number = 1000;
	protected readonly listLimit: number = 1000;
	protected readonly retrieveLimit: number = 1000;
	protected readonly deleteLimit: number = 1000;
	protected readonly updateLimit: number = 1000;

	constructor(protected readonly http: HttpClient) {}

	protected get maxWorkers(): number {
		return this.http.maxWorkers;
	}

	protected pageFetcher<T>(
		request: ListRequest,
		schema: Schema<T>,
		options?: CdpRequestOptions,
	): PageFetcher<T> {
		const path = request.path ?? this.resourcePath;
		return async ({ cursor, limit }) => {
			if (request.method === "GET") {
				const data = await this.http.get(
					path,
					{ ...toQuery(request.filter), ...toQuery(request.extra), cursor, limit },
					options,
				);
				return parsePage(data, schema);
			}
			const data = await this.http.post(
				`${path}/list`,
				{ ...request.extra, filter: request.filter, cursor, limit },
				undefined,
				options,
			);
			return parsePage(data, schema);
		};
	}

	/** Lazily iterate over every item of a listing, up to `limit`. */
	protected iterateItems<T>(
		request: ListRequest,
		schema: Schema<T>,
		options?: CdpRequestOptions,
	): AsyncIterable<T> {
		return paginate(this.pageFetcher(request, schema, options), {
			limit: request.limit,
			listLimit: this.listLimit,
		});
	}

	protected iterateChunks<T>(
		request: ListRequest,
		chunkSize: number,
		schema: Schema<T>,
		options?: CdpRequestOptions & { initialCursor?: string },
	): AsyncIterable<T[]> {
		return paginateChunks(this.pageFetcher(request, schema, options), {
			limit: request.limit,
			listLimit: this.listLimit,
			chunkSize,
			initialCursor: options?.initialCursor,
		});
	}

	/**
	 * Eagerly list up to `limit` items (default 25).
	 * With `partitions`, the listing is split server-side into that many
	 * parts which are read concurrently; the limit must then be unlimited.
	 */
	protected async listItems<T>(
		request: ListRequest & { partitions?: number },
		schema: Schema<T>,
		options?: CdpRequestOptions,
	): Promise<T[]> {
		const limit = request.limit === undefined ? DEFAULT_LIMIT_READ : request.limit;
		if (request.partitions === undefined) {
			const items: T[] = [];
			for await (const item of this.iterateItems({ ...request, limit }, schema, options)) {
				items.push(item);
			}
			return items;
		}
		if (finiteLimit(limit) !== undefined) {
			throw invalidArgument("When using partitions, a finite limit can not be used");
		}
		return await this.listPartitioned(request, request.partitions, schema, options);
	}

	private async listPartitioned<T>(
		request: ListRequest,
		partitions: number,
		schema: Schema<T>,
		options?: CdpRequestOptions,
	): Promise<T[]> {
		if (!Number.isInteger(partitions) || partitions < 1) {
			throw invalidArgument(`partitions must be a positive integer, was ${partitions}`);
		}
		const tasks = Array.from({ length: partitions }, (_, i) => `${i + 1}/${partitions}`);
		const summary = await executeTasks(
			async (partition) => {
				const items: T[] = [];
				const pages = this.iterateItems(
					{
						...request,
						limit: null,
						extra: { ...request.extra, partition },
					},
					schema,
					options,
				);
				for await (const item of pages) items.push(item);
				return items;
			},
			tasks,
			{ maxWorkers: this.maxWorkers },
		);
		// A partition that failed leaves the listing incomplete
		const [error] = summary.errors;
		if (error !== undefined) throw error;
		return summary.joinedResults<T>((items) => items);
	}

	/**
	 * Retrieve items by identifier through `POST {path}/byids`, in chunks
	 * sent concurrently.
	 */
	protected async retrieveByIds<T>(
		identifiers: IdentifierSequence,
		schema: Schema<T>,
		args: { ignoreUnknownIds?: boolean; path?: string; extra?: Record<string, unknown> } = {},
		options?: CdpRequestOptions,
	): Promise<T[]> {
		const path = args.path ?? this.resourcePath;
		const chunks = identifiers.chunked(this.retrieveLimit);
		const summary = await executeTasks(
			async (chunk) =>
				parseItems(
					await this.http.post(
						`${path}/byids`,
						{
							...args.extra,
							items: chunk.asDicts(),
							ignoreUnknownIds: args.ignoreUnknownIds,
						},
						undefined,
						options,
					),
					schema,
				),
			chunks,
			{ maxWorkers: this.maxWorkers },
		);
		summary.raiseCompoundErrorIfFailedTasks({
			taskUnwrap: (chunk) => chunk.identifiers,
			elementUnwrap: (identifier: Identifier) => identifierValue(identifier),
		});
		return summary.joinedResults<T>((items) => items);
	}

	/** Retrieve one item, or `undefined` when it does not exist. */
	protected async retrieveOne<T>(
		identifiers: IdentifierSequence,
		schema: Schema<T>,
		options?: CdpRequestOptions,
	): Promise<T | undefined> {
		identifiers.assertSingleton();
		const [item] = await this.retrieveByIds(
			identifiers,
			schema,
			{ ignoreUnknownIds: true },
			options,
		);
		return item;
	}

	/** `GET` a single item, or `undefined` on 404 or a `missing` response. */
	protected async getOrUndefined<T>(
		path: string,
		schema: Schema<T>,
		options?: CdpRequestOptions,
	): Promise<T | undefined> {
		try {
			return parseItem(await this.http.get(path, undefined, options), schema);
		} catch (error) {
			if (error instanceof CdpApiError && (error.status === 404 || error.missing)) {
				return undefined;
			}
			throw error;
		}
	}

	/**
	 * Create items through `POST {path}` in chunks of `createLimit`, sent
	 * concurrently. Raises a compound error when any chunk fails.
	 */
	protected async createItems<W, T>(
		items: readonly W[],
		schema: Schema<T>,
		args: {
			path?: string;
			query?: QueryParams;
			extra?: Record<string, unknown>;
			limit?: number;
		} = {},
		options?: CdpRequestOptions,
	): Promise<T[]> {
		const path = args.path ?? this.resourcePath;
		const chunks = splitIntoChunks(items, args.limit ?? this.createLimit);
		const summary = await executeTasks(
			async (chunk) =>
				parseItems(
					await this.http.post(path, { ...args.extra, items: chunk }, args.query, options),
					schema,
				),
			chunks,
			{ maxWorkers: this.maxWorkers },
		);
		summary.raiseCompoundErrorIfFailedTasks({
			taskUnwrap: (chunk) => chunk,
			elementUnwrap: identityOf,
		});
		return summary.joinedResults<T>((created) => created);
	}

	/**
	 * Delete items through `POST {path}/delete` in chunks of `deleteLimit`.
	 */
	protected async deleteItems(
		identifiers: IdentifierSequence,
		args: { path?: string; extra?: Record<string, unknown>; query?: QueryParams } = {},
		options?: CdpRequestOptions,
	): Promise<void> {
		const path = args.path ?? this.resourcePath;
		const summary = await executeTasks(
			(chunk) =>
				this.http.post(
					`${path}/delete`,
					{ ...args.extra, items: chunk.asDicts() },
					args.query,
					options,
				),
			identifiers.chunked(this.deleteLimit),
			{ maxWorkers: this.maxWorkers },
		);
		summary.raiseCompoundErrorIfFailedTasks({
			taskUnwrap: (chunk) => chunk.identifiers,
			elementUnwrap: (identifier: Identifier) => identifierValue(identifier),
		});
	}

	/**
	 * Update items through `POST {path}/update`. Each item is either an
	 * update builder or a full write object converted with `mode`.
	 */
	protected async updateItems<W extends ItemIdentity, T>(
		items: ReadonlyArray<ResourceUpdate<W> | W>,
		spec: UpdateSpec<W>,
		schema: Schema<T>,
		mode: UpdateMode = "replaceIgnoreNull",
		options?: CdpRequestOptions,
	): Promise<T[]> {
		const patches: ItemPatch[] = items.map((item) =>
			item instanceof ResourceUpdate ? item.dump() : toPatchObject(item, spec, mode),
		);
		const summary = await executeTasks(
			async (chunk) =>
				parseItems(
					await this.http.post(
						`${this.resourcePath}/update`,
						{ items: chunk },
						undefined,
						options,
					),
					schema,
				),
			splitIntoChunks(patches, this.updateLimit),
			{ maxWorkers: this.maxWorkers },
		);
		summary.raiseCompoundErrorIfFailedTasks({
			taskUnwrap: (chunk) => chunk,
			elementUnwrap: identityOf,
		});
		return summary.joinedResults<T>((updated) => updated);
	}
}
