import { z } from "zod";
import { ResourceApi } from "./api-client.js";
import type { CdpRequestOptions } from "./common.js";
import { LabelRefSchema, MetadataSchema, type Schema } from "./lib/decode.js";
import { type Identifier, IdentifierSequence } from "./lib/identifier.js";
import { ResourceUpdate, type UpdateMode, type UpdateSpec } from "./lib/update.js";
import type {
	ChunksArgs,
	DeleteArgs,
	IterateArgs,
	LabelRef,
	ListArgs,
	Metadata,
	RetrieveMultipleArgs,
	TimestampRange,
} from "./types.js";

export type Asset = {
	id: number;
	externalId?: string;
	name: string;
	parentId?: number;
	parentExternalId?: string;
	rootId?: number;
	description?: string;
	dataSetId?: number;
	metadata?: Metadata;
	source?: string;
	labels?: LabelRef[];
	createdTime: number;
	lastUpdatedTime: number;
};

export type AssetWrite = {
	externalId?: string;
	name: string;
	/** Parent by internal id. Mutually exclusive with `parentExternalId`. */
	parentId?: number;
	parentExternalId?: string;
	description?: string;
	dataSetId?: number;
	metadata?: Metadata;
	source?: string;
	labels?: LabelRef[];
};

/** A full asset definition used to update an existing asset by id or external id. */
export type AssetReplace = Partial<AssetWrite> & { id?: number };

export type AssetFilter = {
	name?: string;
	parentIds?: number[];
	parentExternalIds?: string[];
	rootIds?: Identifier[];
	assetSubtreeIds?: Identifier[];
	dataSetIds?: Identifier[];
	metadata?: Metadata;
	source?: string;
	createdTime?: TimestampRange;
	lastUpdatedTime?: TimestampRange;
	root?: boolean;
	externalIdPrefix?: string;
	labels?: { containsAny: LabelRef[] } | { containsAll: LabelRef[] };
};

const AssetSchema: Schema<Asset> = z
	.object({
		id: z.number(),
		externalId: z.string().optional(),
		name: z.string(),
		parentId: z.number().optional(),
		parentExternalId: z.string().optional(),
		rootId: z.number().optional(),
		description: z.string().optional(),
		dataSetId: z.number().optional(),
		metadata: MetadataSchema.optional(),
		source: z.string().optional(),
		labels: z.array(LabelRefSchema).optional(),
		createdTime: z.number(),
		lastUpdatedTime: z.number(),
	})
	.passthrough();

export const ASSET_UPDATE_SPEC: UpdateSpec<AssetReplace> = {
	externalId: { kind: "primitive", nullable: true },
	name: { kind: "primitive" },
	parentId: { kind: "primitive" },
	parentExternalId: { kind: "primitive" },
	description: { kind: "primitive", nullable: true },
	dataSetId: { kind: "primitive", nullable: true },
	metadata: { kind: "object" },
	source: { kind: "primitive", nullable: true },
	labels: { kind: "list" },
};

/** Update builder for assets. */
export class AssetUpdate extends ResourceUpdate<AssetReplace> {
	constructor(identifier: Identifier) {
		super(ASSET_UPDATE_SPEC, identifier);
	}
}

export class Assets extends ResourceApi {
	protected readonly resourcePath = "/assets";

	/**
	 * List assets.
	 *
	 * @param args.filter Filter on name, parents, metadata and more
	 * @param args.limit Max results (default 25; -1 for all)
	 * @param args.partitions Read all assets through this many concurrent partitions
	 */
	public async list(
		args: ListArgs<AssetFilter> = {},
		options?: CdpRequestOptions,
	): Promise<Asset[]> {
		return await this.listItems(
			{ method: "POST", filter: args.filter, limit: args.limit, partitions: args.partitions },
			AssetSchema,
			options,
		);
	}

	/**
	 * Iterate over assets, fetching pages as needed.
	 *
	 * @example
	 * ```ts
	 * for await (const asset of cdp.assets.iterate({ filter: { root: true } })) {
	 *   console.log(asset.name);
	 * }
	 * ```
	 */
	public iterate(
		args: IterateArgs<AssetFilter> = {},
		options?: CdpRequestOptions,
	): AsyncIterable<Asset> {
		return this.iterateItems(
			{ method: "POST", filter: args.filter, limit: args.limit },
			AssetSchema,
			options,
		);
	}

	/** Iterate over assets in arrays of `chunkSize`, fetching pages as needed. */
	public chunks(
		args: ChunksArgs<AssetFilter>,
		options?: CdpRequestOptions,
	): AsyncIterable<Asset[]> {
		return this.iterateChunks(
			{ method: "POST", filter: args.filter, limit: args.limit },
			args.chunkSize,
			AssetSchema,
			options,
		);
	}

	/** Retrieve one asset by id or external id, or `undefined` if it does not exist. */
	public async retrieve(
		identifier: Identifier,
		options?: CdpRequestOptions,
	): Promise<Asset | undefined> {
		return await this.retrieveOne(IdentifierSequence.single(identifier), AssetSchema, options);
	}

	public async retrieveMultiple(
		args: RetrieveMultipleArgs,
		options?: CdpRequestOptions,
	): Promise<Asset[]> {
		return await this.retrieveByIds(
			IdentifierSequence.load(args),
			AssetSchema,
			{ ignoreUnknownIds: args.ignoreUnknownIds },
			options,
		);
	}

	/**
	 * Create assets. Large inputs are split into requests of 1000 assets,
	 * sent concurrently.
	 */
	public async create(
		items: readonly AssetWrite[],
		options?: CdpRequestOptions,
	): Promise<Asset[]> {
		return await this.createItems(items, AssetSchema, {}, options);
	}

	/**
	 * Update assets, from builders or from full definitions.
	 *
	 * @param mode How a full definition is applied; ignored for builders
	 */
	public async update(
		items: ReadonlyArray<AssetUpdate | AssetReplace>,
		mode: UpdateMode = "replaceIgnoreNull",
		options?: CdpRequestOptions,
	): Promise<Asset[]> {
		return await this.updateItems(items, ASSET_UPDATE_SPEC, AssetSchema, mode, options);
	}

	/**
	 * Delete assets.
	 *
	 * @param args.recursive Also delete every descendant of the given assets
	 * @param args.ignoreUnknownIds Do not fail on identifiers that do not exist
	 */
	public async delete(
		args: DeleteArgs & { recursive?: boolean },
		options?: CdpRequestOptions,
	): Promise<void> {
		await this.deleteItems(
			IdentifierSequence.load(args),
			{
				extra: {
					recursive: args.recursive ?? false,
					ignoreUnknownIds: args.ignoreUnknownIds ?? false,
				},
			},
			options,
		);
	}
}
