import { z } from "zod";
import { ResourceApi } from "./api-client.js";
import type { CdpRequestOptions } from "./common.js";
import { MetadataSchema, type Schema } from "./lib/decode.js";
import { type Identifier, IdentifierSequence } from "./lib/identifier.js";
import { ResourceUpdate, type UpdateMode, type UpdateSpec } from "./lib/update.js";
import type {
	ChunksArgs,
	DeleteArgs,
	IterateArgs,
	ListArgs,
	Metadata,
	RetrieveMultipleArgs,
	TimestampRange,
} from "./types.js";

export type TimeSeries = {
	id: number;
	externalId?: string;
	name?: string;
	isString: boolean;
	isStep: boolean;
	unit?: string;
	assetId?: number;
	description?: string;
	metadata?: Metadata;
	securityCategories?: number[];
	dataSetId?: number;
	createdTime: number;
	lastUpdatedTime: number;
};

export type TimeSeriesWrite = {
	externalId?: string;
	name?: string;
	isString?: boolean;
	isStep?: boolean;
	unit?: string;
	assetId?: number;
	description?: string;
	metadata?: Metadata;
	securityCategories?: number[];
	dataSetId?: number;
};

export type TimeSeriesReplace = TimeSeriesWrite & { id?: number };

export type TimeSeriesFilter = {
	name?: string;
	unit?: string;
	isString?: boolean;
	isStep?: boolean;
	metadata?: Metadata;
	assetIds?: number[];
	assetExternalIds?: string[];
	assetSubtreeIds?: Identifier[];
	dataSetIds?: Identifier[];
	externalIdPrefix?: string;
	createdTime?: TimestampRange;
	lastUpdatedTime?: TimestampRange;
};

const TimeSeriesSchema: Schema<TimeSeries> = z
	.object({
		id: z.number(),
		externalId: z.string().optional(),
		name: z.string().optional(),
		isString: z.boolean(),
		isStep: z.boolean(),
		unit: z.string().optional(),
		assetId: z.number().optional(),
		description: z.string().optional(),
		metadata: MetadataSchema.optional(),
		securityCategories: z.array(z.number()).optional(),
		dataSetId: z.number().optional(),
		createdTime: z.number(),
		lastUpdatedTime: z.number(),
	})
	.passthrough();

export const TIME_SERIES_UPDATE_SPEC: UpdateSpec<TimeSeriesReplace> = {
	externalId: { kind: "primitive", nullable: true },
	name: { kind: "primitive", nullable: true },
	isStep: { kind: "primitive" },
	unit: { kind: "primitive", nullable: true },
	assetId: { kind: "primitive", nullable: true },
	description: { kind: "primitive", nullable: true },
	metadata: { kind: "object" },
	securityCategories: { kind: "list" },
	dataSetId: { kind: "primitive", nullable: true },
};

export class TimeSeriesUpdate extends ResourceUpdate<TimeSeriesReplace> {
	constructor(identifier: Identifier) {
		super(TIME_SERIES_UPDATE_SPEC, identifier);
	}
}

export class TimeSeriesApi extends ResourceApi {
	protected readonly resourcePath = "/timeseries";

	/**
	 * List time series.
	 *
	 * @param args.partitions Read all time series through this many concurrent partitions
	 */
	public async list(
		args: ListArgs<TimeSeriesFilter> = {},
		options?: CdpRequestOptions,
	): Promise<TimeSeries[]> {
		return await this.listItems(
			{ method: "POST", filter: args.filter, limit: args.limit, partitions: args.partitions },
			TimeSeriesSchema,
			options,
		);
	}

	public iterate(
		args: IterateArgs<TimeSeriesFilter> = {},
		options?: CdpRequestOptions,
	): AsyncIterable<TimeSeries> {
		return this.iterateItems(
			{ method: "POST", filter: args.filter, limit: args.limit },
			TimeSeriesSchema,
			options,
		);
	}

	/** Iterate over time series in arrays of `chunkSize`, fetching pages as needed. */
	public chunks(
		args: ChunksArgs<TimeSeriesFilter>,
		options?: CdpRequestOptions,
	): AsyncIterable<TimeSeries[]> {
		return this.iterateChunks(
			{ method: "POST", filter: args.filter, limit: args.limit },
			args.chunkSize,
			TimeSeriesSchema,
			options,
		);
	}

	public async retrieve(
		identifier: Identifier,
		options?: CdpRequestOptions,
	): Promise<TimeSeries | undefined> {
		return await this.retrieveOne(IdentifierSequence.single(identifier), TimeSeriesSchema, options);
	}

	public async retrieveMultiple(
		args: RetrieveMultipleArgs,
		options?: CdpRequestOptions,
	): Promise<TimeSeries[]> {
		return await this.retrieveByIds(
			IdentifierSequence.load(args),
			TimeSeriesSchema,
			{ ignoreUnknownIds: args.ignoreUnknownIds },
			options,
		);
	}

	public async create(
		items: readonly TimeSeriesWrite[],
		options?: CdpRequestOptions,
	): Promise<TimeSeries[]> {
		return await this.createItems(items, TimeSeriesSchema, {}, options);
	}

	public async update(
		items: ReadonlyArray<TimeSeriesUpdate | TimeSeriesReplace>,
		mode: UpdateMode = "replaceIgnoreNull",
		options?: CdpRequestOptions,
	): Promise<TimeSeries[]> {
		return await this.updateItems(items, TIME_SERIES_UPDATE_SPEC, TimeSeriesSchema, mode, options);
	}

	public async delete(args: DeleteArgs, options?: CdpRequestOptions): Promise<void> {
		await this.deleteItems(
			IdentifierSequence.load(args),
			{ extra: { ignoreUnknownIds: args.ignoreUnknownIds ?? false } },
			options,
		);
	}
}
