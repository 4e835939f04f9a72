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

export type Event = {
	id: number;
	externalId?: string;
	startTime?: number;
	endTime?: number;
	type?: string;
	subtype?: string;
	description?: string;
	metadata?: Metadata;
	assetIds?: number[];
	source?: string;
	dataSetId?: number;
	createdTime: number;
	lastUpdatedTime: number;
};

export type EventWrite = {
	externalId?: string;
	startTime?: number;
	endTime?: number;
	type?: string;
	subtype?: string;
	description?: string;
	metadata?: Metadata;
	assetIds?: number[];
	source?: string;
	dataSetId?: number;
};

export type EventReplace = EventWrite & { id?: number };

export type EventFilter = {
	startTime?: TimestampRange;
	endTime?: TimestampRange & { isNull?: boolean };
	activeAtTime?: TimestampRange;
	metadata?: Metadata;
	assetIds?: number[];
	assetExternalIds?: string[];
	assetSubtreeIds?: Identifier[];
	dataSetIds?: Identifier[];
	source?: string;
	type?: string;
	subtype?: string;
	createdTime?: TimestampRange;
	lastUpdatedTime?: TimestampRange;
	externalIdPrefix?: string;
};

const EventSchema: Schema<Event> = z
	.object({
		id: z.number(),
		externalId: z.string().optional(),
		startTime: z.number().optional(),
		endTime: z.number().optional(),
		type: z.string().optional(),
		subtype: z.string().optional(),
		description: z.string().optional(),
		metadata: MetadataSchema.optional(),
		assetIds: z.array(z.number()).optional(),
		source: z.string().optional(),
		dataSetId: z.number().optional(),
		createdTime: z.number(),
		lastUpdatedTime: z.number(),
	})
	.passthrough();

export const EVENT_UPDATE_SPEC: UpdateSpec<EventReplace> = {
	externalId: { kind: "primitive", nullable: true },
	startTime: { kind: "primitive", nullable: true },
	endTime: { kind: "primitive", nullable: true },
	type: { kind: "primitive", nullable: true },
	subtype: { kind: "primitive", nullable: true },
	description: { kind: "primitive", nullable: true },
	metadata: { kind: "object" },
	assetIds: { kind: "list" },
	source: { kind: "primitive", nullable: true },
	dataSetId: { kind: "primitive", nullable: true },
};

export class EventUpdate extends ResourceUpdate<EventReplace> {
	constructor(identifier: Identifier) {
		super(EVENT_UPDATE_SPEC, identifier);
	}
}

export class Events extends ResourceApi {
	protected readonly resourcePath = "/events";

	/**
	 * List events.
	 *
	 * @param args.filter Filter on time ranges, assets, type and more
	 * @param args.limit Max results (default 25; -1 for all)
	 * @param args.partitions Read all events through this many concurrent partitions
	 */
	public async list(
		args: ListArgs<EventFilter> = {},
		options?: CdpRequestOptions,
	): Promise<Event[]> {
		return await this.listItems(
			{ method: "POST", filter: args.filter, limit: args.limit, partitions: args.partitions },
			EventSchema,
			options,
		);
	}

	/** Iterate over events, fetching pages as needed. */
	public iterate(
		args: IterateArgs<EventFilter> = {},
		options?: CdpRequestOptions,
	): AsyncIterable<Event> {
		return this.iterateItems(
			{ method: "POST", filter: args.filter, limit: args.limit },
			EventSchema,
			options,
		);
	}

	/** Iterate over events in arrays of `chunkSize`, fetching pages as needed. */
	public chunks(
		args: ChunksArgs<EventFilter>,
		options?: CdpRequestOptions,
	): AsyncIterable<Event[]> {
		return this.iterateChunks(
			{ method: "POST", filter: args.filter, limit: args.limit },
			args.chunkSize,
			EventSchema,
			options,
		);
	}

	public async retrieve(
		identifier: Identifier,
		options?: CdpRequestOptions,
	): Promise<Event | undefined> {
		return await this.retrieveOne(IdentifierSequence.single(identifier), EventSchema, options);
	}

	public async retrieveMultiple(
		args: RetrieveMultipleArgs,
		options?: CdpRequestOptions,
	): Promise<Event[]> {
		return await this.retrieveByIds(
			IdentifierSequence.load(args),
			EventSchema,
			{ ignoreUnknownIds: args.ignoreUnknownIds },
			options,
		);
	}

	public async create(
		items: readonly EventWrite[],
		options?: CdpRequestOptions,
	): Promise<Event[]> {
		return await this.createItems(items, EventSchema, {}, options);
	}

	public async update(
		items: ReadonlyArray<EventUpdate | EventReplace>,
		mode: UpdateMode = "replaceIgnoreNull",
		options?: CdpRequestOptions,
	): Promise<Event[]> {
		return await this.updateItems(items, EVENT_UPDATE_SPEC, EventSchema, mode, options);
	}

	public async delete(args: DeleteArgs, options?: CdpRequestOptions): Promise<void> {
		await this.deleteItems(
			IdentifierSequence.load(args),
			{ extra: { ignoreUnknownIds: args.ignoreUnknownIds ?? false } },
			options,
		);
	}
}
