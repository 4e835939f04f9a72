import { z } from "zod";
import { ResourceApi } from "./api-client.js";
import type { CdpRequestOptions } from "./common.js";
import { executeTasks } from "./lib/concurrency.js";
import { LabelRefSchema, MetadataSchema, parseItem, parseItems, type Schema } from "./lib/decode.js";
import { type Identifier, IdentifierSequence, identifierValue } from "./lib/identifier.js";
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

export type FileMetadata = {
	id: number;
	externalId?: string;
	name: string;
	directory?: string;
	source?: string;
	mimeType?: string;
	metadata?: Metadata;
	assetIds?: number[];
	dataSetId?: number;
	labels?: LabelRef[];
	sourceCreatedTime?: number;
	sourceModifiedTime?: number;
	uploaded: boolean;
	uploadedTime?: number;
	createdTime: number;
	lastUpdatedTime: number;
};

export type FileMetadataWrite = {
	externalId?: string;
	name: string;
	directory?: string;
	source?: string;
	mimeType?: string;
	metadata?: Metadata;
	assetIds?: number[];
	dataSetId?: number;
	labels?: LabelRef[];
	sourceCreatedTime?: number;
	sourceModifiedTime?: number;
};

export type FileMetadataReplace = Partial<FileMetadataWrite> & { id?: number };

/** File metadata as returned on creation, with the URL to upload the content to. */
export type CreatedFile = FileMetadata & { uploadUrl: string };

export type FileFilter = {
	name?: string;
	directoryPrefix?: string;
	mimeType?: string;
	metadata?: Metadata;
	assetIds?: number[];
	assetSubtreeIds?: Identifier[];
	dataSetIds?: Identifier[];
	labels?: { containsAny: LabelRef[] } | { containsAll: LabelRef[] };
	source?: string;
	createdTime?: TimestampRange;
	lastUpdatedTime?: TimestampRange;
	uploadedTime?: TimestampRange;
	uploaded?: boolean;
	externalIdPrefix?: string;
};

export type DownloadUrl = Identifier & { downloadUrl: string };

const fileFields = {
	id: z.number(),
	externalId: z.string().optional(),
	name: z.string(),
	directory: z.string().optional(),
	source: z.string().optional(),
	mimeType: z.string().optional(),
	metadata: MetadataSchema.optional(),
	assetIds: z.array(z.number()).optional(),
	dataSetId: z.number().optional(),
	labels: z.array(LabelRefSchema).optional(),
	sourceCreatedTime: z.number().optional(),
	sourceModifiedTime: z.number().optional(),
	uploaded: z.boolean(),
	uploadedTime: z.number().optional(),
	createdTime: z.number(),
	lastUpdatedTime: z.number(),
};

const FileSchema: Schema<FileMetadata> = z.object(fileFields).passthrough();
const CreatedFileSchema: Schema<CreatedFile> = z
	.object({ ...fileFields, uploadUrl: z.string() })
	.passthrough();
const DownloadUrlSchema: Schema<DownloadUrl> = z.union([
	z.object({ id: z.number(), downloadUrl: z.string() }).passthrough(),
	z.object({ externalId: z.string(), downloadUrl: z.string() }).passthrough(),
]);

export const FILE_UPDATE_SPEC: UpdateSpec<FileMetadataReplace> = {
	externalId: { kind: "primitive", nullable: true },
	directory: { kind: "primitive", nullable: true },
	source: { kind: "primitive", nullable: true },
	mimeType: { kind: "primitive", nullable: true },
	metadata: { kind: "object" },
	assetIds: { kind: "list" },
	dataSetId: { kind: "primitive", nullable: true },
	labels: { kind: "list" },
	sourceCreatedTime: { kind: "primitive", nullable: true },
	sourceModifiedTime: { kind: "primitive", nullable: true },
};

export class FileMetadataUpdate extends ResourceUpdate<FileMetadataReplace> {
	constructor(identifier: Identifier) {
		super(FILE_UPDATE_SPEC, identifier);
	}
}

export class Files extends ResourceApi {
	protected readonly resourcePath = "/files";
	protected override readonly retrieveLimit = 100;

	public async list(
		args: ListArgs<FileFilter> = {},
		options?: CdpRequestOptions,
	): Promise<FileMetadata[]> {
		return await this.listItems(
			{ method: "POST", filter: args.filter, limit: args.limit, partitions: args.partitions },
			FileSchema,
			options,
		);
	}

	public iterate(
		args: IterateArgs<FileFilter> = {},
		options?: CdpRequestOptions,
	): AsyncIterable<FileMetadata> {
		return this.iterateItems(
			{ method: "POST", filter: args.filter, limit: args.limit },
			FileSchema,
			options,
		);
	}

	/** Iterate over files in arrays of `chunkSize`, fetching pages as needed. */
	public chunks(
		args: ChunksArgs<FileFilter>,
		options?: CdpRequestOptions,
	): AsyncIterable<FileMetadata[]> {
		return this.iterateChunks(
			{ method: "POST", filter: args.filter, limit: args.limit },
			args.chunkSize,
			FileSchema,
			options,
		);
	}

	public async retrieve(
		identifier: Identifier,
		options?: CdpRequestOptions,
	): Promise<FileMetadata | undefined> {
		return await this.retrieveOne(IdentifierSequence.single(identifier), FileSchema, options);
	}

	public async retrieveMultiple(
		args: RetrieveMultipleArgs,
		options?: CdpRequestOptions,
	): Promise<FileMetadata[]> {
		return await this.retrieveByIds(
			IdentifierSequence.load(args),
			FileSchema,
			{ ignoreUnknownIds: args.ignoreUnknownIds },
			options,
		);
	}

	/**
	 * Create the metadata of a file. The content is uploaded separately to
	 * the returned `uploadUrl`, see {@link Files.upload}.
	 *
	 * @param overwrite Replace the metadata of an existing file with the same external id
	 */
	public async create(
		file: FileMetadataWrite,
		overwrite = false,
		options?: CdpRequestOptions,
	): Promise<CreatedFile> {
		const data = await this.http.post(this.resourcePath, file, { overwrite }, options);
		return parseItem(data, CreatedFileSchema);
	}

	/**
	 * Create a file and upload its content.
	 *
	 * @example
	 * ```ts
	 * const file = await cdp.files.upload(
	 *   { name: "report.csv", externalId: "report-2024", mimeType: "text/csv" },
	 *   await readFile("report.csv"),
	 * );
	 * ```
	 */
	public async upload(
		file: FileMetadataWrite,
		content: Uint8Array | string,
		overwrite = false,
		options?: CdpRequestOptions,
	): Promise<FileMetadata> {
		const { uploadUrl, ...metadata } = await this.create(file, overwrite, options);
		await this.http.upload(
			uploadUrl,
			content,
			file.mimeType ?? "application/octet-stream",
			options,
		);
		return { ...metadata, uploaded: true };
	}

	/**
	 * Get temporary download URLs, in chunks sent concurrently.
	 *
	 * @returns URL per id or external id, in the form the file was asked for
	 */
	public async retrieveDownloadUrls(
		args: { ids?: readonly number[]; externalIds?: readonly string[] },
		options?: CdpRequestOptions,
	): Promise<Map<number | string, string>> {
		const identifiers = IdentifierSequence.load(args);
		const summary = await executeTasks(
			async (chunk: IdentifierSequence) =>
				parseItems(
					await this.http.post(
						`${this.resourcePath}/downloadlink`,
						{ items: chunk.asDicts() },
						undefined,
						options,
					),
					DownloadUrlSchema,
				),
			identifiers.chunked(this.retrieveLimit),
			{ maxWorkers: this.maxWorkers },
		);
		summary.raiseCompoundErrorIfFailedTasks({
			taskUnwrap: (chunk) => chunk.identifiers,
			elementUnwrap: (identifier: Identifier) => identifierValue(identifier),
		});
		const urls = new Map<number | string, string>();
		for (const link of summary.joinedResults<DownloadUrl>((links) => links)) {
			urls.set(identifierValue(link), link.downloadUrl);
		}
		return urls;
	}

	public async update(
		items: ReadonlyArray<FileMetadataUpdate | FileMetadataReplace>,
		mode: UpdateMode = "replaceIgnoreNull",
		options?: CdpRequestOptions,
	): Promise<FileMetadata[]> {
		return await this.updateItems(items, FILE_UPDATE_SPEC, FileSchema, mode, options);
	}

	public async delete(args: DeleteArgs, options?: CdpRequestOptions): Promise<void> {
		await this.deleteItems(
			IdentifierSequence.load(args),
			{ extra: { ignoreUnknownIds: args.ignoreUnknownIds ?? false } },
			options,
		);
	}
}
