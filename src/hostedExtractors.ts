import { z } from "zod";
import { ResourceApi } from "./api-client.js";
import type { CdpRequestOptions } from "./common.js";
import { parseItems, type Schema } from "./lib/decode.js";
import type { HttpClient } from "./lib/http.js";
import { IdentifierSequence } from "./lib/identifier.js";
import {
	ResourceUpdate,
	toPatchObject,
	type UpdateMode,
	type UpdateSpec,
} from "./lib/update.js";

/** Jobs are served by a beta version of the API. */
const BETA_HEADERS = { "cdp-version": "beta" };

function beta(options?: CdpRequestOptions): CdpRequestOptions {
	return { ...options, headers: { ...options?.headers, ...BETA_HEADERS } };
}

export type SourceType = "mqtt5" | "mqtt3" | "eventhub" | "kafka" | "rest";

export type SourceWrite = {
	externalId: string;
	type: SourceType;
	host?: string;
	port?: number;
	/** Event hub sources only. */
	eventHubName?: string;
	keyName?: string;
	/** Write-only; never returned. */
	key?: string;
	authentication?: Record<string, unknown>;
};

export type Source = Omit<SourceWrite, "key"> & {
	createdTime: number;
	lastUpdatedTime: number;
};

export const SOURCE_UPDATE_SPEC: UpdateSpec<SourceWrite> = {
	host: { kind: "primitive" },
	port: { kind: "primitive", nullable: true },
	eventHubName: { kind: "primitive" },
	keyName: { kind: "primitive" },
	key: { kind: "primitive" },
	authentication: { kind: "primitive", nullable: true },
};

export type JobStatus =
	| "paused"
	| "waiting_to_start"
	| "test_failed"
	| "running"
	| "waiting_to_stop"
	| "startup_error"
	| "connection_error"
	| "connected"
	| "transform_error"
	| "destination_error";

export type JobWrite = {
	externalId: string;
	sourceId: string;
	destinationId: string;
	/** How messages from the source are turned into data points and events. */
	format: Record<string, unknown>;
	config?: Record<string, unknown>;
};

export type Job = JobWrite & {
	targetStatus: "running" | "paused";
	status: JobStatus;
	createdTime: number;
	lastUpdatedTime: number;
};

export type JobLog = {
	externalId: string;
	type: "paused" | "startup_error" | "connected" | "connection_error" | "transform_error" | "destination_error" | "ok";
	message?: string;
	createdTime: number;
};

export type JobMetrics = {
	externalId: string;
	timestamp: number;
	sourceMessages: number;
	destinationInputValues: number;
	destinationRequests: number;
	destinationWriteFailures: number;
	destinationSkippedValues: number;
	destinationFailedValues: number;
	destinationUploadedValues: number;
};

/** Narrows job logs and metrics to one job, or to every job on a source or destination. */
export type JobLogsFilter = {
	job?: string;
	source?: string;
	destination?: string;
	limit?: number | null;
};

type JobUpdatable = JobWrite & { targetStatus?: "running" | "paused" };

export const JOB_UPDATE_SPEC: UpdateSpec<JobUpdatable> = {
	sourceId: { kind: "primitive" },
	destinationId: { kind: "primitive" },
	format: { kind: "primitive" },
	config: { kind: "primitive", nullable: true },
	targetStatus: { kind: "primitive" },
};

/** Update builder for hosted extractor jobs. */
export class JobUpdate extends ResourceUpdate<JobUpdatable> {
	constructor(externalId: string) {
		super(JOB_UPDATE_SPEC, { externalId });
	}
}

const SourceSchema: Schema<Source> = z
	.object({
		externalId: z.string(),
		type: z.enum(["mqtt5", "mqtt3", "eventhub", "kafka", "rest"]),
		host: z.string().optional(),
		port: z.number().optional(),
		eventHubName: z.string().optional(),
		keyName: z.string().optional(),
		authentication: z.record(z.unknown()).optional(),
		createdTime: z.number(),
		lastUpdatedTime: z.number(),
	})
	.passthrough();

const JobSchema: Schema<Job> = z
	.object({
		externalId: z.string(),
		sourceId: z.string(),
		destinationId: z.string(),
		format: z.record(z.unknown()),
		config: z.record(z.unknown()).optional(),
		targetStatus: z.enum(["running", "paused"]),
		status: z.enum([
			"paused",
			"waiting_to_start",
			"test_failed",
			"running",
			"waiting_to_stop",
			"startup_error",
			"connection_error",
			"connected",
			"transform_error",
			"destination_error",
		]),
		createdTime: z.number(),
		lastUpdatedTime: z.number(),
	})
	.passthrough();

const JobLogSchema: Schema<JobLog> = z
	.object({
		externalId: z.string(),
		type: z.enum([
			"paused",
			"startup_error",
			"connected",
			"connection_error",
			"transform_error",
			"destination_error",
			"ok",
		]),
		message: z.string().optional(),
		createdTime: z.number(),
	})
	.passthrough();

const JobMetricsSchema: Schema<JobMetrics> = z
	.object({
		externalId: z.string(),
		timestamp: z.number(),
		sourceMessages: z.number(),
		destinationInputValues: z.number(),
		destinationRequests: z.number(),
		destinationWriteFailures: z.number(),
		destinationSkippedValues: z.number(),
		destinationFailedValues: z.number(),
		destinationUploadedValues: z.number(),
	})
	.passthrough();

export class HostedExtractorSources extends ResourceApi {
	protected readonly resourcePath = "/hostedextractors/sources";
	protected override readonly createLimit = 10;
	protected override readonly retrieveLimit = 100;
	protected override readonly deleteLimit = 100;

	public async list(
		args: { limit?: number | null } = {},
		options?: CdpRequestOptions,
	): Promise<Source[]> {
		return await this.listItems({ method: "GET", limit: args.limit }, SourceSchema, options);
	}

	public async retrieve(
		externalIds: readonly string[],
		ignoreUnknownIds = false,
		options?: CdpRequestOptions,
	): Promise<Source[]> {
		return await this.retrieveByIds(
			IdentifierSequence.load({ externalIds }),
			SourceSchema,
			{ ignoreUnknownIds },
			options,
		);
	}

	public async create(
		items: readonly SourceWrite[],
		options?: CdpRequestOptions,
	): Promise<Source[]> {
		return await this.createItems(items, SourceSchema, {}, options);
	}

	/**
	 * Update sources from full definitions. The source type can not be
	 * changed; it is sent along so the server knows which fields apply.
	 */
	public async update(
		items: readonly SourceWrite[],
		mode: UpdateMode = "replaceIgnoreNull",
		options?: CdpRequestOptions,
	): Promise<Source[]> {
		const patches = items.map((item) => ({
			...toPatchObject(item, SOURCE_UPDATE_SPEC, mode),
			type: item.type,
		}));
		const data = await this.http.post(
			`${this.resourcePath}/update`,
			{ items: patches },
			undefined,
			options,
		);
		return parseItems(data, SourceSchema);
	}

	/**
	 * @param force Delete the source even when jobs still read from it
	 */
	public async delete(
		externalIds: string | readonly string[],
		args: { ignoreUnknownIds?: boolean; force?: boolean } = {},
		options?: CdpRequestOptions,
	): Promise<void> {
		await this.deleteItems(
			IdentifierSequence.load({ externalIds }),
			{
				extra: {
					ignoreUnknownIds: args.ignoreUnknownIds ?? false,
					force: args.force ?? false,
				},
			},
			options,
		);
	}
}

export class HostedExtractorJobs extends ResourceApi {
	protected readonly resourcePath = "/hostedextractors/jobs";
	protected override readonly createLimit = 100;
	protected override readonly retrieveLimit = 100;
	protected override readonly deleteLimit = 100;

	public async list(
		args: { limit?: number | null } = {},
		options?: CdpRequestOptions,
	): Promise<Job[]> {
		return await this.listItems({ method: "GET", limit: args.limit }, JobSchema, beta(options));
	}

	public async retrieve(
		externalIds: readonly string[],
		ignoreUnknownIds = false,
		options?: CdpRequestOptions,
	): Promise<Job[]> {
		return await this.retrieveByIds(
			IdentifierSequence.load({ externalIds }),
			JobSchema,
			{ ignoreUnknownIds },
			beta(options),
		);
	}

	public async create(items: readonly JobWrite[], options?: CdpRequestOptions): Promise<Job[]> {
		return await this.createItems(items, JobSchema, {}, beta(options));
	}

	/**
	 * Update jobs. Setting `targetStatus` starts or pauses a job.
	 *
	 * @example
	 * ```ts
	 * await cdp.hostedExtractors.jobs.update([
	 *   new JobUpdate("my-job").set("targetStatus", "paused"),
	 * ]);
	 * ```
	 */
	public async update(
		items: ReadonlyArray<JobUpdate | JobUpdatable>,
		mode: UpdateMode = "replaceIgnoreNull",
		options?: CdpRequestOptions,
	): Promise<Job[]> {
		return await this.updateItems(items, JOB_UPDATE_SPEC, JobSchema, mode, beta(options));
	}

	public async delete(
		externalIds: string | readonly string[],
		ignoreUnknownIds = false,
		options?: CdpRequestOptions,
	): Promise<void> {
		await this.deleteItems(
			IdentifierSequence.load({ externalIds }),
			{ extra: ignoreUnknownIds ? { ignoreUnknownIds } : undefined },
			beta(options),
		);
	}

	public async listLogs(
		args: JobLogsFilter = {},
		options?: CdpRequestOptions,
	): Promise<JobLog[]> {
		return await this.listItems(
			{
				method: "GET",
				path: `${this.resourcePath}/logs`,
				filter: logsFilter(args),
				limit: args.limit,
			},
			JobLogSchema,
			beta(options),
		);
	}

	public async listMetrics(
		args: JobLogsFilter = {},
		options?: CdpRequestOptions,
	): Promise<JobMetrics[]> {
		return await this.listItems(
			{
				method: "GET",
				path: `${this.resourcePath}/metrics`,
				filter: logsFilter(args),
				limit: args.limit,
			},
			JobMetricsSchema,
			beta(options),
		);
	}
}

function logsFilter({ job, source, destination }: JobLogsFilter): Record<string, unknown> {
	return { job, source, destination };
}

export class HostedExtractors {
	public readonly sources: HostedExtractorSources;
	public readonly jobs: HostedExtractorJobs;

	constructor(http: HttpClient) {
		this.sources = new HostedExtractorSources(http);
		this.jobs = new HostedExtractorJobs(http);
	}
}
