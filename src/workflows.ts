import { z } from "zod";
import { ResourceApi } from "./api-client.js";
import type { CdpRequestOptions } from "./common.js";
import { MetadataSchema, parseItem, parseItems, type Schema } from "./lib/decode.js";
import { type HttpClient, interpolatePath } from "./lib/http.js";
import { IdentifierSequence } from "./lib/identifier.js";
import type { Sessions } from "./sessions.js";

export type Workflow = {
	externalId: string;
	description?: string;
	dataSetId?: number;
	createdTime: number;
	lastUpdatedTime?: number;
};

export type WorkflowUpsert = {
	externalId: string;
	description?: string;
	dataSetId?: number;
};

export type WorkflowTask = {
	externalId: string;
	type: "function" | "transformation" | "cdf" | "dynamic" | "subworkflow" | "simulation";
	name?: string;
	description?: string;
	parameters: Record<string, unknown>;
	retries?: number;
	timeout?: number;
	onFailure?: "abortWorkflow" | "skipTask";
	dependsOn?: Array<{ externalId: string }>;
};

export type WorkflowDefinition = {
	hash?: string;
	description?: string;
	tasks: WorkflowTask[];
};

/** Identifies one version of a workflow. */
export type WorkflowVersionId = {
	workflowExternalId: string;
	version: string;
};

export type WorkflowVersion = WorkflowVersionId & {
	workflowDefinition: WorkflowDefinition;
	createdTime?: number;
	lastUpdatedTime?: number;
};

export type WorkflowVersionUpsert = WorkflowVersionId & {
	workflowDefinition: Omit<WorkflowDefinition, "hash">;
};

export type WorkflowExecutionStatus =
	| "running"
	| "completed"
	| "failed"
	| "timed_out"
	| "terminated"
	| "paused";

export type WorkflowExecution = {
	id: string;
	workflowExternalId: string;
	version?: string;
	status: WorkflowExecutionStatus;
	reasonForIncompletion?: string;
	input?: Record<string, unknown>;
	metadata?: Record<string, string>;
	createdTime: number;
	startTime?: number;
	endTime?: number;
};

export type WorkflowExecutionFilter = {
	/** Only executions of these workflows, optionally of one version. */
	workflowFilters?: Array<{ externalId: string; version?: string }>;
	createdTimeStart?: number;
	createdTimeEnd?: number;
};

const WorkflowSchema: Schema<Workflow> = z
	.object({
		externalId: z.string(),
		description: z.string().optional(),
		dataSetId: z.number().optional(),
		createdTime: z.number(),
		lastUpdatedTime: z.number().optional(),
	})
	.passthrough();

const WorkflowTaskSchema: Schema<WorkflowTask> = z
	.object({
		externalId: z.string(),
		type: z.enum(["function", "transformation", "cdf", "dynamic", "subworkflow", "simulation"]),
		name: z.string().optional(),
		description: z.string().optional(),
		parameters: z.record(z.unknown()),
		retries: z.number().optional(),
		timeout: z.number().optional(),
		onFailure: z.enum(["abortWorkflow", "skipTask"]).optional(),
		dependsOn: z.array(z.object({ externalId: z.string() }).passthrough()).optional(),
	})
	.passthrough();

const WorkflowVersionSchema: Schema<WorkflowVersion> = z
	.object({
		workflowExternalId: z.string(),
		version: z.string(),
		workflowDefinition: z
			.object({
				hash: z.string().optional(),
				description: z.string().optional(),
				tasks: z.array(WorkflowTaskSchema),
			})
			.passthrough(),
		createdTime: z.number().optional(),
		lastUpdatedTime: z.number().optional(),
	})
	.passthrough();

const ExecutionSchema: Schema<WorkflowExecution> = z
	.object({
		id: z.string(),
		workflowExternalId: z.string(),
		version: z.string().optional(),
		status: z.enum(["running", "completed", "failed", "timed_out", "terminated", "paused"]),
		reasonForIncompletion: z.string().optional(),
		input: z.record(z.unknown()).optional(),
		metadata: MetadataSchema.optional(),
		createdTime: z.number(),
		startTime: z.number().optional(),
		endTime: z.number().optional(),
	})
	.passthrough();

export class WorkflowVersions extends ResourceApi {
	protected readonly resourcePath = "/workflows/versions";

	/** Create or replace a workflow version. */
	public async upsert(
		version: WorkflowVersionUpsert,
		options?: CdpRequestOptions,
	): Promise<WorkflowVersion> {
		const data = await this.http.post(
			this.resourcePath,
			{ items: [version] },
			undefined,
			options,
		);
		const [upserted] = parseItems(data, WorkflowVersionSchema);
		return parseItem(upserted, WorkflowVersionSchema);
	}

	/** Retrieve a workflow version, or `undefined` if it does not exist. */
	public async retrieve(
		id: WorkflowVersionId,
		options?: CdpRequestOptions,
	): Promise<WorkflowVersion | undefined> {
		return await this.getOrUndefined(
			interpolatePath("/workflows/{}/versions/{}", id.workflowExternalId, id.version),
			WorkflowVersionSchema,
			options,
		);
	}

	/**
	 * List workflow versions.
	 *
	 * @param args.workflows Only versions of these workflows
	 */
	public async list(
		args: {
			workflows?: Array<{ externalId: string; version?: string }>;
			limit?: number | null;
		} = {},
		options?: CdpRequestOptions,
	): Promise<WorkflowVersion[]> {
		return await this.listItems(
			{
				method: "POST",
				filter: { workflowFilters: args.workflows ?? [] },
				limit: args.limit,
			},
			WorkflowVersionSchema,
			options,
		);
	}

	public async delete(
		ids: readonly WorkflowVersionId[],
		ignoreUnknownIds = false,
		options?: CdpRequestOptions,
	): Promise<void> {
		await this.http.post(
			`${this.resourcePath}/delete`,
			{ items: ids.map(({ workflowExternalId, version }) => ({ workflowExternalId, version })) },
			{ ignoreUnknownIds },
			options,
		);
	}
}

export class WorkflowExecutions extends ResourceApi {
	protected readonly resourcePath = "/workflows/executions";

	constructor(
		http: HttpClient,
		private readonly sessions: Sessions,
	) {
		super(http);
	}

	/**
	 * Run a version of a workflow. A session is created for the run, so the
	 * tasks act with the permissions of this client.
	 *
	 * @param args.input Made available to tasks as `${workflow.input}`
	 * @param args.metadata Application specific key/value pairs
	 */
	public async run(
		args: WorkflowVersionId & {
			input?: Record<string, unknown>;
			metadata?: Record<string, string>;
		},
		options?: CdpRequestOptions,
	): Promise<WorkflowExecution> {
		const { nonce } = await this.sessions.create(undefined, "DEFAULT", options);
		const data = await this.http.post(
			interpolatePath("/workflows/{}/versions/{}/run", args.workflowExternalId, args.version),
			{ authentication: { nonce }, input: args.input, metadata: args.metadata },
			undefined,
			options,
		);
		return parseItem(data, ExecutionSchema);
	}

	public async retrieve(
		id: string,
		options?: CdpRequestOptions,
	): Promise<WorkflowExecution | undefined> {
		return await this.getOrUndefined(
			interpolatePath(`${this.resourcePath}/{}`, id),
			ExecutionSchema,
			options,
		);
	}

	public async list(
		args: { filter?: WorkflowExecutionFilter; limit?: number | null } = {},
		options?: CdpRequestOptions,
	): Promise<WorkflowExecution[]> {
		return await this.listItems(
			{ method: "POST", filter: args.filter ?? {}, limit: args.limit },
			ExecutionSchema,
			options,
		);
	}

	/** Cancel a running execution. */
	public async cancel(
		id: string,
		reason?: string,
		options?: CdpRequestOptions,
	): Promise<WorkflowExecution> {
		const data = await this.http.post(
			interpolatePath(`${this.resourcePath}/{}/cancel`, id),
			{ reason },
			undefined,
			options,
		);
		return parseItem(data, ExecutionSchema);
	}
}

export class Workflows extends ResourceApi {
	protected readonly resourcePath = "/workflows";
	public readonly versions: WorkflowVersions;
	public readonly executions: WorkflowExecutions;

	constructor(http: HttpClient, sessions: Sessions) {
		super(http);
		this.versions = new WorkflowVersions(http);
		this.executions = new WorkflowExecutions(http, sessions);
	}

	/** Create or replace a workflow. */
	public async upsert(
		workflow: WorkflowUpsert,
		options?: CdpRequestOptions,
	): Promise<Workflow> {
		const data = await this.http.post(
			this.resourcePath,
			{ items: [workflow] },
			undefined,
			options,
		);
		const [upserted] = parseItems(data, WorkflowSchema);
		return parseItem(upserted, WorkflowSchema);
	}

	public async retrieve(
		externalId: string,
		options?: CdpRequestOptions,
	): Promise<Workflow | undefined> {
		return await this.getOrUndefined(
			interpolatePath(`${this.resourcePath}/{}`, externalId),
			WorkflowSchema,
			options,
		);
	}

	public async list(
		args: { limit?: number | null } = {},
		options?: CdpRequestOptions,
	): Promise<Workflow[]> {
		return await this.listItems({ method: "GET", limit: args.limit }, WorkflowSchema, options);
	}

	/** Delete workflows with all their versions. */
	public async delete(
		externalIds: string | readonly string[],
		ignoreUnknownIds = false,
		options?: CdpRequestOptions,
	): Promise<void> {
		await this.deleteItems(
			IdentifierSequence.load({ externalIds }),
			{ query: { ignoreUnknownIds } },
			options,
		);
	}
}
