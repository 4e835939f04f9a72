/** Top-level entrypoint for the SDK. */
export { Cdp } from "./client.js";
/** Client configuration and retry-related types. */
export type {
	CdpClientOptions,
	CdpEnvironmentConfig,
	CdpRequestOptions,
	RetryConfig,
} from "./common.js";
export { CdpEnvironment } from "./common.js";
export type { ClientConfig } from "./config.js";
export {
	API_VERSION,
	DEFAULT_MAX_WORKERS,
	loadClientOptions,
	resolveClientConfig,
} from "./config.js";
/** Ways to authenticate the client. */
export type {
	CredentialProvider,
	OAuthClientCredentialsInit,
	TokenSource,
} from "./credentials.js";
export { OAuthClientCredentials, Token } from "./credentials.js";
/**
 * Rich error types exposed by the SDK.
 *
 * - {@link CdpError} is the base error type.
 * - {@link CdpApiError} carries the per-item outcome of bulk operations.
 */
export type { ItemOutcomes } from "./error.js";
export {
	CdpApiError,
	CdpAuthError,
	CdpDuplicatedError,
	CdpError,
	CdpNotFoundError,
} from "./error.js";

/** Resource APIs and their types. */
export type { Asset, AssetFilter, AssetReplace, AssetWrite } from "./assets.js";
export { ASSET_UPDATE_SPEC, AssetUpdate, Assets } from "./assets.js";
export type { Event, EventFilter, EventReplace, EventWrite } from "./events.js";
export { EVENT_UPDATE_SPEC, EventUpdate, Events } from "./events.js";
export type {
	TimeSeries,
	TimeSeriesFilter,
	TimeSeriesReplace,
	TimeSeriesWrite,
} from "./timeSeries.js";
export {
	TIME_SERIES_UPDATE_SPEC,
	TimeSeriesApi,
	TimeSeriesUpdate,
} from "./timeSeries.js";
export type {
	CreatedFile,
	DownloadUrl,
	FileFilter,
	FileMetadata,
	FileMetadataReplace,
	FileMetadataWrite,
} from "./files.js";
export { FILE_UPDATE_SPEC, FileMetadataUpdate, Files } from "./files.js";
export type {
	Database,
	RawRowsOptions,
	Row,
	RowColumns,
	RowsChunksArgs,
	RowsFilter,
	RowsListArgs,
	RowWrite,
	Table,
} from "./raw/index.js";
export { Raw, RawDatabases, RawRows, RawTables } from "./raw/index.js";
export type {
	ClientCredentials,
	CreatedSession,
	Session,
	SessionStatus,
	SessionType,
} from "./sessions.js";
export { Sessions } from "./sessions.js";
export type {
	Workflow,
	WorkflowDefinition,
	WorkflowExecution,
	WorkflowExecutionFilter,
	WorkflowExecutionStatus,
	WorkflowTask,
	WorkflowUpsert,
	WorkflowVersion,
	WorkflowVersionId,
	WorkflowVersionUpsert,
} from "./workflows.js";
export { WorkflowExecutions, Workflows, WorkflowVersions } from "./workflows.js";
export type {
	Job,
	JobLog,
	JobLogsFilter,
	JobMetrics,
	JobStatus,
	JobWrite,
	Source,
	SourceType,
	SourceWrite,
} from "./hostedExtractors.js";
export {
	HostedExtractorJobs,
	HostedExtractors,
	HostedExtractorSources,
	JobUpdate,
} from "./hostedExtractors.js";
export type {
	ChunksArgs,
	DeleteArgs,
	IterateArgs,
	LabelRef,
	ListArgs,
	Metadata,
	RetrieveMultipleArgs,
	TimestampRange,
} from "./types.js";

/**
 * Building blocks for custom resources and concurrent work.
 *
 * - {@link executeTasks} runs tasks with bounded concurrency and triages the outcomes.
 * - {@link readPartitioned} merges concurrent partition reads with bounded memory.
 */
export { ResourceApi } from "./api-client.js";
export type { ListRequest } from "./api-client.js";
export type { CompoundErrorOptions, ExecuteTasksOptions } from "./lib/concurrency.js";
export { classifyFailure, executeTasks, TasksSummary } from "./lib/concurrency.js";
export type { Schema } from "./lib/decode.js";
export { HttpClient } from "./lib/http.js";
export type { Identifier, IdentifierInput } from "./lib/identifier.js";
export { IdentifierSequence } from "./lib/identifier.js";
export type { Page, PageFetcher, PaginateChunksOptions, PaginateOptions } from "./lib/paginate.js";
export { DEFAULT_LIMIT_READ, paginate, paginateChunks } from "./lib/paginate.js";
export type { PartitionedReadOptions } from "./lib/partitioned.js";
export { readPartitioned } from "./lib/partitioned.js";
export { TaskPool } from "./lib/pool.js";
/** Redacted secret wrapper type. */
export type { Redacted } from "./lib/redacted.js";
export type { FieldKind, FieldSpec, UpdateMode, UpdateSpec } from "./lib/update.js";
export { ResourceUpdate } from "./lib/update.js";
export { VERSION } from "./version.js";
