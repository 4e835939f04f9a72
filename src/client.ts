import createDebug from "debug";
import { Assets } from "./assets.js";
import { type CdpClientOptions, CdpEnvironment } from "./common.js";
import { type ClientConfig, resolveClientConfig } from "./config.js";
import { invalidArgument } from "./error.js";
import { Events } from "./events.js";
import { Files } from "./files.js";
import { HostedExtractors } from "./hostedExtractors.js";
import { HttpClient } from "./lib/http.js";
import { TaskPool } from "./lib/pool.js";
import { Raw, type RawRowsOptions } from "./raw/index.js";
import { Sessions } from "./sessions.js";
import { TimeSeriesApi } from "./timeSeries.js";
import { Workflows } from "./workflows.js";

const debug = createDebug("cdp:client");

/**
 * Top-level SDK client.
 *
 * - Scoped to one project; authenticates every request with the configured credentials.
 * - Bulk operations and partitioned reads share one pool of `maxWorkers` concurrent requests.
 *
 * @example
 * ```ts
 * const cdp = new Cdp({
 *   project: "my-project",
 *   cluster: "westeurope-1",
 *   credentials: new Token(process.env.CDP_TOKEN ?? ""),
 * });
 * const roots = await cdp.assets.list({ filter: { root: true } });
 * cdp.close();
 * ```
 */
export class Cdp {
	/** The resolved configuration, with every default applied. */
	public readonly config: ClientConfig;
	private readonly http: HttpClient;
	private readonly pool: TaskPool;

	public readonly assets: Assets;
	public readonly events: Events;
	public readonly timeSeries: TimeSeriesApi;
	public readonly files: Files;
	/** Raw databases, tables and rows. */
	public readonly raw: Raw;
	public readonly sessions: Sessions;
	/** Workflows, their versions and executions. */
	public readonly workflows: Workflows;
	public readonly hostedExtractors: HostedExtractors;

	/**
	 * @param options Project, credentials and cluster or base URL
	 * @param rawRowsOptions Tuning of partitioned row reads
	 */
	constructor(options: CdpClientOptions, rawRowsOptions?: RawRowsOptions) {
		this.config = resolveClientConfig(options);
		this.http = new HttpClient(this.config);
		this.pool = new TaskPool(this.config.maxWorkers);

		this.assets = new Assets(this.http);
		this.events = new Events(this.http);
		this.timeSeries = new TimeSeriesApi(this.http);
		this.files = new Files(this.http);
		this.raw = new Raw(this.http, this.pool, rawRowsOptions);
		this.sessions = new Sessions(this.http);
		this.workflows = new Workflows(this.http, this.sessions);
		this.hostedExtractors = new HostedExtractors(this.http);
		debug("client for project %s at %s", this.config.project, this.config.baseUrl);
	}

	/**
	 * Create a client from `CDP_*` environment variables, with `overrides`
	 * taking precedence.
	 */
	public static fromEnvironment(
		overrides: Partial<CdpClientOptions> = {},
		env: Record<string, string | undefined> = process.env,
	): Cdp {
		const merged = { ...CdpEnvironment.parse(env), ...overrides };
		const { project, credentials } = merged;
		if (!project || !credentials) {
			throw invalidArgument(
				"A project and credentials are required (set CDP_PROJECT and CDP_TOKEN, or pass them explicitly)",
			);
		}
		return new Cdp({ ...merged, project, credentials });
	}

	/** Base URL of every project-scoped request. */
	public get apiBaseUrl(): string {
		return this.http.apiBaseUrl;
	}

	/**
	 * Stop the background pool. Queued partition reads are rejected; requests
	 * in flight finish. The client can not run partitioned reads afterwards.
	 */
	public close(): void {
		this.pool.shutdown();
	}
}
