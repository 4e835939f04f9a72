import {
	type CredentialProvider,
	OAuthClientCredentials,
	Token,
} from "./credentials.js";

/**
 * Retry configuration for handling transient failures.
 */
export type RetryConfig = {
	/**
	 * Total number of attempts, including the initial try.
	 * Must be >= 1. A value of 1 means no retries.
	 * @default 10
	 */
	maxAttempts?: number;

	/**
	 * Base delay in milliseconds for exponential backoff.
	 * Retry `n` waits a random time in [100, 100 + minDelayMillis * 2^n) ms.
	 * @default 500
	 */
	minDelayMillis?: number;

	/**
	 * Cap on the random part of the backoff delay, in milliseconds.
	 * @default 60000
	 */
	maxDelayMillis?: number;
};

/**
 * Configuration for constructing the top-level `Cdp` client.
 */
export type CdpClientOptions = {
	/** Project every request is scoped to. */
	project: string;
	/** Provides the `Authorization` header for every request. */
	credentials: CredentialProvider;
	/**
	 * Base URL of the API, e.g. `https://westeurope-1.cdp.dev`.
	 * Either `baseUrl` or `cluster` must be given.
	 */
	baseUrl?: string;
	/** Cluster name; expands to `https://{cluster}.cdp.dev`. */
	cluster?: string;
	/**
	 * Name identifying the application, sent as `x-cdp-app`.
	 * @default "cdp-sdk"
	 */
	clientName?: string;
	/** Extra headers added to every request. */
	headers?: Record<string, string>;
	/**
	 * Per-request timeout in milliseconds.
	 * @default 60000
	 */
	timeoutMillis?: number;
	/** Retry configuration for transient failures. */
	retry?: RetryConfig;
	/**
	 * Maximum number of concurrent requests used by bulk operations and
	 * partitioned reads.
	 * @default 5
	 */
	maxWorkers?: number;
	/** Custom fetch implementation. Defaults to the global `fetch`. */
	fetch?: typeof fetch;
};

/**
 * Per-request options that apply to all SDK operations.
 */
export type CdpRequestOptions = {
	/**
	 * Optional abort signal to cancel the underlying HTTP request.
	 */
	signal?: AbortSignal;
	/** Extra headers for this request only. */
	headers?: Record<string, string>;
};

export type CdpEnvironmentConfig = Partial<CdpClientOptions>;

export class CdpEnvironment {
	/**
	 * Read client options from `CDP_*` environment variables.
	 *
	 * Credentials come from `CDP_TOKEN`, or from `CDP_CLIENT_ID`,
	 * `CDP_CLIENT_SECRET`, `CDP_TOKEN_URL` and `CDP_SCOPES` (space or comma
	 * separated) for the client credentials flow.
	 */
	public static parse(
		env: Record<string, string | undefined> = process.env,
	): CdpEnvironmentConfig {
		const config: CdpEnvironmentConfig = {};

		if (env.CDP_PROJECT) config.project = env.CDP_PROJECT;
		if (env.CDP_BASE_URL) config.baseUrl = env.CDP_BASE_URL;
		if (env.CDP_CLUSTER) config.cluster = env.CDP_CLUSTER;
		if (env.CDP_CLIENT_NAME) config.clientName = env.CDP_CLIENT_NAME;

		const maxWorkers = Number(env.CDP_MAX_WORKERS);
		if (env.CDP_MAX_WORKERS && Number.isInteger(maxWorkers)) {
			config.maxWorkers = maxWorkers;
		}

		if (env.CDP_TOKEN) {
			config.credentials = new Token(env.CDP_TOKEN);
		} else if (
			env.CDP_CLIENT_ID &&
			env.CDP_CLIENT_SECRET &&
			env.CDP_TOKEN_URL
		) {
			config.credentials = new OAuthClientCredentials({
				clientId: env.CDP_CLIENT_ID,
				clientSecret: env.CDP_CLIENT_SECRET,
				tokenUrl: env.CDP_TOKEN_URL,
				scopes: (env.CDP_SCOPES ?? "").split(/[\s,]+/).filter(Boolean),
			});
		}

		return config;
	}
}
