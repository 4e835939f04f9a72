import createDebug from "debug";
import type { CdpRequestOptions } from "../common.js";
import { API_VERSION, type ClientConfig } from "../config.js";
import { type CdpError, cdpError, makeServerError } from "../error.js";
import { DEFAULT_USER_AGENT } from "../version.js";
import { withRetries } from "./retry.js";

const debug = createDebug("cdp:http");

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

export type QueryValue =
	| string
	| number
	| boolean
	| null
	| undefined
	| ReadonlyArray<string | number>;

export type QueryParams = Record<string, QueryValue>;

export type HttpRequest = {
	method: HttpMethod;
	/** Path relative to the project, e.g. `/assets/list`. */
	path: string;
	query?: QueryParams;
	body?: unknown;
	headers?: Record<string, string>;
} & CdpRequestOptions;

export type HttpResponse = {
	status: number;
	headers: Headers;
	/** Parsed JSON body, the raw text for non-JSON bodies, or `undefined` when empty. */
	data: unknown;
};

/**
 * POST endpoints that only read, or that are idempotent, and so may be retried
 * on any transient failure. Other POSTs are only retried on 429.
 */
const RETRYABLE_POST_PATTERN = new RegExp(
	[
		"(assets|events|files|timeseries)/(list|byids|search|aggregate)",
		"files/downloadlink",
		"raw/dbs/[^/]+/tables/[^/]+/rows(/delete)?",
		"sessions/(revoke|byids)",
		"workflows/.*",
		"hostedextractors/.*",
	]
		.map((p) => `^/${p}(\\?.*)?$`)
		.join("|"),
);

export function isRetryableRequest(method: HttpMethod, path: string): boolean {
	if (method === "GET" || method === "PUT" || method === "PATCH") return true;
	return method === "POST" && RETRYABLE_POST_PATTERN.test(path);
}

export function buildQueryString(query: QueryParams | undefined): string {
	if (!query) return "";
	const params = new URLSearchParams();
	for (const [key, value] of Object.entries(query)) {
		if (value === undefined || value === null) continue;
		if (Array.isArray(value)) {
			params.set(key, value.join(","));
		} else {
			params.set(key, String(value));
		}
	}
	const qs = params.toString();
	return qs ? `?${qs}` : "";
}

/**
 * Encode each argument as a URI component and substitute it into the `{}`
 * placeholders of a path template, in order.
 *
 * @example
 * interpolatePath("/raw/dbs/{}/tables/{}/rows", "my db", "t/1");
 * // "/raw/dbs/my%20db/tables/t%2F1/rows"
 */
export function interpolatePath(template: string, ...args: string[]): string {
	let index = 0;
	return template.replace(/\{\}/g, () => {
		const arg = args[index++];
		if (arg === undefined) {
			throw new Error(`Missing argument ${index} for path template ${template}`);
		}
		return encodeURIComponent(arg);
	});
}

function mergeSignals(signals: Array<AbortSignal | undefined>): AbortSignal {
	const controller = new AbortController();
	for (const signal of signals) {
		if (!signal) continue;
		if (signal.aborted) {
			controller.abort(signal.reason);
			break;
		}
		signal.addEventListener("abort", () => controller.abort(signal.reason), {
			once: true,
		});
	}
	return controller.signal;
}

async function readBody(response: Response): Promise<unknown> {
	if (response.status === 204) return undefined;
	const text = await response.text();
	if (!text) return undefined;
	try {
		return JSON.parse(text);
	} catch {
		return text;
	}
}

/**
 * Project-scoped HTTP client: authentication, default headers, timeouts,
 * error mapping and retries for every API call.
 */
export class HttpClient {
	public readonly apiBaseUrl: string;
	private readonly config: ClientConfig;

	constructor(config: ClientConfig) {
		this.config = config;
		this.apiBaseUrl = `${config.baseUrl}/api/${API_VERSION}/projects/${encodeURIComponent(config.project)}`;
	}

	public get maxWorkers(): number {
		return this.config.maxWorkers;
	}

	public get credentials() {
		return this.config.credentials;
	}

	public async request(req: HttpRequest): Promise<HttpResponse> {
		const retryable = isRetryableRequest(req.method, req.path);
		return await withRetries(
			this.config.retry,
			() => this.send(req),
			// Rate limiting is safe to retry for any request: it was never processed
			(error: CdpError) => retryable || error.status === 429,
			req.signal,
		);
	}

	public async get(
		path: string,
		query?: QueryParams,
		options?: CdpRequestOptions,
	): Promise<unknown> {
		const res = await this.request({ method: "GET", path, query, ...options });
		return res.data;
	}

	public async post(
		path: string,
		body: unknown,
		query?: QueryParams,
		options?: CdpRequestOptions,
	): Promise<unknown> {
		const res = await this.request({
			method: "POST",
			path,
			body,
			query,
			...options,
		});
		return res.data;
	}

	public async put(
		path: string,
		body: unknown,
		query?: QueryParams,
		options?: CdpRequestOptions,
	): Promise<unknown> {
		const res = await this.request({
			method: "PUT",
			path,
			body,
			query,
			...options,
		});
		return res.data;
	}

	/**
	 * Upload raw bytes to an absolute, pre-signed URL (no API authentication).
	 */
	public async upload(
		url: string,
		content: Uint8Array | string,
		contentType: string,
		options?: CdpRequestOptions,
	): Promise<void> {
		await withRetries(
			this.config.retry,
			async () => {
				let response: Response;
				try {
					response = await this.config.fetch(url, {
						method: "PUT",
						headers: { "content-type": contentType },
						body: content,
						signal: options?.signal,
					});
				} catch (error) {
					throw cdpError(error);
				}
				if (!response.ok) {
					throw makeServerError(
						{ status: response.status, statusText: response.statusText },
						await readBody(response),
					);
				}
			},
			undefined,
			options?.signal,
		);
	}

	private async send(req: HttpRequest): Promise<HttpResponse> {
		const url = `${this.apiBaseUrl}${req.path}${buildQueryString(req.query)}`;
		const started = performance.now();

		let response: Response;
		try {
			const [authName, authValue] =
				await this.config.credentials.authorizationHeader();
			const headers: Record<string, string> = {
				accept: "application/json",
				"user-agent": DEFAULT_USER_AGENT,
				"x-cdp-sdk": DEFAULT_USER_AGENT,
				"x-cdp-app": this.config.clientName,
				...this.config.headers,
				...req.headers,
				[authName]: authValue,
			};
			let body: string | undefined;
			if (req.body !== undefined) {
				headers["content-type"] = "application/json";
				body = JSON.stringify(req.body);
			}
			response = await this.config.fetch(url, {
				method: req.method,
				headers,
				body,
				signal: mergeSignals([
					req.signal,
					AbortSignal.timeout(this.config.timeoutMillis),
				]),
			});
		} catch (error) {
			const wrapped = cdpError(error);
			debug("%s %s failed: %s", req.method, url, wrapped.message);
			throw wrapped;
		}

		const data = await readBody(response);
		debug(
			"%s %s -> %d (%dms)",
			req.method,
			url,
			response.status,
			Math.round(performance.now() - started),
		);

		if (!response.ok) {
			throw makeServerError(
				{
					status: response.status,
					statusText: response.statusText,
					xRequestId: response.headers.get("x-request-id") ?? undefined,
				},
				data,
			);
		}

		return { status: response.status, headers: response.headers, data };
	}
}
