import { Cdp } from "../client.js";
import type { CdpClientOptions } from "../common.js";
import { Token } from "../credentials.js";

export const PROJECT = "test-project";
export const BASE_URL = "https://test.cdp.dev";
const PROJECT_PREFIX = `/api/v1/projects/${PROJECT}`;

export type RecordedRequest = {
	method: string;
	/** Path relative to the project, e.g. `/assets/list`. */
	path: string;
	query: URLSearchParams;
	body: unknown;
	headers: Headers;
	signal: AbortSignal | undefined;
};

export type FakeResponse = {
	status?: number;
	body?: unknown;
	headers?: Record<string, string>;
};

export type Handler = (req: RecordedRequest) => FakeResponse | Promise<FakeResponse>;

function urlOf(input: string | URL | Request): URL {
	if (typeof input === "string") return new URL(input);
	if (input instanceof URL) return input;
	return new URL(input.url);
}

/**
 * In-process stand-in for the API: records every request and answers it
 * with `handler`.
 */
export class FakeApi {
	public readonly requests: RecordedRequest[] = [];

	constructor(private readonly handler: Handler) {}

	public readonly fetch: typeof fetch = async (input, init) => {
		const url = urlOf(input);
		const path = url.pathname.startsWith(PROJECT_PREFIX)
			? url.pathname.slice(PROJECT_PREFIX.length)
			: url.pathname;
		const raw = init?.body;
		let body: unknown = raw ?? undefined;
		if (typeof raw === "string") {
			try {
				body = JSON.parse(raw);
			} catch {
				body = raw;
			}
		}
		const request: RecordedRequest = {
			method: init?.method ?? "GET",
			path,
			query: url.searchParams,
			body,
			headers: new Headers(init?.headers),
			signal: init?.signal ?? undefined,
		};
		this.requests.push(request);
		const response = await this.handler(request);
		const status = response.status ?? 200;
		const payload =
			response.body === undefined || status === 204
				? null
				: typeof response.body === "string"
					? response.body
					: JSON.stringify(response.body);
		return new Response(payload, {
			status,
			headers: { "content-type": "application/json", ...response.headers },
		});
	};

	/** Requests to `path`, in the order they were sent. */
	public to(method: string, path: string): RecordedRequest[] {
		return this.requests.filter((r) => r.method === method && r.path === path);
	}
}

/**
 * Answer requests by `"METHOD /path"`; anything else gets a 404.
 *
 * @example
 * routes({ "POST /assets/list": () => ({ body: { items: [] } }) })
 */
export function routes(table: Record<string, Handler>): Handler {
	return (req) => {
		const handler = table[`${req.method} ${req.path}`];
		if (!handler) {
			return {
				status: 404,
				body: { error: { code: 404, message: `No route for ${req.method} ${req.path}` } },
			};
		}
		return handler(req);
	};
}

export function createTestClient(
	api: FakeApi,
	options: Partial<CdpClientOptions> = {},
): Cdp {
	return new Cdp(
		{
			project: PROJECT,
			baseUrl: BASE_URL,
			credentials: new Token("test-secret"),
			fetch: api.fetch,
			retry: { maxAttempts: 3, minDelayMillis: 1, maxDelayMillis: 1 },
			...options,
		},
		{ backoffUnitMillis: 1 },
	);
}

export function bodyOf(req: RecordedRequest | undefined): Record<string, unknown> {
	const body = req?.body;
	if (body && typeof body === "object" && !Array.isArray(body)) {
		return Object.fromEntries(Object.entries(body));
	}
	throw new Error(`Expected a JSON object body, got ${JSON.stringify(body)}`);
}

export function deferred<T = void>(): {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (error: unknown) => void;
} {
	let resolve: (value: T) => void = () => {};
	let reject: (error: unknown) => void = () => {};
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}
