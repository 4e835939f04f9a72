import { describe, expect, it } from "vitest";
import { resolveClientConfig } from "../config.js";
import { Token } from "../credentials.js";
import { CdpApiError } from "../error.js";
import {
	buildQueryString,
	HttpClient,
	interpolatePath,
	isRetryableRequest,
} from "../lib/http.js";
import { BASE_URL, FakeApi, PROJECT } from "./helpers.js";

function client(api: FakeApi, headers?: Record<string, string>): HttpClient {
	return new HttpClient(
		resolveClientConfig({
			project: PROJECT,
			baseUrl: BASE_URL,
			credentials: new Token("test-secret"),
			clientName: "test-app",
			headers,
			fetch: api.fetch,
			retry: { maxAttempts: 3, minDelayMillis: 1, maxDelayMillis: 1 },
		}),
	);
}

describe("buildQueryString", () => {
	it("drops absent values and joins arrays", () => {
		expect(
			buildQueryString({ a: 1, b: undefined, c: null, d: ["x", "y"], e: true }),
		).toBe("?a=1&d=x%2Cy&e=true");
	});

	it("is empty without parameters", () => {
		expect(buildQueryString(undefined)).toBe("");
		expect(buildQueryString({ a: undefined })).toBe("");
	});
});

describe("interpolatePath", () => {
	it("encodes each argument", () => {
		expect(interpolatePath("/raw/dbs/{}/tables/{}/rows", "my db", "t/1")).toBe(
			"/raw/dbs/my%20db/tables/t%2F1/rows",
		);
	});

	it("throws when an argument is missing", () => {
		expect(() => interpolatePath("/raw/dbs/{}/tables/{}", "db")).toThrow(
			"Missing argument 2",
		);
	});
});

describe("isRetryableRequest", () => {
	it("retries reads and idempotent posts", () => {
		expect(isRetryableRequest("GET", "/assets")).toBe(true);
		expect(isRetryableRequest("POST", "/assets/list")).toBe(true);
		expect(isRetryableRequest("POST", "/events/byids")).toBe(true);
		expect(isRetryableRequest("POST", "/raw/dbs/db/tables/t/rows")).toBe(true);
		expect(isRetryableRequest("POST", "/sessions/revoke")).toBe(true);
	});

	it("does not retry creates and deletes of resources", () => {
		expect(isRetryableRequest("POST", "/assets")).toBe(false);
		expect(isRetryableRequest("POST", "/assets/delete")).toBe(false);
		expect(isRetryableRequest("POST", "/sessions")).toBe(false);
	});
});

describe("HttpClient", () => {
	it("scopes requests to the project and sends auth and identity headers", async () => {
		const api = new FakeApi(() => ({ body: { ok: true } }));
		const http = client(api, { "x-extra": "1" });

		const data = await http.get("/assets", { limit: 5 });

		expect(data).toEqual({ ok: true });
		expect(http.apiBaseUrl).toBe(`${BASE_URL}/api/v1/projects/${PROJECT}`);
		const [req] = api.requests;
		expect(req?.path).toBe("/assets");
		expect(req?.query.get("limit")).toBe("5");
		expect(req?.headers.get("authorization")).toBe("Bearer test-secret");
		expect(req?.headers.get("x-cdp-app")).toBe("test-app");
		expect(req?.headers.get("x-extra")).toBe("1");
	});

	it("sends JSON bodies", async () => {
		const api = new FakeApi(() => ({ body: { items: [] } }));
		await client(api).post("/assets/list", { limit: 2 });

		const [req] = api.requests;
		expect(req?.method).toBe("POST");
		expect(req?.body).toEqual({ limit: 2 });
		expect(req?.headers.get("content-type")).toBe("application/json");
	});

	it("adds per-request headers", async () => {
		const api = new FakeApi(() => ({ body: {} }));
		await client(api).get("/jobs", undefined, { headers: { "cdp-version": "beta" } });

		expect(api.requests[0]?.headers.get("cdp-version")).toBe("beta");
	});

	it("maps error responses and keeps the request id", async () => {
		const api = new FakeApi(() => ({
			status: 400,
			body: { error: { code: 400, message: "Invalid limit" } },
			headers: { "x-request-id": "req-42" },
		}));

		await expect(client(api).get("/assets")).rejects.toMatchObject({
			name: "CdpApiError",
			message: "Invalid limit",
			status: 400,
			xRequestId: "req-42",
		});
	});

	it("retries a retryable request on 503", async () => {
		let calls = 0;
		const api = new FakeApi(() =>
			++calls === 1 ? { status: 503, body: "busy" } : { body: { items: [] } },
		);

		await client(api).post("/assets/list", {});
		expect(api.requests).toHaveLength(2);
	});

	it("does not retry a create on 503", async () => {
		const api = new FakeApi(() => ({ status: 503, body: "busy" }));

		await expect(client(api).post("/assets", { items: [] })).rejects.toBeInstanceOf(
			CdpApiError,
		);
		expect(api.requests).toHaveLength(1);
	});

	it("retries any request on 429", async () => {
		let calls = 0;
		const api = new FakeApi(() =>
			++calls === 1 ? { status: 429, body: "slow down" } : { body: { items: [] } },
		);

		await client(api).post("/assets", { items: [] });
		expect(api.requests).toHaveLength(2);
	});

	it("returns undefined for empty responses", async () => {
		const api = new FakeApi(() => ({ status: 204 }));
		expect(await client(api).post("/assets/delete", { items: [] })).toBeUndefined();
	});

	it("uploads to an absolute URL without the API token", async () => {
		const api = new FakeApi(() => ({ status: 200 }));
		await client(api).upload("https://upload.test/file-1", "hello", "text/plain");

		const [req] = api.requests;
		expect(req?.method).toBe("PUT");
		expect(req?.path).toBe("/file-1");
		expect(req?.body).toBe("hello");
		expect(req?.headers.get("authorization")).toBeNull();
		expect(req?.headers.get("content-type")).toBe("text/plain");
	});
});
