import { describe, expect, it } from "vitest";
import { CdpAuthError } from "../error.js";
import { OAuthClientCredentials, Token } from "../credentials.js";
import { FakeApi } from "./helpers.js";

const TOKEN_URL = "https://login.test/oauth2/token";

function tokenEndpoint(expiresIn = 3600) {
	let issued = 0;
	return new FakeApi(() => {
		issued++;
		return { body: { access_token: `token-${issued}`, expires_in: expiresIn } };
	});
}

function credentials(api: FakeApi, leeway?: number): OAuthClientCredentials {
	return new OAuthClientCredentials({
		tokenUrl: TOKEN_URL,
		clientId: "test-client",
		clientSecret: "test-secret",
		scopes: ["scope-a", "scope-b"],
		tokenCustomArgs: { audience: "test-audience" },
		tokenExpiryLeewaySeconds: leeway,
		fetch: api.fetch,
	});
}

describe("Token", () => {
	it("sends a static token", async () => {
		expect(await new Token("test-secret").authorizationHeader()).toEqual([
			"Authorization",
			"Bearer test-secret",
		]);
	});

	it("calls a token factory on every request", async () => {
		let n = 0;
		const token = new Token(() => `token-${++n}`);

		await token.authorizationHeader();
		expect(await token.authorizationHeader()).toEqual(["Authorization", "Bearer token-2"]);
	});

	it("rejects an empty token", () => {
		expect(() => new Token("")).toThrow("Token cannot be empty");
	});
});

describe("OAuthClientCredentials", () => {
	it("posts the client credentials grant as a form", async () => {
		const api = tokenEndpoint();
		const header = await credentials(api).authorizationHeader();

		expect(header).toEqual(["Authorization", "Bearer token-1"]);
		const [req] = api.requests;
		expect(req?.method).toBe("POST");
		expect(req?.headers.get("content-type")).toBe("application/x-www-form-urlencoded");
		const form = new URLSearchParams(String(req?.body));
		expect(form.get("grant_type")).toBe("client_credentials");
		expect(form.get("client_id")).toBe("test-client");
		expect(form.get("scope")).toBe("scope-a scope-b");
		expect(form.get("audience")).toBe("test-audience");
	});

	it("caches the token until it is about to expire", async () => {
		const api = tokenEndpoint(3600);
		const provider = credentials(api);

		await provider.authorizationHeader();
		await provider.authorizationHeader();
		expect(api.requests).toHaveLength(1);
	});

	it("refreshes a token inside the expiry leeway", async () => {
		const api = tokenEndpoint(10);
		const provider = credentials(api, 30);

		await provider.authorizationHeader();
		const [, value] = await provider.authorizationHeader();
		expect(value).toBe("Bearer token-2");
	});

	it("shares one refresh between concurrent requests", async () => {
		const api = tokenEndpoint();
		const provider = credentials(api);

		await Promise.all([provider.authorizationHeader(), provider.authorizationHeader()]);
		expect(api.requests).toHaveLength(1);
	});

	it("reports token endpoint failures as auth errors", async () => {
		const api = new FakeApi(() => ({
			status: 401,
			body: { error: "invalid_client", error_description: "Unknown client" },
		}));

		const failure = credentials(api).authorizationHeader();
		await expect(failure).rejects.toBeInstanceOf(CdpAuthError);
		await expect(credentials(api).authorizationHeader()).rejects.toThrow(
			"Error fetching token: 401 Unknown client",
		);
	});

	it("rejects a token response without an expiry", async () => {
		const api = new FakeApi(() => ({ body: { access_token: "token-1" } }));

		await expect(credentials(api).authorizationHeader()).rejects.toThrow(
			"Token endpoint response is missing 'expires_in'",
		);
	});

	it("accepts an expiry sent as a string", async () => {
		const api = new FakeApi(() => ({ body: { access_token: "token-1", expires_in: "3600" } }));

		expect(await credentials(api).authorizationHeader()).toEqual([
			"Authorization",
			"Bearer token-1",
		]);
	});

	it("refuses to override reserved form fields", () => {
		expect(
			() =>
				new OAuthClientCredentials({
					tokenUrl: TOKEN_URL,
					clientId: "test-client",
					clientSecret: "test-secret",
					scopes: [],
					tokenCustomArgs: { grant_type: "password" },
				}),
		).toThrow("tokenCustomArgs cannot override reserved fields: grant_type");
	});

	it("never prints the secret", () => {
		const provider = credentials(tokenEndpoint());
		expect(JSON.stringify(provider)).not.toContain("test-secret");
	});
});
