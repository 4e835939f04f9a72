import createDebug from "debug";
import { z } from "zod";
import { CdpAuthError, cdpError, invalidArgument } from "./error.js";
import { toCamelCase } from "./lib/case-transform.js";
import * as Redacted from "./lib/redacted.js";

const debug = createDebug("cdp:auth");

/**
 * Source of the `Authorization` header sent with every API request.
 */
export interface CredentialProvider {
	authorizationHeader(): Promise<readonly [name: string, value: string]>;
}

export type TokenSource = string | (() => string | Promise<string>);

/**
 * A bearer token, given either as a string or as a callback that returns a
 * fresh token every time it is called.
 *
 * @example
 * ```ts
 * const credentials = new Token(() => myAuthLibrary.getAccessToken());
 * ```
 */
export class Token implements CredentialProvider {
	private readonly source: Redacted.Redacted<string> | (() => string | Promise<string>);

	constructor(token: TokenSource) {
		if (typeof token === "string") {
			if (!token) throw invalidArgument("Token cannot be empty");
			this.source = Redacted.make(token);
		} else {
			this.source = token;
		}
	}

	async authorizationHeader(): Promise<readonly [string, string]> {
		const token =
			typeof this.source === "function"
				? await this.source()
				: Redacted.value(this.source);
		return ["Authorization", `Bearer ${token}`];
	}
}

export type OAuthClientCredentialsInit = {
	/** OAuth 2.0 token endpoint. */
	tokenUrl: string;
	clientId: string;
	clientSecret: string;
	scopes: string[];
	/** Extra form fields sent to the token endpoint, e.g. `audience`. */
	tokenCustomArgs?: Record<string, string>;
	/**
	 * Refresh the token this many seconds before it expires.
	 * @default 30
	 */
	tokenExpiryLeewaySeconds?: number;
	/** Custom fetch implementation. Defaults to the global `fetch`. */
	fetch?: typeof fetch;
};

const TokenResponseSchema = z
	.object({
		accessToken: z.string().min(1),
		expiresIn: z.coerce.number().finite(),
	})
	.passthrough();

const TokenErrorSchema = z.object({ errorDescription: z.string() }).passthrough();

const RESERVED_TOKEN_ARGS = new Set([
	"grant_type",
	"client_id",
	"client_secret",
	"scope",
]);

function parseTokenResponse(payload: unknown): z.infer<typeof TokenResponseSchema> {
	const result = TokenResponseSchema.safeParse(toCamelCase(payload));
	if (!result.success) {
		const field = result.error.issues[0]?.path[0] === "expiresIn" ? "expires_in" : "access_token";
		throw new CdpAuthError(
			`Token endpoint response is missing '${field}'`,
			401,
			result.error,
		);
	}
	return result.data;
}

/**
 * OAuth 2.0 client credentials flow.
 *
 * Tokens are cached and refreshed shortly before they expire. Concurrent
 * requests that find the token stale share a single refresh.
 */
export class OAuthClientCredentials implements CredentialProvider {
	public readonly tokenUrl: string;
	public readonly clientId: string;
	public readonly scopes: readonly string[];
	private readonly secret: Redacted.Redacted<string>;
	private readonly tokenCustomArgs: Record<string, string>;
	private readonly leewayMillis: number;
	private readonly fetchImpl: typeof fetch;

	private accessToken: Redacted.Redacted<string> | undefined;
	private expiresAt = 0;
	private inflight: Promise<void> | undefined;

	constructor(init: OAuthClientCredentialsInit) {
		if (!init.tokenUrl) throw invalidArgument("tokenUrl is required");
		if (!init.clientId) throw invalidArgument("clientId is required");
		if (!init.clientSecret) throw invalidArgument("clientSecret is required");
		const reserved = Object.keys(init.tokenCustomArgs ?? {}).filter((k) =>
			RESERVED_TOKEN_ARGS.has(k),
		);
		if (reserved.length > 0) {
			throw invalidArgument(
				`tokenCustomArgs cannot override reserved fields: ${reserved.join(", ")}`,
			);
		}

		this.tokenUrl = init.tokenUrl;
		this.clientId = init.clientId;
		this.secret = Redacted.make(init.clientSecret);
		this.scopes = [...init.scopes];
		this.tokenCustomArgs = { ...init.tokenCustomArgs };
		this.leewayMillis = (init.tokenExpiryLeewaySeconds ?? 30) * 1000;
		this.fetchImpl = init.fetch ?? fetch;
	}

	/** The client secret, for APIs (such as sessions) that need to forward it. */
	get clientSecret(): string {
		return Redacted.value(this.secret);
	}

	async authorizationHeader(): Promise<readonly [string, string]> {
		if (this.shouldRefresh()) {
			await this.refresh();
		}
		if (!this.accessToken) {
			throw new CdpAuthError("No access token available");
		}
		return ["Authorization", `Bearer ${Redacted.value(this.accessToken)}`];
	}

	private shouldRefresh(): boolean {
		return (
			this.accessToken === undefined ||
			Date.now() + this.leewayMillis >= this.expiresAt
		);
	}

	private refresh(): Promise<void> {
		if (!this.inflight) {
			this.inflight = this.fetchToken().finally(() => {
				this.inflight = undefined;
			});
		}
		return this.inflight;
	}

	private async fetchToken(): Promise<void> {
		debug("requesting token from %s for client %s", this.tokenUrl, this.clientId);
		const body = new URLSearchParams({
			grant_type: "client_credentials",
			client_id: this.clientId,
			client_secret: Redacted.value(this.secret),
			scope: this.scopes.join(" "),
			...this.tokenCustomArgs,
		});

		let response: Response;
		try {
			response = await this.fetchImpl(this.tokenUrl, {
				method: "POST",
				headers: {
					"content-type": "application/x-www-form-urlencoded",
					accept: "application/json",
				},
				body,
			});
		} catch (error) {
			const wrapped = cdpError(error);
			throw new CdpAuthError(
				`Error fetching token: ${wrapped.message}`,
				wrapped.status,
				error,
			);
		}

		const text = await response.text();
		let payload: unknown = text;
		try {
			payload = JSON.parse(text);
		} catch {
			debug("token endpoint returned a non-JSON body");
		}

		if (!response.ok) {
			const described = TokenErrorSchema.safeParse(toCamelCase(payload));
			const detail = described.success
				? described.data.errorDescription
				: response.statusText || text;
			throw new CdpAuthError(
				`Error fetching token: ${response.status} ${detail}`.trim(),
				response.status,
			);
		}

		const token = parseTokenResponse(payload);
		this.accessToken = Redacted.make(token.accessToken);
		this.expiresAt = Date.now() + token.expiresIn * 1000;
		debug("token refreshed, expires in %ds", token.expiresIn);
	}
}
