import { z } from "zod";
import type { CdpClientOptions, RetryConfig } from "./common.js";
import {
	type CredentialProvider,
	OAuthClientCredentials,
	Token,
} from "./credentials.js";
import { type CdpError, invalidArgument } from "./error.js";
import { toCamelCase } from "./lib/case-transform.js";

export const DEFAULT_CLIENT_NAME = "cdp-sdk";
export const DEFAULT_TIMEOUT_MILLIS = 60_000;
export const DEFAULT_MAX_WORKERS = 5;
export const API_VERSION = "v1";

/** Client options with every default applied and every value validated. */
export type ClientConfig = {
	project: string;
	credentials: CredentialProvider;
	baseUrl: string;
	clientName: string;
	headers: Record<string, string>;
	timeoutMillis: number;
	retry: RetryConfig;
	maxWorkers: number;
	fetch: typeof fetch;
};

function normalizeBaseUrl(baseUrl: string): string {
	const trimmed = baseUrl.trim().replace(/\/+$/, "");
	if (!trimmed) throw invalidArgument("baseUrl cannot be empty");
	return /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(trimmed)
		? trimmed
		: `https://${trimmed}`;
}

export function resolveClientConfig(options: CdpClientOptions): ClientConfig {
	if (!options.project) {
		throw invalidArgument(
			`Invalid value for project: ${JSON.stringify(options.project)}`,
		);
	}

	let baseUrl: string;
	if (options.baseUrl !== undefined) {
		baseUrl = normalizeBaseUrl(options.baseUrl);
	} else if (options.cluster) {
		baseUrl = `https://${options.cluster}.cdp.dev`;
	} else {
		throw invalidArgument("Either baseUrl or cluster must be provided");
	}

	const maxWorkers = options.maxWorkers ?? DEFAULT_MAX_WORKERS;
	if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
		throw invalidArgument(
			`Number of workers should be >= 1, was ${maxWorkers}`,
		);
	}

	const timeoutMillis = options.timeoutMillis ?? DEFAULT_TIMEOUT_MILLIS;
	if (!(timeoutMillis > 0)) {
		throw invalidArgument(`timeoutMillis must be positive, was ${timeoutMillis}`);
	}

	return {
		project: options.project,
		credentials: options.credentials,
		baseUrl,
		clientName: options.clientName ?? DEFAULT_CLIENT_NAME,
		headers: { ...options.headers },
		timeoutMillis,
		retry: { ...options.retry },
		maxWorkers,
		fetch: options.fetch ?? fetch,
	};
}

// ---------------------------------------------------------------------------
// Loading options from plain objects (JSON files, env-derived dicts)
// ---------------------------------------------------------------------------

const LoadedObjectSchema = z.record(z.unknown());

const ScopesSchema = z.union([
	z.string().transform((scopes) => scopes.split(/[\s,]+/).filter(Boolean)),
	z.array(z.string()),
]);

const ClientCredentialsConfigSchema = z
	.object({
		tokenUrl: z.string().min(1),
		clientId: z.string().min(1),
		clientSecret: z.string().min(1),
		scopes: ScopesSchema.optional(),
		tokenCustomArgs: z.record(z.string()).optional(),
		tokenExpiryLeewaySeconds: z.number().nonnegative().optional(),
	})
	.strict();

const CredentialsConfigSchema = z
	.object({
		token: z.string().optional(),
		clientCredentials: ClientCredentialsConfigSchema.optional(),
	})
	.strict();

const RetryConfigSchema = z
	.object({
		maxAttempts: z.number().int().positive().optional(),
		minDelayMillis: z.number().nonnegative().optional(),
		maxDelayMillis: z.number().nonnegative().optional(),
	})
	.strict();

const ClientConfigSchema = z
	.object({
		project: z.string().min(1),
		credentials: CredentialsConfigSchema,
		baseUrl: z.string().optional(),
		cluster: z.string().optional(),
		clientName: z.string().optional(),
		timeoutMillis: z.number().optional(),
		retry: RetryConfigSchema.optional(),
		maxWorkers: z.number().optional(),
	})
	.strict();

/** Header names are validated apart from the rest, since they keep their case. */
const HeadersSchema = z.record(z.string()).optional();

function configError(what: string, error: z.ZodError): CdpError {
	const issue = error.issues[0];
	if (!issue) return invalidArgument(`Invalid ${what}`, error.issues);
	const path = issue.path.join(".");
	if (issue.code === "unrecognized_keys") {
		const keys = issue.keys.map((key) => (path ? `${path}.${key}` : key)).sort();
		return invalidArgument(`Unknown ${what} keys: ${keys.join(", ")}`, error.issues);
	}
	if (issue.code === "invalid_type" && issue.received === "undefined") {
		return invalidArgument(`Missing '${path}' in ${what}`, error.issues);
	}
	return path
		? invalidArgument(`Invalid '${path}' in ${what}: ${issue.message}`, error.issues)
		: invalidArgument(`Invalid ${what}: ${issue.message}`, error.issues);
}

function validate<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
	const result = schema.safeParse(value);
	if (!result.success) throw configError(what, result.error);
	return result.data;
}

function toProvider(config: z.output<typeof CredentialsConfigSchema>): CredentialProvider {
	if (config.token) return new Token(config.token);

	const cc = config.clientCredentials;
	if (cc) {
		return new OAuthClientCredentials({
			tokenUrl: cc.tokenUrl,
			clientId: cc.clientId,
			clientSecret: cc.clientSecret,
			scopes: cc.scopes ?? [],
			tokenCustomArgs: cc.tokenCustomArgs,
			tokenExpiryLeewaySeconds: cc.tokenExpiryLeewaySeconds,
		});
	}

	throw invalidArgument(
		"Credentials config must contain 'token' or 'clientCredentials'",
	);
}

/**
 * Build a credential provider from a loaded configuration object.
 *
 * Accepts `{ token: "..." }` or
 * `{ clientCredentials: { tokenUrl, clientId, clientSecret, scopes } }`,
 * with keys in camelCase or snake_case.
 */
export function credentialsFromConfig(raw: unknown): CredentialProvider {
	return toProvider(
		validate(CredentialsConfigSchema, toCamelCase(raw), "credentials config"),
	);
}

/**
 * Validate a plain configuration object (for example parsed from a JSON
 * file) into client options. Keys may be camelCase or snake_case.
 *
 * @example
 * ```ts
 * const options = loadClientOptions(JSON.parse(await readFile("cdp.json", "utf8")));
 * const cdp = new Cdp(options);
 * ```
 */
export function loadClientOptions(raw: unknown): CdpClientOptions {
	const { headers, ...rest } = validate(LoadedObjectSchema, raw, "client config");
	const config = validate(ClientConfigSchema, toCamelCase(rest), "client config");

	return {
		...config,
		credentials: toProvider(config.credentials),
		headers: validate(HeadersSchema, headers, "client config headers") ?? {},
	};
}
