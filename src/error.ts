type ErrorWithCode = Error & {
	code?: unknown;
	cause?: unknown;
};

function getErrorCode(error: unknown): string | undefined {
	if (!(error instanceof Error)) return undefined;
	const err: ErrorWithCode = error;

	if (typeof err.code === "string") return err.code;

	if (err.cause && typeof err.cause === "object" && "code" in err.cause) {
		const code = err.cause.code;
		if (typeof code === "string") {
			return code;
		}
	}

	return undefined;
}

// Fetch implementations report network failures with different messages
const NETWORK_ERROR_MESSAGES = [
	"fetch failed",
	"Failed to fetch",
	"NetworkError when attempting to fetch resource",
	"Load failed",
];

// Common connection error codes from the Node.js net module
const CONNECTION_ERROR_CODES = [
	"ECONNREFUSED",
	"ENOTFOUND",
	"ETIMEDOUT",
	"ENETUNREACH",
	"EHOSTUNREACH",
	"ECONNRESET",
	"EPIPE",
	"UND_ERR_SOCKET",
	"UND_ERR_CONNECT_TIMEOUT",
];

function isConnectionError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	if (NETWORK_ERROR_MESSAGES.some((m) => error.message.includes(m))) {
		return true;
	}

	const code = getErrorCode(error);
	return typeof code === "string" && CONNECTION_ERROR_CODES.includes(code);
}

/**
 * Base error for everything the SDK throws.
 *
 * - `status` is the HTTP status code, or 0 for errors raised locally.
 * - `code` is a machine readable code when one is known.
 * - `data` may carry structured details for diagnostics.
 */
export class CdpError extends Error {
	public readonly code?: string;
	/** HTTP status code. 0 for non-HTTP/internal errors. */
	public readonly status: number;
	public readonly data?: unknown;
	/** Origin of the error: server (HTTP response) or sdk (local). */
	public readonly origin: "server" | "sdk";

	constructor({
		message,
		code,
		status,
		data,
		origin,
		cause,
	}: {
		message: string;
		code?: string;
		status?: number;
		data?: unknown;
		origin?: "server" | "sdk";
		cause?: unknown;
	}) {
		super(message, cause === undefined ? undefined : { cause });
		this.code = code;
		this.status = typeof status === "number" ? status : 0;
		this.data = data;
		this.origin = origin ?? "sdk";
		this.name = "CdpError";
	}
}

/**
 * Identifiers of the items touched by a batch of requests, split by outcome.
 *
 * - `successful`: the request carrying the item succeeded.
 * - `failed`: the request was rejected (4xx) and had no effect.
 * - `unknown`: the request failed in a way (5xx) that leaves the outcome unknown.
 */
export type ItemOutcomes<T = unknown> = {
	successful: T[];
	failed: T[];
	unknown: T[];
};

export type ApiErrorInit = {
	message: string;
	status: number;
	code?: string;
	xRequestId?: string;
	missing?: unknown[];
	duplicated?: unknown[];
	extra?: Record<string, unknown>;
	/** Where the failure came from. Connection errors in a bulk operation are `"sdk"`. */
	origin?: "server" | "sdk";
	cause?: unknown;
} & Partial<ItemOutcomes>;

/**
 * Error response from the API.
 *
 * When raised from a bulk operation it also reports which items were
 * written, which were rejected and which are in an unknown state.
 */
export class CdpApiError extends CdpError implements ItemOutcomes {
	public readonly xRequestId?: string;
	public readonly missing?: unknown[];
	public readonly duplicated?: unknown[];
	public readonly extra?: Record<string, unknown>;
	public readonly successful: unknown[];
	public readonly failed: unknown[];
	public readonly unknown: unknown[];

	constructor(init: ApiErrorInit) {
		super({
			message: init.message,
			code: init.code,
			status: init.status,
			origin: init.origin ?? "server",
			data: init.extra,
			cause: init.cause,
		});
		this.name = "CdpApiError";
		this.xRequestId = init.xRequestId;
		this.missing = init.missing;
		this.duplicated = init.duplicated;
		this.extra = init.extra;
		this.successful = init.successful ?? [];
		this.failed = init.failed ?? [];
		this.unknown = init.unknown ?? [];
	}

	override toString(): string {
		const parts = [`${this.message} | code: ${this.status}`];
		if (this.xRequestId) parts.push(`X-Request-ID: ${this.xRequestId}`);
		if (this.missing?.length) parts.push(`missing: ${this.missing.length}`);
		if (this.duplicated?.length) {
			parts.push(`duplicated: ${this.duplicated.length}`);
		}
		if (this.successful.length + this.failed.length + this.unknown.length) {
			parts.push(
				`successful: ${this.successful.length}, failed: ${this.failed.length}, unknown: ${this.unknown.length}`,
			);
		}
		return parts.join(" | ");
	}
}

/** Raised when one or more requested items do not exist. */
export class CdpNotFoundError extends CdpApiError {
	public readonly notFound: unknown[];

	constructor(init: Omit<ApiErrorInit, "message" | "status"> & {
		notFound: unknown[];
		status?: number;
	}) {
		super({
			...init,
			message: `Not found: ${JSON.stringify(init.notFound)}`,
			status: init.status ?? 400,
			missing: init.notFound,
		});
		this.name = "CdpNotFoundError";
		this.notFound = init.notFound;
	}
}

/** Raised when one or more items to create already exist. */
export class CdpDuplicatedError extends CdpApiError {
	constructor(init: Omit<ApiErrorInit, "message" | "status"> & {
		duplicated: unknown[];
		status?: number;
	}) {
		super({
			...init,
			message: `Duplicated: ${JSON.stringify(init.duplicated)}`,
			status: init.status ?? 409,
		});
		this.name = "CdpDuplicatedError";
	}
}

/** Raised when a credential provider fails to produce a token. */
export class CdpAuthError extends CdpError {
	constructor(message: string, status = 401, cause?: unknown) {
		super({ message, status, code: "AUTH_ERROR", origin: "sdk", cause });
		this.name = "CdpAuthError";
	}
}

/** Normalise anything thrown during a request into a CdpError. */
export function cdpError(error: unknown): CdpError {
	if (error instanceof CdpError) {
		return error;
	}

	if (isConnectionError(error)) {
		const code = getErrorCode(error) ?? "NETWORK_ERROR";

		// DNS failures are not transient
		if (code === "ENOTFOUND") {
			return new CdpError({
				message: "DNS resolution failed (ENOTFOUND)",
				code,
				status: 400,
				origin: "sdk",
				cause: error,
			});
		}

		return new CdpError({
			message: `Connection failed: ${code}`,
			code,
			status: 502,
			origin: "sdk",
			cause: error,
		});
	}

	if (error instanceof Error && error.name === "TimeoutError") {
		return new CdpError({
			message: "Request timed out",
			code: "TIMEOUT",
			status: 408,
			origin: "sdk",
			cause: error,
		});
	}

	if (error instanceof Error && error.name === "AbortError") {
		return abortedError();
	}

	return new CdpError({
		message: error instanceof Error ? error.message : "Unknown error",
		status: 0,
		origin: "sdk",
		cause: error,
	});
}

/** Helper: construct an aborted/cancelled error (499). */
export function abortedError(message = "Request cancelled"): CdpError {
	return new CdpError({
		message,
		code: "ABORTED",
		status: 499,
		origin: "sdk",
	});
}

/** Helper: construct a validation error for bad input (status 0, never retried). */
export function invalidArgument(message: string, details?: unknown): CdpError {
	return new CdpError({
		message,
		code: "INVALID_ARGUMENT",
		status: 0,
		origin: "sdk",
		data: details,
	});
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
	if (value && typeof value === "object" && !Array.isArray(value)) {
		return Object.fromEntries(Object.entries(value));
	}
	return undefined;
}

function nonEmptyList(value: unknown): unknown[] | undefined {
	return Array.isArray(value) && value.length > 0 ? value : undefined;
}

/**
 * Build an API error from an HTTP status and the parsed response body.
 *
 * The platform wraps errors as `{ error: { code, message, missing, duplicated, ... } }`;
 * a string `error` or a non-JSON body is used as the message.
 */
export function makeServerError(
	response: { status: number; statusText?: string; xRequestId?: string },
	payload: unknown,
): CdpApiError {
	const status = response.status;
	const xRequestId = response.xRequestId;
	const fallback = response.statusText || "Request failed";

	const body = asRecord(payload);
	const error = body?.error;

	if (typeof error === "string") {
		return new CdpApiError({ message: error, status, xRequestId });
	}

	const structured = asRecord(error);
	if (structured) {
		const { code: _code, message, missing, duplicated, ...extra } = structured;
		const missingItems = nonEmptyList(missing);
		const duplicatedItems = nonEmptyList(duplicated);
		const init = {
			xRequestId,
			extra: Object.keys(extra).length > 0 ? extra : undefined,
		};

		if (duplicatedItems && !missingItems && status === 409) {
			return new CdpDuplicatedError({
				...init,
				duplicated: duplicatedItems,
				status,
			});
		}
		if (missingItems && !duplicatedItems && (status === 400 || status === 422)) {
			return new CdpNotFoundError({ ...init, notFound: missingItems, status });
		}
		return new CdpApiError({
			...init,
			message: typeof message === "string" ? message : fallback,
			status,
			missing: missingItems,
			duplicated: duplicatedItems,
		});
	}

	const message =
		typeof payload === "string" && payload.trim().length > 0
			? payload
			: fallback;
	return new CdpApiError({ message, status, xRequestId });
}

/**
 * Fold the errors of a batch of tasks into a single error that carries the
 * per-item outcome of the whole batch.
 *
 * - Not-found errors are merged into one {@link CdpNotFoundError}.
 * - Duplicate errors are merged into one {@link CdpDuplicatedError}.
 * - Any other error wins over both. When some items failed or are unknown it is
 *   re-raised as a {@link CdpApiError} with the outcomes attached and the
 *   original error as `cause`.
 */
export function collectErrorsAndThrow(
	errors: unknown[],
	outcomes: ItemOutcomes,
): void {
	const missing: unknown[] = [];
	const duplicated: unknown[] = [];
	let missingError: CdpApiError | undefined;
	let duplicatedError: CdpApiError | undefined;
	let otherError: unknown;

	for (const error of errors) {
		if (error instanceof CdpApiError) {
			if ((error.status === 400 || error.status === 422) && error.missing) {
				missing.push(...error.missing);
				missingError = error;
			} else if (error.status === 409 && error.duplicated) {
				duplicated.push(...error.duplicated);
				duplicatedError = error;
			} else {
				otherError = error;
			}
		} else {
			otherError = error;
		}
	}

	if (otherError !== undefined) {
		if (outcomes.failed.length === 0 && outcomes.unknown.length === 0) {
			throw otherError;
		}
		const base =
			otherError instanceof CdpError
				? otherError
				: new CdpError({
						message: otherError instanceof Error ? otherError.message : "Unknown error",
						status: 0,
						origin: "sdk",
						cause: otherError,
					});
		const api = base instanceof CdpApiError ? base : undefined;
		throw new CdpApiError({
			message: base.message,
			status: base.status,
			code: base.code,
			origin: base.origin,
			xRequestId: api?.xRequestId,
			extra: api?.extra,
			missing,
			duplicated,
			...outcomes,
			cause: base,
		});
	}

	if (missingError) {
		throw new CdpNotFoundError({
			notFound: missing,
			status: missingError.status,
			xRequestId: missingError.xRequestId,
			...outcomes,
			cause: missingError,
		});
	}

	if (duplicatedError) {
		throw new CdpDuplicatedError({
			duplicated,
			xRequestId: duplicatedError.xRequestId,
			...outcomes,
			cause: duplicatedError,
		});
	}
}
