import createDebug from "debug";
import type { RetryConfig } from "../common.js";
import { abortedError, CdpError } from "../error.js";

const debug = createDebug("cdp:retry");

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
	maxAttempts: 10,
	minDelayMillis: 500,
	maxDelayMillis: 60_000,
};

/** Smallest delay between two attempts, so a retry is never immediate. */
const DELAY_FLOOR_MILLIS = 100;

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
	429, // too_many_requests
	502, // bad_gateway (also used for SDK connection errors)
	503, // service_unavailable
	504, // gateway_timeout
]);

/**
 * Determines if an error may succeed when the same request is sent again.
 */
export function isRetryable(error: CdpError): boolean {
	if (!error.status) return false;
	return RETRYABLE_STATUS_CODES.has(error.status);
}

/**
 * Exponential backoff with full jitter and a small floor:
 * `100 + U(0, min(minDelayMillis * 2^attempt, maxDelayMillis))`.
 *
 * @param attempt 0-based number of retries already made
 */
export function calculateDelay(
	attempt: number,
	config: Pick<Required<RetryConfig>, "minDelayMillis" | "maxDelayMillis">,
): number {
	const base = config.minDelayMillis * 2 ** attempt;
	const cap = Math.min(base, config.maxDelayMillis);
	return Math.floor(DELAY_FLOOR_MILLIS + Math.random() * cap);
}

/**
 * Sleeps for the specified duration. When the signal fires it rejects early
 * with an aborted error, or resolves early with `resolveOnAbort`.
 */
export function sleep(
	ms: number,
	signal?: AbortSignal,
	{ resolveOnAbort = false }: { resolveOnAbort?: boolean } = {},
): Promise<void> {
	return new Promise((resolve, reject) => {
		const aborted = () => (resolveOnAbort ? resolve() : reject(abortedError()));
		if (signal?.aborted) {
			aborted();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			aborted();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

/**
 * Executes an async function with automatic retry logic for transient failures.
 *
 * @param retryConfig Retry configuration (max attempts, backoff)
 * @param fn The async function to execute
 * @param isPolicyCompliant Extra gate deciding whether this particular error may be retried
 * @returns The result of the function
 * @throws The last error if all retry attempts are exhausted
 */
export async function withRetries<T>(
	retryConfig: RetryConfig | undefined,
	fn: () => Promise<T>,
	isPolicyCompliant: (error: CdpError) => boolean = () => true,
	signal?: AbortSignal,
): Promise<T> {
	const config = {
		...DEFAULT_RETRY_CONFIG,
		...retryConfig,
	};

	// Enforce minimum of 1 attempt (1 = no retries)
	const maxAttempts = Math.max(1, config.maxAttempts);

	let lastError: CdpError | undefined = undefined;

	// attemptNo is 1-based: 1..maxAttempts
	for (let attemptNo = 1; attemptNo <= maxAttempts; attemptNo++) {
		try {
			const result = await fn();
			if (attemptNo > 1) {
				debug("succeeded after %d retries", attemptNo - 1);
			}
			return result;
		} catch (error) {
			// Only CdpErrors carry enough information to decide on a retry
			if (!(error instanceof CdpError)) {
				debug("non-CdpError thrown, rethrowing immediately: %s", error);
				throw error;
			}

			lastError = error;

			if (attemptNo === maxAttempts) {
				debug("max attempts exhausted, throwing error");
				break;
			}

			if (!isRetryable(error) || !isPolicyCompliant(error)) {
				debug("error not retryable (status=%d), throwing immediately", error.status);
				throw error;
			}

			const delay = calculateDelay(attemptNo - 1, config);
			debug(
				"retryable error, attempt #%d, backing off for %dms, status=%d, reason=%s",
				attemptNo,
				delay,
				error.status,
				error.message,
			);
			await sleep(delay, signal);
		}
	}

	throw lastError;
}
