import createDebug from "debug";
import type { RetryConfig } from "../common.js";
import { abortedError, DatadogError } from "../error.js";

const debug = createDebug("ddapi:retry");

/**
 * Default retry configuration.
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
	maxAttempts: 3,
	minDelayMillis: 100,
	maxDelayMillis: 1000,
	retryPolicy: "all",
};

/** Upper bound on how long a rate-limit reset is honoured. */
export const MAX_RATE_LIMIT_WAIT_MILLIS = 60_000;

const RETRYABLE_STATUS_CODES = new Set([
	408, // request_timeout
	429, // too_many_requests
	500, // internal_server_error
	502, // bad_gateway
	503, // service_unavailable
	504, // gateway_timeout
]);

/**
 * Determines if an error should be retried based on its status.
 * Local errors (status 0) and 4xx other than 408/429 are final.
 */
export function isRetryable(error: DatadogError): boolean {
	if (!error.status) return false;
	return RETRYABLE_STATUS_CODES.has(error.status);
}

/**
 * Exponential backoff with ±50% jitter.
 *
 * @param attempt 0-based retry number
 */
export function calculateDelay(
	attempt: number,
	minDelayMillis: number,
	maxDelayMillis: number,
): number {
	const base = Math.min(maxDelayMillis, minDelayMillis * 2 ** attempt);
	const jitterRange = 0.5;
	const factor = 1 + (Math.random() * 2 - 1) * jitterRange; // [0.5, 1.5]
	return Math.floor(Math.max(0, base * factor));
}

/**
 * Delay before the next attempt. A 429 carrying `X-RateLimit-Reset` waits
 * for the reset window instead of the backoff schedule.
 */
export function retryDelay(
	error: DatadogError,
	attempt: number,
	config: Required<RetryConfig>,
): number {
	if (error.status === 429 && error.retryAfterMillis !== undefined) {
		return Math.min(error.retryAfterMillis, MAX_RATE_LIMIT_WAIT_MILLIS);
	}
	return calculateDelay(attempt, config.minDelayMillis, config.maxDelayMillis);
}

/**
 * Sleeps for the specified duration, waking early when `signal` aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve) => {
		if (signal?.aborted) {
			resolve();
			return;
		}
		const onAbort = () => {
			clearTimeout(timer);
			resolve();
		};
		const timer = setTimeout(() => {
			signal?.removeEventListener("abort", onAbort);
			resolve();
		}, ms);
		signal?.addEventListener("abort", onAbort, { once: true });
	});
}

export type WithRetriesOptions = {
	/** Extra gate on top of the status check, e.g. the side-effect policy. */
	isPolicyCompliant?: (
		config: Required<RetryConfig>,
		error: DatadogError,
	) => boolean;
	/** Stops retrying once aborted. */
	signal?: AbortSignal;
};

/**
 * Executes an async function with automatic retry logic for transient failures.
 *
 * @param retryConfig Retry configuration (max attempts, backoff bounds)
 * @param fn The async function to execute
 * @returns The result of the function
 * @throws The last error if all retry attempts are exhausted
 */
export async function withRetries<T>(
	retryConfig: RetryConfig | undefined,
	fn: () => Promise<T>,
	options: WithRetriesOptions = {},
): Promise<T> {
	const config: Required<RetryConfig> = {
		...DEFAULT_RETRY_CONFIG,
		...retryConfig,
	};
	const { isPolicyCompliant = () => true, signal } = options;

	// Enforce minimum of 1 attempt (1 = no retries)
	if (config.maxAttempts < 1) config.maxAttempts = 1;

	let lastError: DatadogError | undefined = undefined;

	// attemptNo is 1-based: 1..maxAttempts
	for (let attemptNo = 1; attemptNo <= config.maxAttempts; attemptNo++) {
		try {
			const result = await fn();
			if (attemptNo > 1) {
				debug("succeeded after %d retries", attemptNo - 1);
			}
			return result;
		} catch (error) {
			// withRetries only handles DatadogErrors (withDatadogData runs first)
			if (!(error instanceof DatadogError)) {
				debug("non-DatadogError thrown, rethrowing immediately: %s", error);
				throw error;
			}

			lastError = error;

			if (attemptNo === config.maxAttempts) {
				debug("max attempts exhausted, throwing error");
				break;
			}

			if (signal?.aborted) {
				debug("aborted, not retrying");
				throw error;
			}

			if (!isPolicyCompliant(config, error) || !isRetryable(error)) {
				debug("error not retryable, throwing immediately");
				throw error;
			}

			const delay = retryDelay(error, attemptNo - 1, config);
			debug(
				"retryable error, backing off for %dms, status=%s",
				delay,
				error.status,
			);
			await sleep(delay, signal);
			if (signal?.aborted) {
				throw abortedError();
			}
		}
	}

	throw lastError;
}
