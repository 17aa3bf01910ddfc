import type { UnstableOperationId } from "./unstable.js";

/**
 * Policy for retrying operations that change server state.
 *
 * - `all`: Retry every operation, including creates, updates, deletes and log intake (default)
 * - `noSideEffects`: Only retry operations that are guaranteed to have no side effects
 */
export type RetryPolicy = "all" | "noSideEffects";

/**
 * Retry configuration for handling transient failures.
 */
export type RetryConfig = {
	/**
	 * Total number of attempts, including the initial try.
	 * Must be >= 1. A value of 1 means no retries.
	 * @default 3
	 */
	maxAttempts?: number;

	/**
	 * Minimum delay in milliseconds for exponential backoff.
	 * @default 100
	 */
	minDelayMillis?: number;

	/**
	 * Maximum base delay in milliseconds for exponential backoff.
	 * Note: actual delay with jitter can be up to 1.5*maxDelayMillis.
	 * @default 1000
	 */
	maxDelayMillis?: number;

	/**
	 * Policy for retrying operations with side effects.
	 * @default "all"
	 */
	retryPolicy?: RetryPolicy;
};

/**
 * Configuration for constructing the top-level `DatadogClient`.
 */
export type ClientOptions = {
	/** Sent as `DD-API-KEY` on every request. */
	apiKey: string;
	/** Sent as `DD-APPLICATION-KEY` on every request except log intake. */
	appKey?: string;
	/**
	 * Datadog site the organisation lives on.
	 * @default "datadoghq.com"
	 */
	site?: string;
	/**
	 * Full override of the API base URL (proxies, local mocks).
	 * Takes precedence over `site` for every operation.
	 */
	baseUrl?: string;
	/**
	 * Retry configuration for handling transient failures.
	 * @default { maxAttempts: 3, minDelayMillis: 100, maxDelayMillis: 1000, retryPolicy: "all" }
	 */
	retry?: RetryConfig;
	/** Opt in to beta operations, e.g. `{ "v2.ListIncidents": true }`. */
	unstableOperations?: Partial<Record<UnstableOperationId, boolean>>;
	/** Custom fetch implementation. Defaults to the global `fetch`. */
	fetch?: (request: Request) => Promise<Response>;
	/** Overrides the default `User-Agent` header. */
	userAgent?: string;
};

export type EnvironmentConfig = Partial<ClientOptions>;

export class DatadogEnvironment {
	public static parse(
		env: Record<string, string | undefined> = process.env,
	): EnvironmentConfig {
		const config: EnvironmentConfig = {};

		const apiKey = env.DD_API_KEY;
		if (apiKey) {
			config.apiKey = apiKey;
		}

		const appKey = env.DD_APP_KEY ?? env.DD_APPLICATION_KEY;
		if (appKey) {
			config.appKey = appKey;
		}

		const site = env.DD_SITE;
		if (site) {
			config.site = site;
		}

		const baseUrl = env.DD_API_URL;
		if (baseUrl) {
			config.baseUrl = baseUrl;
		}

		return config;
	}
}

/**
 * Per-request options that apply to all operations.
 */
export type RequestOptions = {
	/**
	 * Optional abort signal to cancel the underlying HTTP request.
	 */
	signal?: AbortSignal;
};

/**
 * Options for the `*WithPagination` helpers.
 */
export type PaginationOptions = RequestOptions & {
	/**
	 * Request the next page as soon as the current one arrives, while its
	 * items are still being consumed. At most one page is in flight.
	 * @default false
	 */
	readAhead?: boolean;
};
