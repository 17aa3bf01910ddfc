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

function isConnectionError(error: unknown): boolean {
	if (!(error instanceof Error)) {
		return false;
	}

	if (error.message.includes("fetch failed")) {
		return true;
	}

	const code = getErrorCode(error);

	// Common connection error codes from Node.js net module
	const connectionErrorCodes = [
		"ECONNREFUSED", // Connection refused
		"ENOTFOUND", // DNS lookup failed
		"ETIMEDOUT", // Connection timeout
		"ENETUNREACH", // Network unreachable
		"EHOSTUNREACH", // Host unreachable
		"ECONNRESET", // Connection reset by peer
		"EPIPE", // Broken pipe
	];

	return typeof code === "string" && connectionErrorCodes.includes(code);
}

export type ErrorOrigin = "server" | "sdk";

/**
 * Rich error type used by the client to surface HTTP and local failures.
 *
 * - `status` is the HTTP status code (0 for local errors, 499 when aborted).
 * - `body` is the raw response text, `model` the decoded error payload.
 * - `retryAfterMillis` is set from `X-RateLimit-Reset` on 429 responses.
 */
export class DatadogError extends Error {
	public readonly code?: string;
	/** HTTP status code. 0 for non-HTTP/internal errors. */
	public readonly status: number;
	/** Origin of the error: server (HTTP response) or sdk (local). */
	public readonly origin: ErrorOrigin;
	/** Raw response body, when the error came from a response. */
	public readonly body?: string;
	/** Decoded error payload (`APIErrorResponse`, `HTTPLogErrors`, ...). */
	public readonly model?: unknown;
	public readonly retryAfterMillis?: number;

	constructor({
		message,
		code,
		status,
		origin,
		body,
		model,
		retryAfterMillis,
	}: {
		message: string;
		code?: string;
		status?: number;
		origin?: ErrorOrigin;
		body?: string;
		model?: unknown;
		retryAfterMillis?: number;
	}) {
		super(message);
		this.code = code;
		this.status = typeof status === "number" ? status : 0;
		this.origin = origin ?? "sdk";
		this.body = body;
		this.model = model;
		this.retryAfterMillis = retryAfterMillis;
		this.name = "DatadogError";
	}
}

export function datadogError(error: unknown): DatadogError {
	if (error instanceof DatadogError) {
		return error;
	}

	if (isConnectionError(error)) {
		const code = getErrorCode(error) ?? "NETWORK_ERROR";

		// DNS failures are typically not transient - don't retry
		if (code === "ENOTFOUND") {
			return new DatadogError({
				message: "DNS resolution failed (ENOTFOUND)",
				code,
				status: 400,
				origin: "sdk",
			});
		}

		return new DatadogError({
			message: `Connection failed: ${code}`,
			code,
			status: 502,
			origin: "sdk",
		});
	}

	if (error instanceof Error && error.name === "AbortError") {
		return abortedError();
	}

	return new DatadogError({
		message: error instanceof Error ? error.message : "Unknown error",
		status: 0,
		origin: "sdk",
	});
}

/** Helper: construct a client-side validation error (never retried). */
export function validationError(message: string): DatadogError {
	return new DatadogError({
		message,
		code: "VALIDATION_ERROR",
		status: 400,
		origin: "sdk",
	});
}

/** Helper: construct an aborted/cancelled error (499). */
export function abortedError(message: string = "Request cancelled"): DatadogError {
	return new DatadogError({
		message,
		code: "ABORTED",
		status: 499,
		origin: "sdk",
	});
}

function describeErrorEntry(entry: unknown): string | undefined {
	if (typeof entry === "string") {
		return entry.trim() || undefined;
	}
	if (entry && typeof entry === "object") {
		const title =
			"title" in entry && typeof entry.title === "string"
				? entry.title
				: undefined;
		const detail =
			"detail" in entry && typeof entry.detail === "string"
				? entry.detail
				: undefined;
		if (title && detail) return `${title}: ${detail}`;
		return title ?? detail;
	}
	return undefined;
}

function messageFromPayload(payload: unknown): string | undefined {
	if (payload && typeof payload === "object" && "errors" in payload) {
		const errors = payload.errors;
		if (Array.isArray(errors)) {
			for (const entry of errors) {
				const message = describeErrorEntry(entry);
				if (message !== undefined) return message;
			}
		}
	}
	if (typeof payload === "string" && payload.trim().length > 0) {
		return payload;
	}
	return undefined;
}

function parseRateLimitReset(headers: Headers | undefined): number | undefined {
	const raw = headers?.get("x-ratelimit-reset");
	if (!raw) return undefined;
	const seconds = Number(raw);
	if (!Number.isFinite(seconds) || seconds < 0) return undefined;
	return seconds * 1000;
}

/**
 * Build a DatadogError from an HTTP response and its decoded payload.
 * Understands both `{ errors: string[] }` and the intake
 * `{ errors: [{ title, detail }] }` shapes.
 *
 * @param rawBody Response text as received; derived from `payload` when absent.
 */
export function makeServerError(
	response: { status?: number; statusText?: string; headers?: Headers },
	payload?: unknown,
	rawBody?: string,
): DatadogError {
	const status = typeof response.status === "number" ? response.status : 500;
	const fallback = response.statusText
		? `HTTP ${status} ${response.statusText}`
		: `HTTP ${status}`;
	const body =
		rawBody ??
		(payload === undefined
			? undefined
			: typeof payload === "string"
				? payload
				: JSON.stringify(payload));
	const model =
		payload !== null && typeof payload === "object" ? payload : undefined;

	return new DatadogError({
		message: messageFromPayload(payload) ?? fallback,
		status,
		origin: "server",
		body,
		model,
		retryAfterMillis:
			status === 429 ? parseRateLimitReset(response.headers) : undefined,
	});
}

type ClientResponse<T> = {
	data?: T;
	error?: unknown;
	response?: { status?: number; statusText?: string; headers?: Headers };
};

/**
 * Execute a client call and return its `data` on success.
 * Throws DatadogError when the response carries an error or no data.
 */
export async function withDatadogData<T>(
	fn: () => Promise<ClientResponse<T>>,
): Promise<T> {
	try {
		const res = await fn();
		if (res.error) {
			if (res.error instanceof DatadogError) throw res.error;
			throw makeServerError(res.response ?? {}, res.error);
		}
		if (res.data === undefined) {
			throw new DatadogError({
				message: "Empty response",
				status: res.response?.status,
				origin: "server",
			});
		}
		return res.data;
	} catch (error) {
		throw datadogError(error);
	}
}
