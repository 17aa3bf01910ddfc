import type { Client } from "@hey-api/client-fetch";
import type { RequestOptions, RetryConfig } from "../common.js";
import type { DatadogEndpoints } from "../endpoints.js";
import { validationError, withDatadogData } from "../error.js";
import * as Redacted from "../lib/redacted.js";
import { withRetries } from "../lib/retry.js";
import type { UnstableOperations } from "../unstable.js";
import type { QueryValue } from "./params.js";
import { buildQuery } from "./params.js";

export type HttpMethod = "GET" | "POST" | "PATCH" | "DELETE";

/** Security schemes an operation authenticates with. */
export type AuthScheme = "apiKeyAuth" | "appKeyAuth";

const AUTH_HEADERS: Record<AuthScheme, string> = {
	apiKeyAuth: "DD-API-KEY",
	appKeyAuth: "DD-APPLICATION-KEY",
};

const DEFAULT_AUTH: readonly AuthScheme[] = ["apiKeyAuth", "appKeyAuth"];

export type OperationSpec = {
	/** Operation id, e.g. `v2.ListRUMEvents`. */
	readonly id: string;
	readonly method: HttpMethod;
	/** Path template relative to the server, e.g. `/api/v2/rum/applications/{id}`. */
	readonly url: string;
	/** @default ["apiKeyAuth", "appKeyAuth"] */
	readonly auth?: readonly AuthScheme[];
	/** Creates, updates, deletes and intake are not retried under `noSideEffects`. */
	readonly sideEffects?: boolean;
};

export type OperationCall = RequestOptions & {
	path?: Record<string, string>;
	query?: Record<string, QueryValue | undefined>;
	body?: unknown;
	headers?: Record<string, string>;
};

export type Credentials = {
	readonly apiKey: Redacted.Redacted;
	readonly appKey?: Redacted.Redacted;
};

/**
 * Everything a resource API needs to execute operations.
 */
export type ApiContext = {
	readonly client: Client;
	readonly retryConfig: RetryConfig;
	readonly endpoints: DatadogEndpoints;
	readonly credentials: Credentials;
	readonly unstable: UnstableOperations;
};

function authHeaders(
	credentials: Credentials,
	spec: OperationSpec,
): Record<string, string> {
	const headers: Record<string, string> = {};
	for (const scheme of spec.auth ?? DEFAULT_AUTH) {
		const secret =
			scheme === "apiKeyAuth" ? credentials.apiKey : credentials.appKey;
		if (!secret) {
			throw validationError(`appKey is required for ${spec.id}`);
		}
		headers[AUTH_HEADERS[scheme]] = Redacted.value(secret);
	}
	return headers;
}

type ParseAs = "auto" | "text";

async function executeOperation<T>(
	ctx: ApiContext,
	spec: OperationSpec,
	build: OperationCall | (() => OperationCall),
	parseAs: ParseAs,
): Promise<T> {
	ctx.unstable.assertEnabled(spec.id);
	const call = typeof build === "function" ? build() : build;

	const headers: Record<string, string> = {
		Accept: "application/json",
		...authHeaders(ctx.credentials, spec),
		...call.headers,
	};
	const query = call.query ? buildQuery(call.query) : undefined;

	return await withRetries(
		ctx.retryConfig,
		async () => {
			return await withDatadogData<T>(() =>
				ctx.client.request<T, unknown>({
					method: spec.method,
					url: spec.url,
					baseUrl: ctx.endpoints.baseUrl(spec.id),
					path: call.path,
					query,
					body: call.body,
					headers,
					parseAs,
					signal: call.signal,
				}),
			);
		},
		{
			isPolicyCompliant: spec.sideEffects
				? (config) => config.retryPolicy !== "noSideEffects"
				: undefined,
			signal: call.signal,
		},
	);
}

/**
 * Run one API operation: gate unstable ids, serialise the query, attach auth
 * headers, execute with retries and return the decoded body.
 *
 * `build` may be a function so that argument validation runs after the
 * unstable-operation gate.
 */
export async function callOperation<T>(
	ctx: ApiContext,
	spec: OperationSpec,
	build: OperationCall | (() => OperationCall) = {},
): Promise<T> {
	return await executeOperation<T>(ctx, spec, build, "auto");
}

/**
 * Same as {@link callOperation} for operations without a response body.
 * Whatever the server sends back is read as text and discarded.
 */
export async function callVoidOperation(
	ctx: ApiContext,
	spec: OperationSpec,
	build: OperationCall | (() => OperationCall) = {},
): Promise<void> {
	await executeOperation<unknown>(ctx, spec, build, "text");
}
