import { type Client, createClient, createConfig } from "@hey-api/client-fetch";
import createDebug from "debug";
import { AuditApi } from "./audit.js";
import { CIAppPipelinesApi, CIAppTestsApi } from "./ciVisibility.js";
import {
	type ClientOptions,
	DatadogEnvironment,
	type RetryConfig,
} from "./common.js";
import { DatadogEndpoints } from "./endpoints.js";
import { makeServerError, validationError } from "./error.js";
import { EventsApi } from "./events.js";
import { IncidentsApi } from "./incidents.js";
import type { ApiContext } from "./internal/operation.js";
import { compressRequest } from "./lib/compression.js";
import * as Redacted from "./lib/redacted.js";
import { DEFAULT_USER_AGENT } from "./lib/runtime.js";
import { LogsApi } from "./logs.js";
import { RUMApi } from "./rum.js";
import { SecurityMonitoringApi } from "./securityMonitoring.js";
import { isUnstableOperationId, UnstableOperations } from "./unstable.js";

const debug = createDebug("ddapi:http");

/**
 * Top-level Datadog API client.
 *
 * - Authenticates with an API key (and application key) and exposes one
 *   property per API resource.
 */
export class DatadogClient {
	private readonly client: Client;
	private readonly unstable: UnstableOperations;

	/** Real User Monitoring events and applications. */
	public readonly rum: RUMApi;
	/** Log search, analytics and intake. */
	public readonly logs: LogsApi;
	/** Events explorer. */
	public readonly events: EventsApi;
	/** Audit Trail. */
	public readonly audit: AuditApi;
	/** CI Visibility pipeline executions. */
	public readonly ciPipelines: CIAppPipelinesApi;
	/** CI Visibility test runs. */
	public readonly ciTests: CIAppTestsApi;
	/** Security signals. */
	public readonly securityMonitoring: SecurityMonitoringApi;
	/** Incident management (beta, see {@link setUnstableOperationEnabled}). */
	public readonly incidents: IncidentsApi;

	/**
	 * Create a new client.
	 *
	 * @param options Keys, site and transport configuration.
	 */
	constructor(options: ClientOptions) {
		if (!options.apiKey) {
			throw validationError("apiKey is required");
		}
		const credentials = {
			apiKey: Redacted.make(options.apiKey),
			appKey:
				options.appKey !== undefined
					? Redacted.make(options.appKey)
					: undefined,
		};
		const endpoints = new DatadogEndpoints({
			site: options.site,
			baseUrl: options.baseUrl,
		});
		const retryConfig: RetryConfig = options.retry ?? {};
		this.unstable = new UnstableOperations(options.unstableOperations);

		this.client = createClient(
			createConfig({
				baseUrl: endpoints.baseUrl(),
				headers: { "User-Agent": options.userAgent ?? DEFAULT_USER_AGENT },
				...(options.fetch ? { fetch: options.fetch } : {}),
			}),
		);

		// Error bodies as received, before the client decodes them.
		const errorBodies = new WeakMap<Response, string>();

		this.client.interceptors.request.use(compressRequest);
		this.client.interceptors.response.use(async (response, request) => {
			debug(
				"%s %s -> %d",
				request.method,
				new URL(request.url).pathname,
				response.status,
			);
			if (!response.ok) {
				errorBodies.set(response, await response.clone().text());
			}
			return response;
		});
		this.client.interceptors.error.use((error, response) => {
			return makeServerError(response, error, errorBodies.get(response));
		});

		const ctx: ApiContext = {
			client: this.client,
			retryConfig,
			endpoints,
			credentials,
			unstable: this.unstable,
		};

		this.rum = new RUMApi(ctx);
		this.logs = new LogsApi(ctx);
		this.events = new EventsApi(ctx);
		this.audit = new AuditApi(ctx);
		this.ciPipelines = new CIAppPipelinesApi(ctx);
		this.ciTests = new CIAppTestsApi(ctx);
		this.securityMonitoring = new SecurityMonitoringApi(ctx);
		this.incidents = new IncidentsApi(ctx);
	}

	/**
	 * Create a client from `DD_API_KEY`, `DD_APP_KEY` (or `DD_APPLICATION_KEY`),
	 * `DD_SITE` and `DD_API_URL`. Explicit `overrides` win over the environment.
	 *
	 * @throws DatadogError when no API key is configured
	 */
	public static fromEnvironment(
		overrides: Partial<ClientOptions> = {},
		env: Record<string, string | undefined> = process.env,
	): DatadogClient {
		const config = { ...DatadogEnvironment.parse(env), ...overrides };
		const { apiKey } = config;
		if (!apiKey) {
			throw validationError(
				"No API key configured: set DD_API_KEY or pass apiKey",
			);
		}
		return new DatadogClient({ ...config, apiKey });
	}

	/**
	 * Enable or disable a beta operation, e.g. `v2.ListIncidents`.
	 *
	 * @throws DatadogError when `operationId` is not a known unstable operation
	 */
	public setUnstableOperationEnabled(
		operationId: string,
		enabled: boolean,
	): void {
		this.unstable.set(operationId, enabled);
	}

	public isUnstableOperationEnabled(operationId: string): boolean {
		return (
			isUnstableOperationId(operationId) &&
			this.unstable.isEnabled(operationId)
		);
	}
}
