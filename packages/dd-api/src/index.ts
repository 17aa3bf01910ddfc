// =============================================================================
// Core Client
// =============================================================================

/** Top-level entrypoint for the library. */
export { DatadogClient } from "./client.js";

// =============================================================================
// Resource APIs
// =============================================================================

export { AuditApi, type ListAuditLogsArgs } from "./audit.js";
export {
	CIAppEventsApi,
	CIAppPipelinesApi,
	CIAppTestsApi,
	type ListCIAppEventsArgs,
} from "./ciVisibility.js";
export { EventsApi, type ListEventsQueryArgs } from "./events.js";
export {
	type GetIncidentArgs,
	type IncidentIdArgs,
	IncidentsApi,
	type ListIncidentsArgs,
	type UpdateIncidentArgs,
} from "./incidents.js";
export {
	type ListLogsGetArgs,
	LogsApi,
	MAX_LOGS_PER_SUBMIT,
	MAX_SUBMIT_PAYLOAD_BYTES,
	type SubmitLogArgs,
} from "./logs.js";
export {
	type ListRUMEventsArgs,
	RUMApi,
	type RUMApplicationIdArgs,
	type UpdateRUMApplicationArgs,
} from "./rum.js";
export {
	type EditSignalAssigneeArgs,
	type EditSignalIncidentsArgs,
	type EditSignalStateArgs,
	type ListSignalsArgs,
	SecurityMonitoringApi,
	type SignalIdArgs,
} from "./securityMonitoring.js";

// =============================================================================
// Configuration
// =============================================================================

export type {
	ClientOptions,
	EnvironmentConfig,
	PaginationOptions,
	RequestOptions,
	RetryConfig,
	RetryPolicy,
} from "./common.js";
export { DatadogEnvironment } from "./common.js";
export {
	DATADOG_SITES,
	DatadogEndpoints,
	type DatadogEndpointsInit,
	type DatadogSite,
	DEFAULT_SITE,
	isDatadogSite,
	normalizeBaseUrl,
} from "./endpoints.js";
export {
	isUnstableOperationId,
	UNSTABLE_OPERATION_IDS,
	type UnstableOperationId,
} from "./unstable.js";

// =============================================================================
// Errors
// =============================================================================

export {
	abortedError,
	DatadogError,
	type ErrorOrigin,
	validationError,
} from "./error.js";

// =============================================================================
// Pagination
// =============================================================================

export {
	type CursorPage,
	type CursorPageFetcher,
	type CursorPaginationOptions,
	collectAll,
	DEFAULT_PAGE_SIZE,
	type OffsetPageFetcher,
	type OffsetPaginationOptions,
	paginateByCursor,
	paginateByOffset,
} from "./lib/paginate.js";

// =============================================================================
// Models
// =============================================================================

/**
 * Wire types. These use snake_case field names matching the JSON payloads.
 */
export * from "./models/index.js";

export {
	CONTENT_ENCODINGS,
	type ContentEncoding,
} from "./lib/compression.js";
export { VERSION } from "./version.js";
