/**
 * Wire shapes shared by the search-style endpoints (RUM, logs, events,
 * audit, CI visibility, security signals).
 *
 * Field names match the JSON payloads. Every object type is open so fields
 * this library does not know about survive a decode/encode round unchanged.
 */

// =============================================================================
// Errors
// =============================================================================

/** Standard API error payload. */
export interface APIErrorResponse {
	errors: string[];
	[key: string]: unknown;
}

/** Single intake error entry. */
export interface HTTPLogError {
	code?: string;
	detail?: string;
	status?: string;
	title?: string;
	[key: string]: unknown;
}

/** Intake error payload. */
export interface HTTPLogErrors {
	errors?: HTTPLogError[];
	[key: string]: unknown;
}

// =============================================================================
// Enums
// =============================================================================

export const EVENT_SORT_VALUES = ["timestamp", "-timestamp"] as const;

/** Sort order of search results, ascending or descending by timestamp. */
export type EventSort = (typeof EVENT_SORT_VALUES)[number];

export function isEventSort(value: string): value is EventSort {
	return (EVENT_SORT_VALUES as readonly string[]).includes(value);
}

export const AGGREGATION_FUNCTIONS = [
	"count",
	"cardinality",
	"pc75",
	"pc90",
	"pc95",
	"pc98",
	"pc99",
	"sum",
	"min",
	"max",
	"avg",
	"median",
] as const;

export type AggregationFunction = (typeof AGGREGATION_FUNCTIONS)[number];

export function isAggregationFunction(
	value: string,
): value is AggregationFunction {
	return (AGGREGATION_FUNCTIONS as readonly string[]).includes(value);
}

export const COMPUTE_TYPES = ["timeseries", "total"] as const;

export type ComputeType = (typeof COMPUTE_TYPES)[number];

export const RESPONSE_STATUSES = ["done", "timeout"] as const;

/**
 * Whether a query completed. Unknown values from newer servers stay as plain
 * strings; use {@link isResponseStatus} to tell them apart.
 */
export type ResponseStatus = (typeof RESPONSE_STATUSES)[number];

export function isResponseStatus(value: string): value is ResponseStatus {
	return (RESPONSE_STATUSES as readonly string[]).includes(value);
}

// =============================================================================
// Search requests / responses
// =============================================================================

export interface QueryFilter {
	/** Minimum time (ISO 8601, date math or timestamp in ms). */
	from?: string;
	query?: string;
	/** Maximum time (ISO 8601, date math or timestamp in ms). */
	to?: string;
	[key: string]: unknown;
}

export interface PageOptions {
	cursor?: string;
	limit?: number;
	[key: string]: unknown;
}

export interface QueryOptions {
	time_offset?: number;
	timezone?: string;
	[key: string]: unknown;
}

/** Body of the `POST .../search` endpoints. */
export interface SearchRequest<TFilter extends QueryFilter = QueryFilter> {
	filter?: TFilter;
	options?: QueryOptions;
	page?: PageOptions;
	sort?: EventSort;
	[key: string]: unknown;
}

export interface ResponseWarning {
	code?: string;
	detail?: string;
	title?: string;
	[key: string]: unknown;
}

export interface ResponseMetadata {
	elapsed?: number;
	page?: { after?: string; [key: string]: unknown };
	request_id?: string;
	status?: ResponseStatus | (string & {});
	warnings?: ResponseWarning[];
	[key: string]: unknown;
}

export interface ResponseLinks {
	/** Link to the next page, when there is one. */
	next?: string;
	[key: string]: unknown;
}

/** Response of the list/search endpoints. */
export interface SearchResponse<TItem> {
	data?: TItem[];
	links?: ResponseLinks;
	meta?: ResponseMetadata;
	[key: string]: unknown;
}

/**
 * Item of a search response. `attributes` is left open: event payloads carry
 * arbitrary user-defined keys.
 */
export interface SearchEvent<TType extends string, TAttributes> {
	id?: string;
	type?: TType | (string & {});
	attributes?: TAttributes;
	[key: string]: unknown;
}

export interface EventAttributes {
	/** Custom JSON attributes. */
	attributes?: Record<string, unknown>;
	service?: string;
	tags?: string[];
	timestamp?: string;
	[key: string]: unknown;
}

// =============================================================================
// Aggregation
// =============================================================================

export interface Compute {
	aggregation: AggregationFunction;
	/** Time interval for timeseries computes, e.g. `5m`. */
	interval?: string;
	metric?: string;
	type?: ComputeType;
	[key: string]: unknown;
}

export interface GroupBy {
	facet: string;
	limit?: number;
	missing?: string | number;
	sort?: {
		aggregation?: AggregationFunction;
		metric?: string;
		order?: "asc" | "desc";
		type?: "alphabetical" | "measure";
		[key: string]: unknown;
	};
	total?: boolean | string | number;
	[key: string]: unknown;
}

export interface AggregateRequest<TFilter extends QueryFilter = QueryFilter> {
	compute?: Compute[];
	filter?: TFilter;
	group_by?: GroupBy[];
	options?: QueryOptions;
	page?: { cursor?: string; [key: string]: unknown };
	[key: string]: unknown;
}

export interface TimeseriesPoint {
	time?: string;
	value?: number;
	[key: string]: unknown;
}

/** A bucket value is a string, a number, or a timeseries (oneOf). */
export type BucketValue = string | number | TimeseriesPoint[];

export function isBucketTimeseries(
	value: BucketValue,
): value is TimeseriesPoint[] {
	return Array.isArray(value);
}

export function isBucketNumber(value: BucketValue): value is number {
	return typeof value === "number";
}

export function isBucketString(value: BucketValue): value is string {
	return typeof value === "string";
}

export interface AggregateBucket {
	by?: Record<string, unknown>;
	computes?: Record<string, BucketValue>;
	[key: string]: unknown;
}

export interface AggregateResponse {
	data?: { buckets?: AggregateBucket[]; [key: string]: unknown };
	links?: ResponseLinks;
	meta?: ResponseMetadata;
	[key: string]: unknown;
}

/**
 * Query parameters shared by the `GET` list endpoints.
 */
export interface ListEventsArgs<TSort extends string = EventSort> {
	filterQuery?: string;
	filterFrom?: Date | string;
	filterTo?: Date | string;
	sort?: TSort;
	pageCursor?: string;
	/** Max number of events per page. */
	pageLimit?: number;
}
