import type {
	AggregateRequest,
	QueryFilter,
	SearchEvent,
	SearchRequest,
	SearchResponse,
} from "./common.js";

export const LOGS_SORT_VALUES = ["timestamp", "-timestamp"] as const;

export type LogsSort = (typeof LOGS_SORT_VALUES)[number];

export function isLogsSort(value: string): value is LogsSort {
	return (LOGS_SORT_VALUES as readonly string[]).includes(value);
}

export const LOGS_STORAGE_TIERS = ["indexes", "online-archives"] as const;

/** Where logs are read from. */
export type LogsStorageTier = (typeof LOGS_STORAGE_TIERS)[number];

export function isLogsStorageTier(value: string): value is LogsStorageTier {
	return (LOGS_STORAGE_TIERS as readonly string[]).includes(value);
}

export interface LogsQueryFilter extends QueryFilter {
	/** Indexes to search, `["*"]` for all of them. */
	indexes?: string[];
	storage_tier?: LogsStorageTier;
}

export type LogsListRequest = SearchRequest<LogsQueryFilter>;

export type LogsAggregateRequest = AggregateRequest<LogsQueryFilter>;

export interface LogAttributes {
	attributes?: Record<string, unknown>;
	host?: string;
	message?: string;
	service?: string;
	status?: string;
	tags?: string[];
	timestamp?: string;
	[key: string]: unknown;
}

export type Log = SearchEvent<"log", LogAttributes>;

export type LogsListResponse = SearchResponse<Log>;

/**
 * A log submitted to intake. Arbitrary top-level attributes are allowed.
 */
export interface HTTPLogItem {
	message: string;
	ddsource?: string;
	ddtags?: string;
	hostname?: string;
	service?: string;
	[key: string]: unknown;
}

export type HTTPLog = HTTPLogItem[];
