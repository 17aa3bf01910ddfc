import type {
	EventAttributes,
	QueryFilter,
	SearchEvent,
	SearchRequest,
	SearchResponse,
} from "./common.js";

export const AUDIT_SORT_VALUES = ["timestamp", "-timestamp"] as const;

export type AuditLogsSort = (typeof AUDIT_SORT_VALUES)[number];

export function isAuditLogsSort(value: string): value is AuditLogsSort {
	return (AUDIT_SORT_VALUES as readonly string[]).includes(value);
}

export type AuditLogsQueryFilter = QueryFilter;

export type AuditLogsSearchEventsRequest = SearchRequest<AuditLogsQueryFilter>;

export type AuditLogsEvent = SearchEvent<"audit", EventAttributes>;

export type AuditLogsEventsResponse = SearchResponse<AuditLogsEvent>;
