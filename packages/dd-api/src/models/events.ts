import type {
	QueryFilter,
	SearchEvent,
	SearchRequest,
	SearchResponse,
} from "./common.js";

export const EVENTS_SORT_VALUES = ["timestamp", "-timestamp"] as const;

export type EventsSort = (typeof EVENTS_SORT_VALUES)[number];

export function isEventsSort(value: string): value is EventsSort {
	return (EVENTS_SORT_VALUES as readonly string[]).includes(value);
}

export const EVENT_PRIORITIES = ["normal", "low"] as const;

export type EventPriority = (typeof EVENT_PRIORITIES)[number];

export const EVENT_STATUSES = [
	"failure",
	"error",
	"warning",
	"info",
	"success",
	"user_update",
	"recommendation",
	"snapshot",
] as const;

export type EventStatus = (typeof EVENT_STATUSES)[number];

export function isEventStatus(value: string): value is EventStatus {
	return (EVENT_STATUSES as readonly string[]).includes(value);
}

/** Payload of an event, as recorded by the events explorer. */
export interface EventPayload {
	aggregation_key?: string;
	date_happened?: number;
	device_name?: string;
	duration?: number;
	event_object?: string;
	evt?: {
		id?: string;
		name?: string;
		source_id?: number;
		type?: string;
		[key: string]: unknown;
	};
	hostname?: string;
	monitor?: Record<string, unknown> | null;
	monitor_groups?: string[];
	monitor_id?: number | null;
	priority?: EventPriority | (string & {}) | null;
	related_event_id?: number;
	service?: string;
	source_type_name?: string;
	sourcecategory?: string;
	status?: EventStatus | (string & {});
	tags?: string[];
	timestamp?: number;
	title?: string;
	[key: string]: unknown;
}

export interface EventResponseAttributes {
	attributes?: EventPayload;
	message?: string;
	tags?: string[];
	timestamp?: string;
	[key: string]: unknown;
}

export type EventResponse = SearchEvent<"event", EventResponseAttributes>;

export type EventsListResponse = SearchResponse<EventResponse>;

export type EventsQueryFilter = QueryFilter;

export type EventsListRequest = SearchRequest<EventsQueryFilter>;
