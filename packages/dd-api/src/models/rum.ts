import type {
	AggregateRequest,
	EventAttributes,
	QueryFilter,
	SearchEvent,
	SearchRequest,
	SearchResponse,
} from "./common.js";

export const RUM_SORT_VALUES = ["timestamp", "-timestamp"] as const;

export type RUMSort = (typeof RUM_SORT_VALUES)[number];

export function isRUMSort(value: string): value is RUMSort {
	return (RUM_SORT_VALUES as readonly string[]).includes(value);
}

export const RUM_APPLICATION_TYPES = [
	"browser",
	"ios",
	"android",
	"react-native",
	"flutter",
] as const;

export type RUMApplicationType = (typeof RUM_APPLICATION_TYPES)[number];

export function isRUMApplicationType(
	value: string,
): value is RUMApplicationType {
	return (RUM_APPLICATION_TYPES as readonly string[]).includes(value);
}

export type RUMQueryFilter = QueryFilter;

export type RUMSearchEventsRequest = SearchRequest<RUMQueryFilter>;

export type RUMAggregateRequest = AggregateRequest<RUMQueryFilter>;

export type RUMEventAttributes = EventAttributes;

export type RUMEvent = SearchEvent<"rum", RUMEventAttributes>;

export type RUMEventsResponse = SearchResponse<RUMEvent>;

// =============================================================================
// Applications
// =============================================================================

/** Application attributes as listed; the listing omits the client token. */
export interface RUMApplicationListAttributes {
	application_id: string;
	/** Epoch milliseconds. */
	created_at: number;
	created_by_handle: string;
	hash?: string;
	is_active?: boolean;
	name: string;
	org_id: number;
	type: RUMApplicationType | (string & {});
	updated_at: number;
	updated_by_handle: string;
	[key: string]: unknown;
}

export interface RUMApplicationAttributes extends RUMApplicationListAttributes {
	client_token: string;
}

export interface RUMApplication {
	id: string;
	type: "rum_application" | (string & {});
	attributes: RUMApplicationAttributes;
	[key: string]: unknown;
}

export interface RUMApplicationListItem {
	id?: string;
	type: "rum_application" | (string & {});
	attributes: RUMApplicationListAttributes;
	[key: string]: unknown;
}

export interface RUMApplicationResponse {
	data?: RUMApplication;
	[key: string]: unknown;
}

export interface RUMApplicationsResponse {
	data?: RUMApplicationListItem[];
	[key: string]: unknown;
}

export interface RUMApplicationCreateRequest {
	data: {
		type: "rum_application_create";
		attributes: {
			name: string;
			type?: RUMApplicationType;
			[key: string]: unknown;
		};
		[key: string]: unknown;
	};
	[key: string]: unknown;
}

export interface RUMApplicationUpdateRequest {
	data: {
		id: string;
		type: "rum_application_update";
		attributes?: {
			name?: string;
			type?: RUMApplicationType;
			[key: string]: unknown;
		};
		[key: string]: unknown;
	};
	[key: string]: unknown;
}
