import type {
	AggregateRequest,
	AggregateResponse,
	QueryFilter,
	SearchEvent,
	SearchRequest,
	SearchResponse,
} from "./common.js";

export const CI_APP_SORT_VALUES = ["timestamp", "-timestamp"] as const;

export type CIAppSort = (typeof CI_APP_SORT_VALUES)[number];

export function isCIAppSort(value: string): value is CIAppSort {
	return (CI_APP_SORT_VALUES as readonly string[]).includes(value);
}

/** Pipeline events carry their level in `attributes.ci_level`. */
export const CI_PIPELINE_LEVELS = [
	"pipeline",
	"stage",
	"job",
	"step",
	"custom",
] as const;

export type CIAppPipelineLevel = (typeof CI_PIPELINE_LEVELS)[number];

export const CI_TEST_LEVELS = ["session", "module", "suite", "test"] as const;

export type CIAppTestLevel = (typeof CI_TEST_LEVELS)[number];

export type CIAppQueryFilter = QueryFilter;

export type CIAppSearchEventsRequest = SearchRequest<CIAppQueryFilter>;

export type CIAppAggregateRequest = AggregateRequest<CIAppQueryFilter>;

export type CIAppAggregateResponse = AggregateResponse;

export interface CIAppPipelineEventAttributes {
	attributes?: Record<string, unknown>;
	ci_level?: CIAppPipelineLevel | (string & {});
	tags?: string[];
	[key: string]: unknown;
}

export interface CIAppTestEventAttributes {
	attributes?: Record<string, unknown>;
	tags?: string[];
	test_level?: CIAppTestLevel | (string & {});
	[key: string]: unknown;
}

export type CIAppPipelineEvent = SearchEvent<
	"cipipeline",
	CIAppPipelineEventAttributes
>;

export type CIAppTestEvent = SearchEvent<"citest", CIAppTestEventAttributes>;

export type CIAppPipelineEventsResponse = SearchResponse<CIAppPipelineEvent>;

export type CIAppTestEventsResponse = SearchResponse<CIAppTestEvent>;
