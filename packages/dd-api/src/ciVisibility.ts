import type { PaginationOptions, RequestOptions } from "./common.js";
import {
	listQuery,
	paginateListEndpoint,
	paginateSearchEndpoint,
} from "./internal/eventSearch.js";
import {
	type ApiContext,
	callOperation,
	type OperationSpec,
} from "./internal/operation.js";
import { requireBody } from "./internal/params.js";
import {
	CI_APP_SORT_VALUES,
	type CIAppAggregateRequest,
	type CIAppAggregateResponse,
	type CIAppPipelineEvent,
	type CIAppSearchEventsRequest,
	type CIAppSort,
	type CIAppTestEvent,
} from "./models/ciVisibility.js";
import type { ListEventsArgs, SearchResponse } from "./models/common.js";

export interface ListCIAppEventsArgs extends ListEventsArgs<CIAppSort> {}

type CIAppKind = "pipelines" | "tests";

type CIAppOperations = {
	list: OperationSpec;
	search: OperationSpec;
	aggregate: OperationSpec;
};

function operationsFor(kind: CIAppKind): CIAppOperations {
	const name = kind === "pipelines" ? "Pipeline" : "Test";
	return {
		list: {
			id: `v2.ListCIApp${name}Events`,
			method: "GET",
			url: `/api/v2/ci/${kind}/events`,
		},
		search: {
			id: `v2.SearchCIApp${name}Events`,
			method: "POST",
			url: `/api/v2/ci/${kind}/events/search`,
		},
		aggregate: {
			id: `v2.AggregateCIApp${name}Events`,
			method: "POST",
			url: `/api/v2/ci/${kind}/analytics/aggregate`,
		},
	};
}

/**
 * CI Visibility events: pipeline executions or test runs, depending on
 * `kind`. Both share the same search and analytics surface.
 */
export class CIAppEventsApi<TEvent> {
	private readonly ctx: ApiContext;
	private readonly operations: CIAppOperations;

	constructor(ctx: ApiContext, kind: CIAppKind) {
		this.ctx = ctx;
		this.operations = operationsFor(kind);
	}

	public async listEvents(
		args: ListCIAppEventsArgs = {},
		options?: RequestOptions,
	): Promise<SearchResponse<TEvent>> {
		return await callOperation<SearchResponse<TEvent>>(
			this.ctx,
			this.operations.list,
			{ query: listQuery(args, CI_APP_SORT_VALUES), ...options },
		);
	}

	public listEventsWithPagination(
		args: ListCIAppEventsArgs = {},
		options?: PaginationOptions,
	): AsyncIterable<TEvent> {
		return paginateListEndpoint(
			args,
			(page, opts) => this.listEvents(page, opts),
			options,
		);
	}

	public async searchEvents(
		body: CIAppSearchEventsRequest = {},
		options?: RequestOptions,
	): Promise<SearchResponse<TEvent>> {
		return await callOperation<SearchResponse<TEvent>>(
			this.ctx,
			this.operations.search,
			{ body, ...options },
		);
	}

	public searchEventsWithPagination(
		body: CIAppSearchEventsRequest = {},
		options?: PaginationOptions,
	): AsyncIterable<TEvent> {
		return paginateSearchEndpoint(
			body,
			(page, opts) => this.searchEvents(page, opts),
			options,
		);
	}

	/**
	 * Compute aggregations over CI events, e.g. pipeline duration percentiles
	 * grouped by `@ci.pipeline.name`.
	 */
	public async aggregate(
		body: CIAppAggregateRequest,
		options?: RequestOptions,
	): Promise<CIAppAggregateResponse> {
		return await callOperation<CIAppAggregateResponse>(
			this.ctx,
			this.operations.aggregate,
			{ body: requireBody(body), ...options },
		);
	}
}

export class CIAppPipelinesApi extends CIAppEventsApi<CIAppPipelineEvent> {
	constructor(ctx: ApiContext) {
		super(ctx, "pipelines");
	}
}

export class CIAppTestsApi extends CIAppEventsApi<CIAppTestEvent> {
	constructor(ctx: ApiContext) {
		super(ctx, "tests");
	}
}
