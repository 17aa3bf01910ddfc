import type { PaginationOptions, RequestOptions } from "./common.js";
import {
	listQuery,
	paginateListEndpoint,
	paginateSearchEndpoint,
} from "./internal/eventSearch.js";
import {
	type ApiContext,
	callOperation,
	callVoidOperation,
	type OperationSpec,
} from "./internal/operation.js";
import { requireBody, requireId } from "./internal/params.js";
import type { AggregateResponse, ListEventsArgs } from "./models/common.js";
import {
	RUM_SORT_VALUES,
	type RUMAggregateRequest,
	type RUMApplicationCreateRequest,
	type RUMApplicationResponse,
	type RUMApplicationsResponse,
	type RUMApplicationUpdateRequest,
	type RUMEvent,
	type RUMEventsResponse,
	type RUMSearchEventsRequest,
	type RUMSort,
} from "./models/rum.js";

export interface ListRUMEventsArgs extends ListEventsArgs<RUMSort> {}

export interface RUMApplicationIdArgs {
	/** RUM application id. */
	id: string;
}

export interface UpdateRUMApplicationArgs extends RUMApplicationIdArgs {
	body: RUMApplicationUpdateRequest;
}

const OPERATIONS = {
	aggregate: {
		id: "v2.AggregateRUMEvents",
		method: "POST",
		url: "/api/v2/rum/analytics/aggregate",
	},
	list: { id: "v2.ListRUMEvents", method: "GET", url: "/api/v2/rum/events" },
	search: {
		id: "v2.SearchRUMEvents",
		method: "POST",
		url: "/api/v2/rum/events/search",
	},
	createApplication: {
		id: "v2.CreateRUMApplication",
		method: "POST",
		url: "/api/v2/rum/applications",
		sideEffects: true,
	},
	getApplication: {
		id: "v2.GetRUMApplication",
		method: "GET",
		url: "/api/v2/rum/applications/{id}",
	},
	getApplications: {
		id: "v2.GetRUMApplications",
		method: "GET",
		url: "/api/v2/rum/applications",
	},
	updateApplication: {
		id: "v2.UpdateRUMApplication",
		method: "PATCH",
		url: "/api/v2/rum/applications/{id}",
		sideEffects: true,
	},
	deleteApplication: {
		id: "v2.DeleteRUMApplication",
		method: "DELETE",
		url: "/api/v2/rum/applications/{id}",
		sideEffects: true,
	},
} satisfies Record<string, OperationSpec>;

/**
 * Real User Monitoring: event search, analytics and application management.
 */
export class RUMApi {
	private readonly ctx: ApiContext;

	constructor(ctx: ApiContext) {
		this.ctx = ctx;
	}

	/**
	 * Compute aggregations (counts, percentiles, timeseries) over RUM events.
	 */
	public async aggregateEvents(
		body: RUMAggregateRequest,
		options?: RequestOptions,
	): Promise<AggregateResponse> {
		return await callOperation<AggregateResponse>(
			this.ctx,
			OPERATIONS.aggregate,
			{ body: requireBody(body), ...options },
		);
	}

	/**
	 * List RUM events matching a search query. Results are paginated.
	 *
	 * @param args.filterFrom Minimum timestamp; `Date` values are sent as RFC 3339
	 * @param args.pageLimit Max number of events per page
	 */
	public async listEvents(
		args: ListRUMEventsArgs = {},
		options?: RequestOptions,
	): Promise<RUMEventsResponse> {
		return await callOperation<RUMEventsResponse>(this.ctx, OPERATIONS.list, {
			query: listQuery(args, RUM_SORT_VALUES),
			...options,
		});
	}

	/**
	 * Iterate every RUM event matching `args`, following `meta.page.after`.
	 *
	 * @example
	 * ```ts
	 * for await (const event of client.rum.listEventsWithPagination({
	 *   filterQuery: "@type:session",
	 *   pageLimit: 100,
	 * })) {
	 *   console.log(event.id);
	 * }
	 * ```
	 */
	public listEventsWithPagination(
		args: ListRUMEventsArgs = {},
		options?: PaginationOptions,
	): AsyncIterable<RUMEvent> {
		return paginateListEndpoint(
			args,
			(page, opts) => this.listEvents(page, opts),
			options,
		);
	}

	/**
	 * Search RUM events with a complex query body.
	 */
	public async searchEvents(
		body: RUMSearchEventsRequest,
		options?: RequestOptions,
	): Promise<RUMEventsResponse> {
		return await callOperation<RUMEventsResponse>(this.ctx, OPERATIONS.search, {
			body: requireBody(body),
			...options,
		});
	}

	/**
	 * Iterate every RUM event matching `body`. The cursor is carried in
	 * `body.page.cursor` of a copy; `body` is not modified.
	 */
	public searchEventsWithPagination(
		body: RUMSearchEventsRequest,
		options?: PaginationOptions,
	): AsyncIterable<RUMEvent> {
		return paginateSearchEndpoint(
			requireBody(body),
			(page, opts) => this.searchEvents(page, opts),
			options,
		);
	}

	public async createApplication(
		body: RUMApplicationCreateRequest,
		options?: RequestOptions,
	): Promise<RUMApplicationResponse> {
		return await callOperation<RUMApplicationResponse>(
			this.ctx,
			OPERATIONS.createApplication,
			{ body: requireBody(body), ...options },
		);
	}

	public async getApplication(
		args: RUMApplicationIdArgs,
		options?: RequestOptions,
	): Promise<RUMApplicationResponse> {
		return await callOperation<RUMApplicationResponse>(
			this.ctx,
			OPERATIONS.getApplication,
			{ path: { id: requireId("id", args.id) }, ...options },
		);
	}

	/**
	 * List all RUM applications of the organisation.
	 */
	public async getApplications(
		options?: RequestOptions,
	): Promise<RUMApplicationsResponse> {
		return await callOperation<RUMApplicationsResponse>(
			this.ctx,
			OPERATIONS.getApplications,
			{ ...options },
		);
	}

	public async updateApplication(
		args: UpdateRUMApplicationArgs,
		options?: RequestOptions,
	): Promise<RUMApplicationResponse> {
		return await callOperation<RUMApplicationResponse>(
			this.ctx,
			OPERATIONS.updateApplication,
			{
				path: { id: requireId("id", args.id) },
				body: requireBody(args.body),
				...options,
			},
		);
	}

	public async deleteApplication(
		args: RUMApplicationIdArgs,
		options?: RequestOptions,
	): Promise<void> {
		await callVoidOperation(this.ctx, OPERATIONS.deleteApplication, {
			path: { id: requireId("id", args.id) },
			...options,
		});
	}
}
