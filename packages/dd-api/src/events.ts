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
import type { ListEventsArgs } from "./models/common.js";
import {
	EVENTS_SORT_VALUES,
	type EventResponse,
	type EventsListRequest,
	type EventsListResponse,
	type EventsSort,
} from "./models/events.js";

export interface ListEventsQueryArgs extends ListEventsArgs<EventsSort> {}

const OPERATIONS = {
	list: { id: "v2.ListEvents", method: "GET", url: "/api/v2/events" },
	search: {
		id: "v2.SearchEvents",
		method: "POST",
		url: "/api/v2/events/search",
	},
} satisfies Record<string, OperationSpec>;

export class EventsApi {
	private readonly ctx: ApiContext;

	constructor(ctx: ApiContext) {
		this.ctx = ctx;
	}

	/**
	 * List events from the event stream.
	 */
	public async list(
		args: ListEventsQueryArgs = {},
		options?: RequestOptions,
	): Promise<EventsListResponse> {
		return await callOperation<EventsListResponse>(this.ctx, OPERATIONS.list, {
			query: listQuery(args, EVENTS_SORT_VALUES),
			...options,
		});
	}

	public listWithPagination(
		args: ListEventsQueryArgs = {},
		options?: PaginationOptions,
	): AsyncIterable<EventResponse> {
		return paginateListEndpoint(
			args,
			(page, opts) => this.list(page, opts),
			options,
		);
	}

	public async search(
		body: EventsListRequest = {},
		options?: RequestOptions,
	): Promise<EventsListResponse> {
		return await callOperation<EventsListResponse>(
			this.ctx,
			OPERATIONS.search,
			{ body, ...options },
		);
	}

	public searchWithPagination(
		body: EventsListRequest = {},
		options?: PaginationOptions,
	): AsyncIterable<EventResponse> {
		return paginateSearchEndpoint(
			body,
			(page, opts) => this.search(page, opts),
			options,
		);
	}
}
