import type { PaginationOptions, RequestOptions } from "../common.js";
import { type CursorPage, paginateByCursor } from "../lib/paginate.js";
import type {
	ListEventsArgs,
	PageOptions,
	SearchResponse,
} from "../models/common.js";
import { assertEnum, type QueryValue } from "./params.js";

/**
 * Query parameters of the `GET` list endpoints (`filter[query]`, `page[cursor]`, ...).
 */
export function listQuery<TSort extends string>(
	args: ListEventsArgs<string>,
	sortValues: readonly TSort[],
): Record<string, QueryValue | undefined> {
	return {
		"filter[query]": args.filterQuery,
		"filter[from]": args.filterFrom,
		"filter[to]": args.filterTo,
		sort: assertEnum("sort", args.sort, sortValues),
		"page[cursor]": args.pageCursor,
		"page[limit]": args.pageLimit,
	};
}

export function toCursorPage<TItem>(
	response: SearchResponse<TItem>,
): CursorPage<TItem> {
	return { items: response.data, nextCursor: response.meta?.page?.after };
}

/**
 * Drain a `GET` list endpoint. The cursor and limit travel as
 * `page[cursor]`/`page[limit]`; `args` itself is left untouched.
 */
export function paginateListEndpoint<
	TArgs extends ListEventsArgs<string>,
	TItem,
>(
	args: TArgs,
	fetchPage: (
		args: TArgs,
		options: RequestOptions,
	) => Promise<SearchResponse<TItem>>,
	options: PaginationOptions = {},
): AsyncIterable<TItem> {
	return paginateByCursor<TItem>(
		async ({ cursor, pageSize, signal }) =>
			toCursorPage(
				await fetchPage(
					{ ...args, pageCursor: cursor, pageLimit: pageSize },
					{ signal },
				),
			),
		{
			pageSize: args.pageLimit,
			startCursor: args.pageCursor,
			signal: options.signal,
			readAhead: options.readAhead,
		},
	);
}

export type PagedBody = {
	page?: PageOptions;
	[key: string]: unknown;
};

/**
 * Drain a `POST .../search` endpoint. The cursor and limit travel in
 * `body.page`; every request gets a fresh copy of `body`.
 */
export function paginateSearchEndpoint<TBody extends PagedBody, TItem>(
	body: TBody,
	fetchPage: (
		body: TBody,
		options: RequestOptions,
	) => Promise<SearchResponse<TItem>>,
	options: PaginationOptions = {},
): AsyncIterable<TItem> {
	return paginateByCursor<TItem>(
		async ({ cursor, pageSize, signal }) =>
			toCursorPage(
				await fetchPage(
					{ ...body, page: { ...body.page, cursor, limit: pageSize } },
					{ signal },
				),
			),
		{
			pageSize: body.page?.limit,
			startCursor: body.page?.cursor,
			signal: options.signal,
			readAhead: options.readAhead,
		},
	);
}
