import createDebug from "debug";
import { validationError } from "../error.js";
import { type Result, settle } from "./result.js";

const debug = createDebug("ddapi:paginate");

/** Page size used when the caller does not set one. */
export const DEFAULT_PAGE_SIZE = 10;

/**
 * One page of a cursor-paginated listing.
 *
 * @template T The type of items in the page
 */
export interface CursorPage<T> {
	/** Items in this page; `undefined` when the response carried no data. */
	readonly items: readonly T[] | undefined;
	/** Cursor for the next page (`meta.page.after`), if any. */
	readonly nextCursor?: string;
}

/**
 * Fetches a single page of a cursor-paginated listing.
 */
export type CursorPageFetcher<T> = (request: {
	cursor: string | undefined;
	pageSize: number;
	signal: AbortSignal;
}) => Promise<CursorPage<T>>;

/**
 * Fetches a single page of an offset-paginated listing.
 * Resolves to `undefined` when the response carried no data.
 */
export type OffsetPageFetcher<T> = (request: {
	offset: number | undefined;
	pageSize: number;
	signal: AbortSignal;
}) => Promise<readonly T[] | undefined>;

export interface DrainOptions {
	/** Stops iteration (without error) once aborted. */
	signal?: AbortSignal;
	/** Fetch page N+1 while page N is being consumed. */
	readAhead?: boolean;
}

export interface CursorPaginationOptions extends DrainOptions {
	pageSize?: number;
	startCursor?: string;
}

export interface OffsetPaginationOptions extends DrainOptions {
	pageSize?: number;
	startOffset?: number;
}

type PageStep<TItem, TToken> = {
	items: readonly TItem[];
	/** Token for the following page; `undefined` ends iteration. */
	next: TToken | undefined;
};

type PageLoader<TItem, TToken> = (
	token: TToken | undefined,
	signal: AbortSignal,
) => Promise<PageStep<TItem, TToken>>;

function resolvePageSize(pageSize: number | undefined): number {
	const size = pageSize ?? DEFAULT_PAGE_SIZE;
	if (!Number.isInteger(size) || size < 1) {
		throw validationError(`Page size must be a positive integer, got ${size}`);
	}
	return size;
}

/**
 * Walks pages produced by `load`, yielding their items in order.
 *
 * Pages are requested lazily unless `readAhead` is set, in which case the
 * next page is requested as soon as the current one arrives. When the
 * consumer stops early the in-flight request is aborted and its outcome
 * dropped. An abort from the caller's signal ends iteration quietly; any
 * other failure is thrown where the next item would have been.
 */
function drainPages<TItem, TToken>(
	load: PageLoader<TItem, TToken>,
	first: TToken | undefined,
	options: DrainOptions,
): AsyncIterable<TItem> {
	return {
		[Symbol.asyncIterator]: async function* () {
			const outer = options.signal;
			if (outer?.aborted) return;

			const controller = new AbortController();
			const onAbort = () => controller.abort(outer?.reason);
			outer?.addEventListener("abort", onAbort, { once: true });

			const request = (
				token: TToken | undefined,
			): Promise<Result<PageStep<TItem, TToken>>> =>
				settle(load(token, controller.signal));

			try {
				let token: TToken | undefined = first;
				let prefetched: Promise<Result<PageStep<TItem, TToken>>> | undefined;

				while (true) {
					if (controller.signal.aborted) return;

					const result = await (prefetched ?? request(token));
					prefetched = undefined;

					if (!result.ok) {
						if (controller.signal.aborted) {
							debug("page request aborted, ending iteration");
							return;
						}
						throw result.error;
					}

					const { items, next } = result.value;
					if (next !== undefined && options.readAhead) {
						prefetched = request(next);
					}

					for (const item of items) {
						if (controller.signal.aborted) return;
						yield item;
					}

					if (next === undefined) return;
					token = next;
				}
			} finally {
				outer?.removeEventListener("abort", onAbort);
				controller.abort();
			}
		},
	};
}

/**
 * Creates a lazy async iterable over a cursor-paginated listing.
 *
 * Iteration stops when a page has no data, is shorter than the page size,
 * or carries no next cursor.
 *
 * @example
 * ```ts
 * const events = paginateByCursor(
 *   ({ cursor, pageSize, signal }) =>
 *     rum.listEvents({ pageCursor: cursor, pageLimit: pageSize }, { signal })
 *       .then((r) => ({ items: r.data, nextCursor: r.meta?.page?.after })),
 *   { pageSize: 50 },
 * );
 *
 * for await (const event of events) {
 *   console.log(event.id);
 * }
 * ```
 */
export function paginateByCursor<TItem>(
	fetcher: CursorPageFetcher<TItem>,
	options: CursorPaginationOptions = {},
): AsyncIterable<TItem> {
	const pageSize = resolvePageSize(options.pageSize);
	return drainPages<TItem, string>(
		async (cursor, signal) => {
			debug({ cursor, pageSize });
			const page = await fetcher({ cursor, pageSize, signal });
			const items = page.items ?? [];
			const hasNext =
				page.items !== undefined &&
				items.length >= pageSize &&
				!!page.nextCursor;
			return { items, next: hasNext ? page.nextCursor : undefined };
		},
		options.startCursor,
		options,
	);
}

/**
 * Creates a lazy async iterable over an offset-paginated listing.
 *
 * The offset advances by the page size after every full page; a short page
 * ends iteration.
 */
export function paginateByOffset<TItem>(
	fetcher: OffsetPageFetcher<TItem>,
	options: OffsetPaginationOptions = {},
): AsyncIterable<TItem> {
	const pageSize = resolvePageSize(options.pageSize);
	return drainPages<TItem, number>(
		async (offset, signal) => {
			debug({ offset, pageSize });
			const data = await fetcher({ offset, pageSize, signal });
			const items = data ?? [];
			const hasNext = data !== undefined && items.length >= pageSize;
			return { items, next: hasNext ? (offset ?? 0) + pageSize : undefined };
		},
		options.startOffset,
		options,
	);
}

/**
 * Collect items from an async iterable into an array, stopping after `max`.
 */
export async function collectAll<T>(
	iterable: AsyncIterable<T>,
	options: { max?: number } = {},
): Promise<T[]> {
	const result: T[] = [];
	if (options.max !== undefined && options.max <= 0) return result;
	for await (const item of iterable) {
		result.push(item);
		if (options.max !== undefined && result.length >= options.max) break;
	}
	return result;
}
