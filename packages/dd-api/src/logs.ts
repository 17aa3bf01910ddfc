import type { PaginationOptions, RequestOptions } from "./common.js";
import { validationError } from "./error.js";
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
import { assertEnum, requireBody } from "./internal/params.js";
import {
	CONTENT_ENCODINGS,
	type ContentEncoding,
} from "./lib/compression.js";
import type { AggregateResponse, ListEventsArgs } from "./models/common.js";
import {
	type HTTPLog,
	LOGS_SORT_VALUES,
	LOGS_STORAGE_TIERS,
	type Log,
	type LogsAggregateRequest,
	type LogsListRequest,
	type LogsListResponse,
	type LogsSort,
	type LogsStorageTier,
} from "./models/logs.js";
import { utf8ByteLength } from "./utils.js";

/** Maximum number of logs in a single intake request. */
export const MAX_LOGS_PER_SUBMIT = 1000;

/** Maximum uncompressed intake payload, in bytes. */
export const MAX_SUBMIT_PAYLOAD_BYTES = 5 * 1024 * 1024;

export interface ListLogsGetArgs extends ListEventsArgs<LogsSort> {
	/** Indexes to search; defaults to all of them on the server. */
	filterIndexes?: string[];
	filterStorageTier?: LogsStorageTier;
}

export interface SubmitLogArgs {
	body: HTTPLog;
	/** Compress the payload before sending it. */
	contentEncoding?: ContentEncoding;
	/** Tags added to every log in the payload, e.g. `env:prod,team:api`. */
	ddtags?: string;
}

const OPERATIONS = {
	aggregate: {
		id: "v2.AggregateLogs",
		method: "POST",
		url: "/api/v2/logs/analytics/aggregate",
	},
	list: {
		id: "v2.ListLogs",
		method: "POST",
		url: "/api/v2/logs/events/search",
	},
	listGet: { id: "v2.ListLogsGet", method: "GET", url: "/api/v2/logs/events" },
	submit: {
		id: "v2.SubmitLog",
		method: "POST",
		url: "/api/v2/logs",
		auth: ["apiKeyAuth"],
		sideEffects: true,
	},
} satisfies Record<string, OperationSpec>;

/**
 * Search, aggregate and submit logs.
 */
export class LogsApi {
	private readonly ctx: ApiContext;

	constructor(ctx: ApiContext) {
		this.ctx = ctx;
	}

	public async aggregate(
		body: LogsAggregateRequest,
		options?: RequestOptions,
	): Promise<AggregateResponse> {
		return await callOperation<AggregateResponse>(
			this.ctx,
			OPERATIONS.aggregate,
			{ body: requireBody(body), ...options },
		);
	}

	/**
	 * Search logs with a query body. Without a body the server searches the
	 * last 15 minutes of every index.
	 */
	public async list(
		body: LogsListRequest = {},
		options?: RequestOptions,
	): Promise<LogsListResponse> {
		return await callOperation<LogsListResponse>(this.ctx, OPERATIONS.list, {
			body,
			...options,
		});
	}

	/**
	 * Iterate every log matching `body`, following `meta.page.after`.
	 *
	 * @example
	 * ```ts
	 * const logs = client.logs.listWithPagination({
	 *   filter: { query: "service:web status:error", from: "now-1h" },
	 *   page: { limit: 500 },
	 * });
	 * for await (const log of logs) {
	 *   console.log(log.attributes?.message);
	 * }
	 * ```
	 */
	public listWithPagination(
		body: LogsListRequest = {},
		options?: PaginationOptions,
	): AsyncIterable<Log> {
		return paginateSearchEndpoint(
			body,
			(page, opts) => this.list(page, opts),
			options,
		);
	}

	/**
	 * List logs through query parameters.
	 */
	public async listGet(
		args: ListLogsGetArgs = {},
		options?: RequestOptions,
	): Promise<LogsListResponse> {
		return await callOperation<LogsListResponse>(
			this.ctx,
			OPERATIONS.listGet,
			{
				query: {
					...listQuery(args, LOGS_SORT_VALUES),
					"filter[indexes]": args.filterIndexes,
					"filter[storage_tier]": assertEnum(
						"filterStorageTier",
						args.filterStorageTier,
						LOGS_STORAGE_TIERS,
					),
				},
				...options,
			},
		);
	}

	public listGetWithPagination(
		args: ListLogsGetArgs = {},
		options?: PaginationOptions,
	): AsyncIterable<Log> {
		return paginateListEndpoint(
			args,
			(page, opts) => this.listGet(page, opts),
			options,
		);
	}

	/**
	 * Send logs to the intake endpoint. Only the API key is sent.
	 *
	 * At most {@link MAX_LOGS_PER_SUBMIT} entries and
	 * {@link MAX_SUBMIT_PAYLOAD_BYTES} of uncompressed JSON per call.
	 */
	public async submit(
		args: SubmitLogArgs,
		options?: RequestOptions,
	): Promise<void> {
		const body = requireBody(args.body);
		if (body.length > MAX_LOGS_PER_SUBMIT) {
			throw validationError(
				`Too many logs: ${body.length} (max ${MAX_LOGS_PER_SUBMIT} per request)`,
			);
		}
		const size = utf8ByteLength(JSON.stringify(body));
		if (size > MAX_SUBMIT_PAYLOAD_BYTES) {
			throw validationError(
				`Payload too large: ${size} bytes (max ${MAX_SUBMIT_PAYLOAD_BYTES})`,
			);
		}
		const encoding = assertEnum(
			"contentEncoding",
			args.contentEncoding,
			CONTENT_ENCODINGS,
		);

		await callOperation<unknown>(this.ctx, OPERATIONS.submit, {
			body,
			query: { ddtags: args.ddtags },
			headers: encoding ? { "Content-Encoding": encoding } : undefined,
			...options,
		});
	}
}
