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
import {
	AUDIT_SORT_VALUES,
	type AuditLogsEvent,
	type AuditLogsEventsResponse,
	type AuditLogsSearchEventsRequest,
	type AuditLogsSort,
} from "./models/audit.js";
import type { ListEventsArgs } from "./models/common.js";

export interface ListAuditLogsArgs extends ListEventsArgs<AuditLogsSort> {}

const OPERATIONS = {
	list: {
		id: "v2.ListAuditLogs",
		method: "GET",
		url: "/api/v2/audit/events",
	},
	search: {
		id: "v2.SearchAuditLogs",
		method: "POST",
		url: "/api/v2/audit/events/search",
	},
} satisfies Record<string, OperationSpec>;

/**
 * Audit Trail events of the organisation.
 */
export class AuditApi {
	private readonly ctx: ApiContext;

	constructor(ctx: ApiContext) {
		this.ctx = ctx;
	}

	public async listLogs(
		args: ListAuditLogsArgs = {},
		options?: RequestOptions,
	): Promise<AuditLogsEventsResponse> {
		return await callOperation<AuditLogsEventsResponse>(
			this.ctx,
			OPERATIONS.list,
			{ query: listQuery(args, AUDIT_SORT_VALUES), ...options },
		);
	}

	public listLogsWithPagination(
		args: ListAuditLogsArgs = {},
		options?: PaginationOptions,
	): AsyncIterable<AuditLogsEvent> {
		return paginateListEndpoint(
			args,
			(page, opts) => this.listLogs(page, opts),
			options,
		);
	}

	public async searchLogs(
		body: AuditLogsSearchEventsRequest = {},
		options?: RequestOptions,
	): Promise<AuditLogsEventsResponse> {
		return await callOperation<AuditLogsEventsResponse>(
			this.ctx,
			OPERATIONS.search,
			{ body, ...options },
		);
	}

	public searchLogsWithPagination(
		body: AuditLogsSearchEventsRequest = {},
		options?: PaginationOptions,
	): AsyncIterable<AuditLogsEvent> {
		return paginateSearchEndpoint(
			body,
			(page, opts) => this.searchLogs(page, opts),
			options,
		);
	}
}
