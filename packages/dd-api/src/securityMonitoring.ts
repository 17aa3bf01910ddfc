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
import { assertEnum, requireBody, requireId } from "./internal/params.js";
import type { ListEventsArgs } from "./models/common.js";
import {
	SIGNAL_STATES,
	SIGNALS_SORT_VALUES,
	type SecurityMonitoringSignal,
	type SecurityMonitoringSignalAssigneeUpdateRequest,
	type SecurityMonitoringSignalIncidentsUpdateRequest,
	type SecurityMonitoringSignalListRequest,
	type SecurityMonitoringSignalResponse,
	type SecurityMonitoringSignalStateUpdateRequest,
	type SecurityMonitoringSignalsListResponse,
	type SecurityMonitoringSignalsSort,
	type SecurityMonitoringSignalTriageUpdateResponse,
} from "./models/securityMonitoring.js";

export interface ListSignalsArgs
	extends ListEventsArgs<SecurityMonitoringSignalsSort> {}

export interface SignalIdArgs {
	signalId: string;
}

export interface EditSignalStateArgs extends SignalIdArgs {
	body: SecurityMonitoringSignalStateUpdateRequest;
}

export interface EditSignalAssigneeArgs extends SignalIdArgs {
	body: SecurityMonitoringSignalAssigneeUpdateRequest;
}

export interface EditSignalIncidentsArgs extends SignalIdArgs {
	body: SecurityMonitoringSignalIncidentsUpdateRequest;
}

const SIGNALS_URL = "/api/v2/security_monitoring/signals";

const OPERATIONS = {
	list: {
		id: "v2.ListSecurityMonitoringSignals",
		method: "GET",
		url: SIGNALS_URL,
	},
	search: {
		id: "v2.SearchSecurityMonitoringSignals",
		method: "POST",
		url: `${SIGNALS_URL}/search`,
	},
	get: {
		id: "v2.GetSecurityMonitoringSignal",
		method: "GET",
		url: `${SIGNALS_URL}/{signal_id}`,
	},
	editState: {
		id: "v2.EditSecurityMonitoringSignalState",
		method: "PATCH",
		url: `${SIGNALS_URL}/{signal_id}/state`,
		sideEffects: true,
	},
	editAssignee: {
		id: "v2.EditSecurityMonitoringSignalAssignee",
		method: "PATCH",
		url: `${SIGNALS_URL}/{signal_id}/assignee`,
		sideEffects: true,
	},
	editIncidents: {
		id: "v2.EditSecurityMonitoringSignalIncidents",
		method: "PATCH",
		url: `${SIGNALS_URL}/{signal_id}/incidents`,
		sideEffects: true,
	},
} satisfies Record<string, OperationSpec>;

/**
 * Security signals: search and triage.
 */
export class SecurityMonitoringApi {
	private readonly ctx: ApiContext;

	constructor(ctx: ApiContext) {
		this.ctx = ctx;
	}

	public async listSignals(
		args: ListSignalsArgs = {},
		options?: RequestOptions,
	): Promise<SecurityMonitoringSignalsListResponse> {
		return await callOperation<SecurityMonitoringSignalsListResponse>(
			this.ctx,
			OPERATIONS.list,
			{ query: listQuery(args, SIGNALS_SORT_VALUES), ...options },
		);
	}

	public listSignalsWithPagination(
		args: ListSignalsArgs = {},
		options?: PaginationOptions,
	): AsyncIterable<SecurityMonitoringSignal> {
		return paginateListEndpoint(
			args,
			(page, opts) => this.listSignals(page, opts),
			options,
		);
	}

	public async searchSignals(
		body: SecurityMonitoringSignalListRequest = {},
		options?: RequestOptions,
	): Promise<SecurityMonitoringSignalsListResponse> {
		return await callOperation<SecurityMonitoringSignalsListResponse>(
			this.ctx,
			OPERATIONS.search,
			{ body, ...options },
		);
	}

	public searchSignalsWithPagination(
		body: SecurityMonitoringSignalListRequest = {},
		options?: PaginationOptions,
	): AsyncIterable<SecurityMonitoringSignal> {
		return paginateSearchEndpoint(
			body,
			(page, opts) => this.searchSignals(page, opts),
			options,
		);
	}

	public async getSignal(
		args: SignalIdArgs,
		options?: RequestOptions,
	): Promise<SecurityMonitoringSignalResponse> {
		return await callOperation<SecurityMonitoringSignalResponse>(
			this.ctx,
			OPERATIONS.get,
			{ path: { signal_id: requireId("signalId", args.signalId) }, ...options },
		);
	}

	/**
	 * Change the triage state of a signal.
	 *
	 * @param args.body.data.attributes.state One of `open`, `under_review`, `archived`
	 */
	public async editSignalState(
		args: EditSignalStateArgs,
		options?: RequestOptions,
	): Promise<SecurityMonitoringSignalTriageUpdateResponse> {
		const signalId = requireId("signalId", args.signalId);
		const body = requireBody(args.body);
		assertEnum("state", body.data.attributes.state, SIGNAL_STATES);
		return await callOperation<SecurityMonitoringSignalTriageUpdateResponse>(
			this.ctx,
			OPERATIONS.editState,
			{ path: { signal_id: signalId }, body, ...options },
		);
	}

	public async editSignalAssignee(
		args: EditSignalAssigneeArgs,
		options?: RequestOptions,
	): Promise<SecurityMonitoringSignalTriageUpdateResponse> {
		return await callOperation<SecurityMonitoringSignalTriageUpdateResponse>(
			this.ctx,
			OPERATIONS.editAssignee,
			{
				path: { signal_id: requireId("signalId", args.signalId) },
				body: requireBody(args.body),
				...options,
			},
		);
	}

	/**
	 * Replace the incidents linked to a signal.
	 */
	public async editSignalIncidents(
		args: EditSignalIncidentsArgs,
		options?: RequestOptions,
	): Promise<SecurityMonitoringSignalTriageUpdateResponse> {
		return await callOperation<SecurityMonitoringSignalTriageUpdateResponse>(
			this.ctx,
			OPERATIONS.editIncidents,
			{
				path: { signal_id: requireId("signalId", args.signalId) },
				body: requireBody(args.body),
				...options,
			},
		);
	}
}
