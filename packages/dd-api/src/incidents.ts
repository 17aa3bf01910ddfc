import type { PaginationOptions, RequestOptions } from "./common.js";
import {
	type ApiContext,
	callOperation,
	callVoidOperation,
	type OperationSpec,
} from "./internal/operation.js";
import { assertEnumList, requireBody, requireId } from "./internal/params.js";
import { paginateByOffset } from "./lib/paginate.js";
import {
	INCIDENT_RELATED_OBJECTS,
	type IncidentCreateRequest,
	type IncidentRelatedObject,
	type IncidentResponse,
	type IncidentResponseData,
	type IncidentsResponse,
	type IncidentUpdateRequest,
} from "./models/incidents.js";

export interface ListIncidentsArgs {
	/** Side-load related objects. */
	include?: IncidentRelatedObject[];
	/** Page size, 10 when unset. */
	pageSize?: number;
	/** Offset of the first incident to return. */
	pageOffset?: number;
}

export interface IncidentIdArgs {
	incidentId: string;
}

export interface GetIncidentArgs extends IncidentIdArgs {
	include?: IncidentRelatedObject[];
}

export interface UpdateIncidentArgs extends IncidentIdArgs {
	body: IncidentUpdateRequest;
	include?: IncidentRelatedObject[];
}

const OPERATIONS = {
	list: { id: "v2.ListIncidents", method: "GET", url: "/api/v2/incidents" },
	get: {
		id: "v2.GetIncident",
		method: "GET",
		url: "/api/v2/incidents/{incident_id}",
	},
	create: {
		id: "v2.CreateIncident",
		method: "POST",
		url: "/api/v2/incidents",
		sideEffects: true,
	},
	update: {
		id: "v2.UpdateIncident",
		method: "PATCH",
		url: "/api/v2/incidents/{incident_id}",
		sideEffects: true,
	},
	delete: {
		id: "v2.DeleteIncident",
		method: "DELETE",
		url: "/api/v2/incidents/{incident_id}",
		sideEffects: true,
	},
} satisfies Record<string, OperationSpec>;

function includeQuery(include: readonly string[] | undefined) {
	return {
		include: assertEnumList("include", include, INCIDENT_RELATED_OBJECTS),
	};
}

/**
 * Incident management. Every operation is in beta and must be enabled with
 * `unstableOperations` or `client.setUnstableOperationEnabled` first.
 */
export class IncidentsApi {
	private readonly ctx: ApiContext;

	constructor(ctx: ApiContext) {
		this.ctx = ctx;
	}

	public async list(
		args: ListIncidentsArgs = {},
		options?: RequestOptions,
	): Promise<IncidentsResponse> {
		return await callOperation<IncidentsResponse>(
			this.ctx,
			OPERATIONS.list,
			() => ({
				query: {
					...includeQuery(args.include),
					"page[size]": args.pageSize,
					"page[offset]": args.pageOffset,
				},
				...options,
			}),
		);
	}

	/**
	 * Iterate every incident, advancing `page[offset]` by the page size after
	 * each full page.
	 *
	 * @example
	 * ```ts
	 * client.setUnstableOperationEnabled("v2.ListIncidents", true);
	 * const incidents = client.incidents.listWithPagination({ pageSize: 50 });
 * for await (const incident of incidents) {
	 *   console.log(incident.attributes?.title);
	 * }
	 * ```
	 */
	public listWithPagination(
		args: ListIncidentsArgs = {},
		options?: PaginationOptions,
	): AsyncIterable<IncidentResponseData> {
		return paginateByOffset<IncidentResponseData>(
			async ({ offset, pageSize, signal }) => {
				const page = await this.list(
					{ ...args, pageSize, pageOffset: offset },
					{ signal },
				);
				return page.data;
			},
			{
				pageSize: args.pageSize,
				startOffset: args.pageOffset,
				signal: options?.signal,
				readAhead: options?.readAhead,
			},
		);
	}

	public async get(
		args: GetIncidentArgs,
		options?: RequestOptions,
	): Promise<IncidentResponse> {
		return await callOperation<IncidentResponse>(
			this.ctx,
			OPERATIONS.get,
			() => ({
				path: { incident_id: requireId("incidentId", args.incidentId) },
				query: includeQuery(args.include),
				...options,
			}),
		);
	}

	public async create(
		body: IncidentCreateRequest,
		options?: RequestOptions,
	): Promise<IncidentResponse> {
		return await callOperation<IncidentResponse>(
			this.ctx,
			OPERATIONS.create,
			() => ({
				body: requireBody(body),
				...options,
			}),
		);
	}

	public async update(
		args: UpdateIncidentArgs,
		options?: RequestOptions,
	): Promise<IncidentResponse> {
		return await callOperation<IncidentResponse>(
			this.ctx,
			OPERATIONS.update,
			() => ({
				path: { incident_id: requireId("incidentId", args.incidentId) },
				query: includeQuery(args.include),
				body: requireBody(args.body),
				...options,
			}),
		);
	}

	public async delete(
		args: IncidentIdArgs,
		options?: RequestOptions,
	): Promise<void> {
		await callVoidOperation(this.ctx, OPERATIONS.delete, () => ({
			path: { incident_id: requireId("incidentId", args.incidentId) },
			...options,
		}));
	}
}
