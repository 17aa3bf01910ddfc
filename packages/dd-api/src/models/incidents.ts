export const INCIDENT_RELATED_OBJECTS = ["users", "attachments"] as const;

/** Related resources that can be side-loaded with `include`. */
export type IncidentRelatedObject = (typeof INCIDENT_RELATED_OBJECTS)[number];

export function isIncidentRelatedObject(
	value: string,
): value is IncidentRelatedObject {
	return (INCIDENT_RELATED_OBJECTS as readonly string[]).includes(value);
}

export interface IncidentFieldAttributes {
	type?: "dropdown" | "multiselect" | "textbox" | "textarray" | (string & {});
	value?: string | string[] | null;
	[key: string]: unknown;
}

export interface IncidentNotificationHandle {
	display_name?: string;
	handle?: string;
	[key: string]: unknown;
}

export interface IncidentResponseAttributes {
	created?: string;
	customer_impact_duration?: number;
	customer_impact_end?: string | null;
	customer_impact_scope?: string | null;
	customer_impact_start?: string | null;
	customer_impacted?: boolean;
	detected?: string | null;
	fields?: Record<string, IncidentFieldAttributes>;
	modified?: string;
	notification_handles?: IncidentNotificationHandle[];
	public_id?: number;
	resolved?: string | null;
	time_to_detect?: number;
	time_to_internal_response?: number;
	time_to_repair?: number;
	time_to_resolve?: number;
	title: string;
	[key: string]: unknown;
}

export interface RelationshipData {
	id: string;
	type: string;
	[key: string]: unknown;
}

export interface IncidentResponseData {
	id: string;
	type: "incidents" | (string & {});
	attributes?: IncidentResponseAttributes;
	relationships?: Record<
		string,
		{ data?: RelationshipData | RelationshipData[] | null }
	>;
	[key: string]: unknown;
}

export interface IncidentResponse {
	data: IncidentResponseData;
	/** Side-loaded users and attachments. */
	included?: Record<string, unknown>[];
	[key: string]: unknown;
}

export interface IncidentsResponse {
	data: IncidentResponseData[];
	included?: Record<string, unknown>[];
	meta?: {
		pagination?: {
			next_offset?: number;
			offset?: number;
			size?: number;
			[key: string]: unknown;
		};
		[key: string]: unknown;
	};
	[key: string]: unknown;
}

export interface IncidentCreateRequest {
	data: {
		type: "incidents";
		attributes: {
			customer_impact_scope?: string;
			customer_impacted: boolean;
			fields?: Record<string, IncidentFieldAttributes>;
			notification_handles?: IncidentNotificationHandle[];
			title: string;
			[key: string]: unknown;
		};
		relationships?: {
			commander_user?: { data: RelationshipData | null };
			[key: string]: unknown;
		};
		[key: string]: unknown;
	};
	[key: string]: unknown;
}

export interface IncidentUpdateRequest {
	data: {
		id: string;
		type: "incidents";
		attributes?: {
			customer_impact_end?: string | null;
			customer_impact_scope?: string;
			customer_impact_start?: string | null;
			customer_impacted?: boolean;
			detected?: string | null;
			fields?: Record<string, IncidentFieldAttributes>;
			notification_handles?: IncidentNotificationHandle[];
			resolved?: string | null;
			title?: string;
			[key: string]: unknown;
		};
		[key: string]: unknown;
	};
	[key: string]: unknown;
}
