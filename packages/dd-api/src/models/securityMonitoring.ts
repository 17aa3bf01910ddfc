import type {
	QueryFilter,
	SearchEvent,
	SearchRequest,
	SearchResponse,
} from "./common.js";

export const SIGNALS_SORT_VALUES = ["timestamp", "-timestamp"] as const;

export type SecurityMonitoringSignalsSort =
	(typeof SIGNALS_SORT_VALUES)[number];

export function isSecurityMonitoringSignalsSort(
	value: string,
): value is SecurityMonitoringSignalsSort {
	return (SIGNALS_SORT_VALUES as readonly string[]).includes(value);
}

export const SIGNAL_STATES = ["open", "archived", "under_review"] as const;

/** Triage state of a signal. */
export type SecurityMonitoringSignalState = (typeof SIGNAL_STATES)[number];

export function isSecurityMonitoringSignalState(
	value: string,
): value is SecurityMonitoringSignalState {
	return (SIGNAL_STATES as readonly string[]).includes(value);
}

export const SIGNAL_ARCHIVE_REASONS = [
	"none",
	"false_positive",
	"testing_or_maintenance",
	"investigated_case_opened",
	"other",
] as const;

export type SecurityMonitoringSignalArchiveReason =
	(typeof SIGNAL_ARCHIVE_REASONS)[number];

export type SecurityMonitoringSignalListRequest = SearchRequest<QueryFilter>;

export interface SecurityMonitoringSignalAttributes {
	custom?: Record<string, unknown>;
	message?: string;
	tags?: string[];
	timestamp?: string;
	[key: string]: unknown;
}

export type SecurityMonitoringSignal = SearchEvent<
	"signal",
	SecurityMonitoringSignalAttributes
>;

export type SecurityMonitoringSignalsListResponse =
	SearchResponse<SecurityMonitoringSignal>;

export interface SecurityMonitoringSignalResponse {
	data?: SecurityMonitoringSignal;
	[key: string]: unknown;
}

export interface SecurityMonitoringTriageUser {
	/** Numerical id of the user. */
	id?: number;
	handle?: string;
	icon?: string;
	name?: string | null;
	uuid: string;
	[key: string]: unknown;
}

export interface SecurityMonitoringSignalTriageAttributes {
	archive_comment?: string;
	archive_comment_timestamp?: number;
	archive_comment_user?: SecurityMonitoringTriageUser;
	archive_reason?: SecurityMonitoringSignalArchiveReason | (string & {});
	assignee: SecurityMonitoringTriageUser;
	incident_ids: number[];
	state: SecurityMonitoringSignalState | (string & {});
	state_update_timestamp?: number;
	state_update_user?: SecurityMonitoringTriageUser;
	[key: string]: unknown;
}

export interface SecurityMonitoringSignalTriageUpdateResponse {
	data: {
		id?: string;
		type?: "signal_metadata" | (string & {});
		attributes: SecurityMonitoringSignalTriageAttributes;
		[key: string]: unknown;
	};
	[key: string]: unknown;
}

export interface SecurityMonitoringSignalStateUpdateRequest {
	data: {
		type?: "signal_metadata";
		attributes: {
			archive_comment?: string;
			archive_reason?: SecurityMonitoringSignalArchiveReason;
			state: SecurityMonitoringSignalState;
			version?: number;
			[key: string]: unknown;
		};
		[key: string]: unknown;
	};
	[key: string]: unknown;
}

export interface SecurityMonitoringSignalAssigneeUpdateRequest {
	data: {
		type?: "signal_metadata";
		attributes: {
			assignee: SecurityMonitoringTriageUser;
			version?: number;
			[key: string]: unknown;
		};
		[key: string]: unknown;
	};
	[key: string]: unknown;
}

export interface SecurityMonitoringSignalIncidentsUpdateRequest {
	data: {
		type?: "signal_metadata";
		attributes: {
			incident_ids: number[];
			version?: number;
			[key: string]: unknown;
		};
		[key: string]: unknown;
	};
	[key: string]: unknown;
}
