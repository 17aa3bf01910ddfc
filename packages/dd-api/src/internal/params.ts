import { validationError } from "../error.js";
import { formatDateTime } from "../utils.js";

export type QueryValue =
	| string
	| number
	| boolean
	| Date
	| readonly (string | number)[];

/**
 * Serialise query parameters: dates as RFC 3339, arrays comma-separated,
 * `undefined` dropped.
 */
export function buildQuery(
	params: Record<string, QueryValue | undefined>,
): Record<string, string | number | boolean> {
	const query: Record<string, string | number | boolean> = {};
	for (const [key, value] of Object.entries(params)) {
		if (value === undefined) continue;
		if (value instanceof Date) {
			if (Number.isNaN(value.getTime())) {
				throw validationError(`Invalid date for ${key}`);
			}
			query[key] = formatDateTime(value);
		} else if (Array.isArray(value)) {
			if (value.length > 0) query[key] = value.join(",");
		} else if (
			typeof value === "string" ||
			typeof value === "number" ||
			typeof value === "boolean"
		) {
			query[key] = value;
		}
	}
	return query;
}

export function requireBody<T>(body: T | null | undefined): T {
	if (body === undefined || body === null) {
		throw validationError("body is required and must be specified");
	}
	return body;
}

export function requireId(name: string, value: string | undefined): string {
	if (typeof value !== "string" || value.length === 0) {
		throw validationError(`${name} is required and must be specified`);
	}
	return value;
}

/**
 * Reject enum values the API does not define before a request goes out.
 */
export function assertEnum<T extends string>(
	name: string,
	value: string | undefined,
	allowed: readonly T[],
): T | undefined {
	if (value === undefined) return undefined;
	const match = allowed.find((candidate) => candidate === value);
	if (match === undefined) {
		throw validationError(
			`Invalid value '${value}' for ${name}. Must be one of ${allowed.join(", ")}`,
		);
	}
	return match;
}

export function assertEnumList<T extends string>(
	name: string,
	values: readonly string[] | undefined,
	allowed: readonly T[],
): T[] | undefined {
	if (values === undefined) return undefined;
	const checked: T[] = [];
	for (const value of values) {
		const match = assertEnum(name, value, allowed);
		if (match !== undefined) checked.push(match);
	}
	return checked;
}
