import { validationError } from "./error.js";

type Scheme = "http" | "https";

const DEFAULT_SCHEME: Scheme = "https";
const DEFAULT_SUBDOMAIN = "api";

export const DATADOG_SITES = [
	"datadoghq.com",
	"us3.datadoghq.com",
	"us5.datadoghq.com",
	"ap1.datadoghq.com",
	"datadoghq.eu",
	"ddog-gov.com",
] as const;

export type DatadogSite = (typeof DATADOG_SITES)[number];

export const DEFAULT_SITE: DatadogSite = "datadoghq.com";

/** Operations served from a subdomain other than `api`. */
const OPERATION_SUBDOMAINS: Readonly<Record<string, string>> = {
	"v2.SubmitLog": "http-intake.logs",
};

export function isDatadogSite(value: string): value is DatadogSite {
	return (DATADOG_SITES as readonly string[]).includes(value);
}

function hasScheme(input: string): boolean {
	return /^[a-zA-Z][a-zA-Z0-9+.-]*:\/\//.test(input);
}

function asScheme(protocol: string): Scheme {
	const normalized = protocol.replace(":", "").toLowerCase();
	if (normalized === "http" || normalized === "https") return normalized;
	throw validationError(`Unsupported scheme: ${protocol}`);
}

/**
 * Normalise a base URL override.
 *
 * - `host`, `host:port` and `scheme://host[:port][/path]` are accepted
 * - a missing scheme defaults to https
 * - trailing slashes are dropped so operation paths can be appended as-is
 */
export function normalizeBaseUrl(input: string): string {
	const trimmed = input.trim();
	if (!trimmed) {
		throw validationError("Base URL cannot be empty");
	}
	const parsed = new URL(
		hasScheme(trimmed) ? trimmed : `${DEFAULT_SCHEME}://${trimmed}`,
	);
	const scheme = asScheme(parsed.protocol);
	const authority = parsed.port
		? `${parsed.hostname}:${parsed.port}`
		: parsed.hostname;
	const path = parsed.pathname.replace(/\/+$/, "");
	return `${scheme}://${authority}${path}`;
}

export type DatadogEndpointsInit = {
	site?: string;
	baseUrl?: string;
};

/**
 * Server resolution for the Datadog API.
 *
 * Every operation resolves to `https://{subdomain}.{site}` unless a base URL
 * override is configured, in which case the override wins for all of them.
 */
export class DatadogEndpoints {
	public readonly site: DatadogSite;
	public readonly baseUrlOverride?: string;

	constructor(init?: DatadogEndpointsInit) {
		const site = init?.site?.trim() || DEFAULT_SITE;
		if (!isDatadogSite(site)) {
			throw validationError(
				`The variable site in the server URL has invalid value ${site}. Must be one of ${DATADOG_SITES.join(", ")}`,
			);
		}
		this.site = site;
		this.baseUrlOverride =
			init?.baseUrl !== undefined ? normalizeBaseUrl(init.baseUrl) : undefined;
	}

	/**
	 * Base URL for an operation id such as `v2.ListRUMEvents`.
	 */
	public baseUrl(operationId?: string): string {
		if (this.baseUrlOverride) return this.baseUrlOverride;
		const subdomain =
			(operationId && OPERATION_SUBDOMAINS[operationId]) || DEFAULT_SUBDOMAIN;
		return `${DEFAULT_SCHEME}://${subdomain}.${this.site}`;
	}
}
