import { type Mock, vi } from "vitest";
import { DatadogClient } from "../client.js";
import type { ClientOptions } from "../common.js";

export const TEST_API_KEY = "test-api-key";
export const TEST_APP_KEY = "test-app-key";

export type FetchMock = Mock<(request: Request) => Promise<Response>>;

/** JSON response the way the API sends it. */
export function jsonResponse(
	body: unknown,
	status = 200,
	headers: Record<string, string> = {},
): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "content-type": "application/json", ...headers },
	});
}

export function emptyResponse(status = 204): Response {
	return new Response(null, { status });
}

/**
 * In-process stand-in for the HTTP transport. Replies are handed out in
 * order; a request with no reply left fails the test.
 */
export function fakeFetch(...replies: Array<Response | (() => Response)>): {
	fetch: FetchMock;
	requests: Request[];
} {
	const queue = [...replies];
	const requests: Request[] = [];
	const fetch: FetchMock = vi.fn(async (request: Request) => {
		requests.push(request);
		const next = queue.shift();
		if (next === undefined) {
			throw new Error(`Unexpected request: ${request.method} ${request.url}`);
		}
		return typeof next === "function" ? next() : next;
	});
	return { fetch, requests };
}

export function makeClient(
	fetch: FetchMock,
	overrides: Partial<ClientOptions> = {},
): DatadogClient {
	return new DatadogClient({
		apiKey: TEST_API_KEY,
		appKey: TEST_APP_KEY,
		retry: { minDelayMillis: 1, maxDelayMillis: 1 },
		fetch,
		...overrides,
	});
}

export function requestAt(
	requests: readonly Request[],
	index: number,
): Request {
	const request = requests[index];
	if (!request) {
		throw new Error(`No request at index ${index}`);
	}
	return request;
}

export function urlOf(request: Request): URL {
	return new URL(request.url);
}
