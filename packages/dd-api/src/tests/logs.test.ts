import { gunzipSync, inflateSync } from "node:zlib";
import { describe, expect, it } from "vitest";
import { collectAll } from "../lib/paginate.js";
import type { HTTPLog } from "../models/logs.js";
import {
	fakeFetch,
	jsonResponse,
	makeClient,
	requestAt,
	TEST_API_KEY,
	urlOf,
} from "./helpers.js";

function logsPage(ids: string[], after?: string) {
	return {
		data: ids.map((id) => ({
			id,
			type: "log",
			attributes: { message: `message ${id}`, service: "api" },
		})),
		meta: after ? { page: { after } } : {},
	};
}

const LOGS: HTTPLog = [
	{ message: "hello", ddsource: "nodejs", service: "api", hostname: "host-1" },
	{ message: "world", service: "api", "custom.attr": 7 },
];

describe("LogsApi", () => {
	it("pages list through body.page", async () => {
		const { fetch, requests } = fakeFetch(
			jsonResponse(logsPage(["l1", "l2"], "next-1")),
			jsonResponse(logsPage([])),
		);
		const client = makeClient(fetch);

		const logs = await collectAll(
			client.logs.listWithPagination({
				filter: { query: "service:api", indexes: ["main"] },
				page: { limit: 2 },
			}),
		);

		expect(logs.map((l) => l.id)).toEqual(["l1", "l2"]);
		expect(requests).toHaveLength(2);
		expect(urlOf(requestAt(requests, 0)).pathname).toBe(
			"/api/v2/logs/events/search",
		);
		expect(await requestAt(requests, 1).json()).toEqual({
			filter: { query: "service:api", indexes: ["main"] },
			page: { cursor: "next-1", limit: 2 },
		});
	});

	it("pages list without a body using the default page size", async () => {
		const { fetch, requests } = fakeFetch(jsonResponse(logsPage(["l1"])));
		const client = makeClient(fetch);

		await collectAll(client.logs.listWithPagination());

		expect(await requestAt(requests, 0).json()).toEqual({
			page: { limit: 10 },
		});
	});

	it("lists through query parameters", async () => {
		const { fetch, requests } = fakeFetch(jsonResponse(logsPage(["l1"])));
		const client = makeClient(fetch);

		await client.logs.listGet({
			filterQuery: "status:error",
			filterIndexes: ["main", "web"],
			filterStorageTier: "online-archives",
			pageCursor: "abc",
		});

		const url = urlOf(requestAt(requests, 0));
		expect(url.pathname).toBe("/api/v2/logs/events");
		expect(url.searchParams.get("filter[query]")).toBe("status:error");
		expect(url.searchParams.get("filter[indexes]")).toBe("main,web");
		expect(url.searchParams.get("filter[storage_tier]")).toBe(
			"online-archives",
		);
		expect(url.searchParams.get("page[cursor]")).toBe("abc");
	});

	it("pages listGet from the caller's cursor", async () => {
		const { fetch, requests } = fakeFetch(
			jsonResponse(logsPage(["l1"], "next-1")),
			jsonResponse(logsPage([])),
		);
		const client = makeClient(fetch);

		const logs = await collectAll(
			client.logs.listGetWithPagination({ pageCursor: "start", pageLimit: 1 }),
		);

		expect(logs.map((l) => l.id)).toEqual(["l1"]);
		expect(
			requests.map((r) => urlOf(r).searchParams.get("page[cursor]")),
		).toEqual(["start", "next-1"]);
	});

	it("aggregates logs", async () => {
		const { fetch, requests } = fakeFetch(
			jsonResponse({ data: { buckets: [] }, meta: { status: "done" } }),
		);
		const client = makeClient(fetch);

		await client.logs.aggregate({ compute: [{ aggregation: "count" }] });

		expect(urlOf(requestAt(requests, 0)).pathname).toBe(
			"/api/v2/logs/analytics/aggregate",
		);
	});

	describe("submit", () => {
		it("sends logs to the intake host with the API key only", async () => {
			const { fetch, requests } = fakeFetch(jsonResponse({}, 202));
			const client = makeClient(fetch, { site: "datadoghq.eu" });

			await client.logs.submit({ body: LOGS, ddtags: "env:test" });

			const request = requestAt(requests, 0);
			const url = urlOf(request);
			expect(request.method).toBe("POST");
			expect(url.origin).toBe("https://http-intake.logs.datadoghq.eu");
			expect(url.pathname).toBe("/api/v2/logs");
			expect(url.searchParams.get("ddtags")).toBe("env:test");
			expect(request.headers.get("DD-API-KEY")).toBe(TEST_API_KEY);
			expect(request.headers.get("DD-APPLICATION-KEY")).toBeNull();
			expect(await request.json()).toEqual(LOGS);
		});

		it("needs no application key", async () => {
			const { fetch, requests } = fakeFetch(jsonResponse({}, 202));
			const client = makeClient(fetch, { appKey: undefined });

			await client.logs.submit({ body: LOGS });

			expect(requestAt(requests, 0).headers.get("DD-API-KEY")).toBe(
				TEST_API_KEY,
			);
		});

		it("leaves search operations requiring the application key", async () => {
			const { fetch, requests } = fakeFetch();
			const client = makeClient(fetch, { appKey: undefined });

			await expect(client.logs.list()).rejects.toMatchObject({
				status: 400,
				origin: "sdk",
				message: "appKey is required for v2.ListLogs",
			});
			expect(requests).toHaveLength(0);
		});

		it("gzips the payload when asked to", async () => {
			const { fetch, requests } = fakeFetch(jsonResponse({}, 202));
			const client = makeClient(fetch);

			await client.logs.submit({ body: LOGS, contentEncoding: "gzip" });

			const request = requestAt(requests, 0);
			expect(request.headers.get("Content-Encoding")).toBe("gzip");
			const raw = gunzipSync(Buffer.from(await request.arrayBuffer()));
			expect(raw.toString("utf8")).toBe(JSON.stringify(LOGS));
		});

		it("deflates the payload when asked to", async () => {
			const { fetch, requests } = fakeFetch(jsonResponse({}, 202));
			const client = makeClient(fetch);

			await client.logs.submit({ body: LOGS, contentEncoding: "deflate" });

			const request = requestAt(requests, 0);
			expect(request.headers.get("Content-Encoding")).toBe("deflate");
			const raw = inflateSync(Buffer.from(await request.arrayBuffer()));
			expect(raw.toString("utf8")).toBe(JSON.stringify(LOGS));
		});

		it("rejects more than 1000 logs", async () => {
			const { fetch } = fakeFetch();
			const client = makeClient(fetch);
			const body: HTTPLog = Array.from({ length: 1001 }, (_, i) => ({
				message: `log ${i}`,
			}));

			await expect(client.logs.submit({ body })).rejects.toThrow(
				"Too many logs: 1001 (max 1000 per request)",
			);
			expect(fetch).not.toHaveBeenCalled();
		});

		it("rejects payloads over 5 MB", async () => {
			const { fetch } = fakeFetch();
			const client = makeClient(fetch);

			await expect(
				client.logs.submit({
					body: [{ message: "x".repeat(5 * 1024 * 1024) }],
				}),
			).rejects.toThrow("Payload too large");
			expect(fetch).not.toHaveBeenCalled();
		});

		it("decodes intake errors", async () => {
			const { fetch } = fakeFetch(
				jsonResponse(
					{
						errors: [{ status: "400", title: "Bad Request", detail: "invalid" }],
					},
					400,
				),
			);
			const client = makeClient(fetch);

			await expect(client.logs.submit({ body: LOGS })).rejects.toMatchObject({
				message: "Bad Request: invalid",
				status: 400,
				origin: "server",
			});
		});

		it("retries a transient failure under the default policy", async () => {
			const { fetch, requests } = fakeFetch(
				jsonResponse({ errors: ["unavailable"] }, 503),
				jsonResponse({}, 202),
			);
			const client = makeClient(fetch);

			await client.logs.submit({ body: LOGS });

			expect(requests).toHaveLength(2);
		});

		it("does not retry under the noSideEffects policy", async () => {
			const { fetch, requests } = fakeFetch(
				jsonResponse({ errors: ["unavailable"] }, 503),
			);
			const client = makeClient(fetch, {
				retry: {
					minDelayMillis: 1,
					maxDelayMillis: 1,
					retryPolicy: "noSideEffects",
				},
			});

			await expect(client.logs.submit({ body: LOGS })).rejects.toMatchObject({
				status: 503,
				message: "unavailable",
			});
			expect(requests).toHaveLength(1);
		});
	});
});
