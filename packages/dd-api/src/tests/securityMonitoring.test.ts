import { describe, expect, it } from "vitest";
import { collectAll } from "../lib/paginate.js";
import {
	fakeFetch,
	jsonResponse,
	makeClient,
	requestAt,
	urlOf,
} from "./helpers.js";

function signalsPage(ids: string[], after?: string) {
	return {
		data: ids.map((id) => ({
			id,
			type: "signal",
			attributes: { message: "Brute force", tags: ["source:cloudtrail"] },
		})),
		meta: after ? { page: { after } } : undefined,
	};
}

const triage = {
	data: {
		id: "s1",
		type: "signal_metadata",
		attributes: {
			assignee: { uuid: "user-1" },
			incident_ids: [],
			state: "archived",
			archive_reason: "false_positive",
		},
	},
};

describe("SecurityMonitoringApi", () => {
	it("pages searchSignals through body.page", async () => {
		const { fetch, requests } = fakeFetch(
			jsonResponse(signalsPage(["s1", "s2"], "after-1")),
			jsonResponse(signalsPage(["s3", "s4"])),
		);
		const client = makeClient(fetch);

		const signals = await collectAll(
			client.securityMonitoring.searchSignalsWithPagination({
				filter: { query: "security:attack" },
				page: { limit: 2 },
			}),
		);

		expect(signals.map((s) => s.id)).toEqual(["s1", "s2", "s3", "s4"]);
		expect(requests).toHaveLength(2);
		expect(urlOf(requestAt(requests, 1)).pathname).toBe(
			"/api/v2/security_monitoring/signals/search",
		);
		expect(await requestAt(requests, 1).json()).toEqual({
			filter: { query: "security:attack" },
			page: { cursor: "after-1", limit: 2 },
		});
	});

	it("pages listSignals through query parameters", async () => {
		const { fetch, requests } = fakeFetch(
			jsonResponse(signalsPage(["s1"], "after-1")),
			jsonResponse(signalsPage([])),
		);
		const client = makeClient(fetch);

		const signals = await collectAll(
			client.securityMonitoring.listSignalsWithPagination({
				sort: "timestamp",
				pageLimit: 1,
			}),
		);

		expect(signals.map((s) => s.id)).toEqual(["s1"]);
		expect(
			requests.map((r) => urlOf(r).searchParams.get("page[cursor]")),
		).toEqual([null, "after-1"]);
		expect(urlOf(requestAt(requests, 0)).pathname).toBe(
			"/api/v2/security_monitoring/signals",
		);
	});

	it("gets a signal", async () => {
		const { fetch, requests } = fakeFetch(
			jsonResponse({ data: signalsPage(["s1"]).data[0] }),
		);
		const client = makeClient(fetch);

		const response = await client.securityMonitoring.getSignal({
			signalId: "s1",
		});

		expect(response.data?.id).toBe("s1");
		expect(urlOf(requestAt(requests, 0)).pathname).toBe(
			"/api/v2/security_monitoring/signals/s1",
		);
	});

	it("edits the triage state", async () => {
		const { fetch, requests } = fakeFetch(jsonResponse(triage));
		const client = makeClient(fetch);

		const response = await client.securityMonitoring.editSignalState({
			signalId: "s1",
			body: {
				data: {
					attributes: { state: "archived", archive_reason: "false_positive" },
				},
			},
		});

		expect(response.data.attributes.state).toBe("archived");
		const request = requestAt(requests, 0);
		expect(request.method).toBe("PATCH");
		expect(urlOf(request).pathname).toBe(
			"/api/v2/security_monitoring/signals/s1/state",
		);
		expect(await request.json()).toEqual({
			data: {
				attributes: { state: "archived", archive_reason: "false_positive" },
			},
		});
	});

	it("edits the assignee and linked incidents", async () => {
		const { fetch, requests } = fakeFetch(
			jsonResponse(triage),
			jsonResponse(triage),
		);
		const client = makeClient(fetch);

		await client.securityMonitoring.editSignalAssignee({
			signalId: "s1",
			body: { data: { attributes: { assignee: { uuid: "user-1" } } } },
		});
		await client.securityMonitoring.editSignalIncidents({
			signalId: "s1",
			body: { data: { attributes: { incident_ids: [42] } } },
		});

		expect(requests.map((r) => urlOf(r).pathname)).toEqual([
			"/api/v2/security_monitoring/signals/s1/assignee",
			"/api/v2/security_monitoring/signals/s1/incidents",
		]);
	});

	it("maps a 404 to a DatadogError", async () => {
		const { fetch } = fakeFetch(
			jsonResponse({ errors: ["Signal not found"] }, 404),
		);
		const client = makeClient(fetch);

		await expect(
			client.securityMonitoring.getSignal({ signalId: "missing" }),
		).rejects.toMatchObject({
			name: "DatadogError",
			message: "Signal not found",
			status: 404,
			model: { errors: ["Signal not found"] },
		});
	});
});
