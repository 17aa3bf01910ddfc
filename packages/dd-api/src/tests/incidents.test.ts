import { describe, expect, it } from "vitest";
import { collectAll } from "../lib/paginate.js";
import {
	emptyResponse,
	fakeFetch,
	jsonResponse,
	makeClient,
	requestAt,
	urlOf,
} from "./helpers.js";

function incident(id: string) {
	return { id, type: "incidents", attributes: { title: `Incident ${id}` } };
}

function incidentsPage(ids: string[]) {
	return { data: ids.map(incident), meta: { pagination: { size: ids.length } } };
}

describe("IncidentsApi", () => {
	it("refuses to run while the operation is disabled", async () => {
		const { fetch } = fakeFetch();
		const client = makeClient(fetch);

		await expect(client.incidents.list()).rejects.toMatchObject({
			message: "Unstable operation 'v2.ListIncidents' is disabled",
			code: "UNSTABLE_OPERATION_DISABLED",
		});
		await expect(
			client.incidents.get({ incidentId: "" }),
		).rejects.toMatchObject({ code: "UNSTABLE_OPERATION_DISABLED" });
		expect(fetch).not.toHaveBeenCalled();
	});

	it("runs once enabled through the client", async () => {
		const { fetch, requests } = fakeFetch(jsonResponse(incidentsPage(["i1"])));
		const client = makeClient(fetch);

		client.setUnstableOperationEnabled("v2.ListIncidents", true);
		expect(client.isUnstableOperationEnabled("v2.ListIncidents")).toBe(true);

		const response = await client.incidents.list({
			include: ["users", "attachments"],
			pageSize: 5,
		});

		expect(response.data.map((i) => i.id)).toEqual(["i1"]);
		const url = urlOf(requestAt(requests, 0));
		expect(url.pathname).toBe("/api/v2/incidents");
		expect(url.searchParams.get("include")).toBe("users,attachments");
		expect(url.searchParams.get("page[size]")).toBe("5");
		expect(url.searchParams.has("page[offset]")).toBe(false);
	});

	it("rejects unknown unstable operation ids", () => {
		const { fetch } = fakeFetch();
		const client = makeClient(fetch);

		expect(() =>
			client.setUnstableOperationEnabled("v2.ListIncident", true),
		).toThrow("Unknown unstable operation 'v2.ListIncident'");
		expect(client.isUnstableOperationEnabled("v2.ListIncident")).toBe(false);
	});

	it("pages by offset until a short page", async () => {
		const { fetch, requests } = fakeFetch(
			jsonResponse(incidentsPage(["i1", "i2"])),
			jsonResponse(incidentsPage(["i3", "i4"])),
			jsonResponse(incidentsPage(["i5"])),
		);
		const client = makeClient(fetch, {
			unstableOperations: { "v2.ListIncidents": true },
		});

		const incidents = await collectAll(
			client.incidents.listWithPagination({ pageSize: 2 }),
		);

		expect(incidents.map((i) => i.id)).toEqual(["i1", "i2", "i3", "i4", "i5"]);
		expect(
			requests.map((r) => urlOf(r).searchParams.get("page[offset]")),
		).toEqual([null, "2", "4"]);
		expect(
			requests.map((r) => urlOf(r).searchParams.get("page[size]")),
		).toEqual(["2", "2", "2"]);
	});

	it("surfaces the gate error from the paginated iterator", async () => {
		const { fetch } = fakeFetch();
		const client = makeClient(fetch);

		await expect(
			collectAll(client.incidents.listWithPagination()),
		).rejects.toMatchObject({ code: "UNSTABLE_OPERATION_DISABLED" });
		expect(fetch).not.toHaveBeenCalled();
	});

	it("gets, creates, updates and deletes incidents", async () => {
		const { fetch, requests } = fakeFetch(
			jsonResponse({ data: incident("i1") }),
			jsonResponse({ data: incident("i2") }, 201),
			jsonResponse({ data: incident("i2") }),
			emptyResponse(),
		);
		const client = makeClient(fetch, {
			unstableOperations: {
				"v2.GetIncident": true,
				"v2.CreateIncident": true,
				"v2.UpdateIncident": true,
				"v2.DeleteIncident": true,
			},
		});

		const got = await client.incidents.get({
			incidentId: "i1",
			include: ["users"],
		});
		const created = await client.incidents.create({
			data: {
				type: "incidents",
				attributes: { title: "Database down", customer_impacted: false },
			},
		});
		await client.incidents.update({
			incidentId: "i2",
			body: {
				data: { id: "i2", type: "incidents", attributes: { title: "Resolved" } },
			},
		});
		await client.incidents.delete({ incidentId: "i2" });

		expect(got.data.attributes?.title).toBe("Incident i1");
		expect(created.data.id).toBe("i2");
		expect(requests.map((r) => `${r.method} ${urlOf(r).pathname}`)).toEqual([
			"GET /api/v2/incidents/i1",
			"POST /api/v2/incidents",
			"PATCH /api/v2/incidents/i2",
			"DELETE /api/v2/incidents/i2",
		]);
		expect(urlOf(requestAt(requests, 0)).searchParams.get("include")).toBe(
			"users",
		);
	});

	it("validates arguments once enabled", async () => {
		const { fetch } = fakeFetch();
		const client = makeClient(fetch, {
			unstableOperations: { "v2.GetIncident": true },
		});

		await expect(client.incidents.get({ incidentId: "" })).rejects.toThrow(
			"incidentId is required and must be specified",
		);
		expect(fetch).not.toHaveBeenCalled();
	});
});
