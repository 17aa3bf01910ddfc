import { DatadogClient, DatadogError } from "../src/index.js";

const client = DatadogClient.fromEnvironment({
	retry: { maxAttempts: 5, retryPolicy: "noSideEffects" },
	unstableOperations: { "v2.ListIncidents": true },
});

await client.logs.submit({
	body: [
		{ message: "deploy finished", ddsource: "example", service: "checkout" },
	],
	ddtags: "env:staging",
	contentEncoding: "gzip",
});

for await (const log of client.logs.listWithPagination({
	filter: { query: "service:checkout", from: "now-5m", to: "now" },
	page: { limit: 25 },
})) {
	console.log(log.attributes?.timestamp, log.attributes?.message);
}

try {
	for await (const incident of client.incidents.listWithPagination({
		pageSize: 20,
	})) {
		console.log(incident.id, incident.attributes?.title);
	}
} catch (error) {
	if (error instanceof DatadogError && error.status === 403) {
		console.error("Missing incident_read permission");
	} else {
		throw error;
	}
}
