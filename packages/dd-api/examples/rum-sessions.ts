import { collectAll, DatadogClient } from "../src/index.js";

const client = DatadogClient.fromEnvironment();

// Stop after 30 seconds, whatever page we are on.
const events = client.rum.listEventsWithPagination(
	{
		filterQuery: "@type:session @session.type:user",
		filterFrom: new Date(Date.now() - 60 * 60 * 1000),
		filterTo: new Date(),
		sort: "timestamp",
		pageLimit: 100,
	},
	{ signal: AbortSignal.timeout(30_000), readAhead: true },
);

let count = 0;
for await (const event of events) {
	count++;
	if (count <= 5) {
		console.log(event.id, event.attributes?.service);
	}
}
console.log(`Sessions in the last hour: ${count}`);

const errors = await collectAll(
	client.rum.searchEventsWithPagination({
		filter: { query: "@type:error", from: "now-15m", to: "now" },
		page: { limit: 50 },
	}),
	{ max: 200 },
);
console.log(`First ${errors.length} errors of the last 15 minutes`);
