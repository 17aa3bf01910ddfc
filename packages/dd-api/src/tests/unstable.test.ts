import { describe, expect, it } from "vitest";
import { UnstableOperations } from "../unstable.js";

describe("UnstableOperations", () => {
	it("disables every unstable operation by default", () => {
		const unstable = new UnstableOperations();
		expect(unstable.isEnabled("v2.ListIncidents")).toBe(false);
		expect(() => unstable.assertEnabled("v2.ListIncidents")).toThrow(
			"Unstable operation 'v2.ListIncidents' is disabled",
		);
	});

	it("reports the disabled code", () => {
		const unstable = new UnstableOperations();
		expect(() => unstable.assertEnabled("v2.CreateIncident")).toThrow(
			expect.objectContaining({ code: "UNSTABLE_OPERATION_DISABLED" }),
		);
	});

	it("lets stable operations through", () => {
		const unstable = new UnstableOperations();
		expect(() => unstable.assertEnabled("v2.ListRUMEvents")).not.toThrow();
	});

	it("honours the initial map and later toggles", () => {
		const unstable = new UnstableOperations({ "v2.GetIncident": true });
		expect(unstable.isEnabled("v2.GetIncident")).toBe(true);
		expect(() => unstable.assertEnabled("v2.GetIncident")).not.toThrow();

		unstable.set("v2.GetIncident", false);
		expect(unstable.isEnabled("v2.GetIncident")).toBe(false);
	});

	it("rejects unknown operation ids", () => {
		const unstable = new UnstableOperations();
		expect(() => unstable.set("v2.ListIncident", true)).toThrow(
			"Unknown unstable operation 'v2.ListIncident'",
		);
	});
});
