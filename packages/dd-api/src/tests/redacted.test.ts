import { inspect } from "node:util";
import { describe, expect, it } from "vitest";
import * as Redacted from "../lib/redacted.js";

describe("Redacted", () => {
	it("hides the value from every string conversion", () => {
		const secret = Redacted.make("test-secret");

		expect(String(secret)).toBe("<redacted>");
		expect(JSON.stringify({ secret })).toBe('{"secret":"<redacted>"}');
		expect(inspect(secret)).toBe("<redacted>");
		expect(Redacted.value(secret)).toBe("test-secret");
	});

	it("cannot be read after wiping", () => {
		const secret = Redacted.make("test-secret");

		expect(Redacted.unsafeWipe(secret)).toBe(true);
		expect(Redacted.unsafeWipe(secret)).toBe(false);
		expect(() => Redacted.value(secret)).toThrow("Unable to get redacted value");
	});
});
