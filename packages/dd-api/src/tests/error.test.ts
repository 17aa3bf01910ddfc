import { describe, expect, it } from "vitest";
import {
	DatadogError,
	datadogError,
	makeServerError,
	withDatadogData,
} from "../error.js";

function withCode(message: string, code: string): Error {
	return Object.assign(new Error(message), { code });
}

describe("makeServerError", () => {
	it("uses the errors array of an API error payload", () => {
		const error = makeServerError(
			{ status: 400, statusText: "Bad Request" },
			{ errors: ["Invalid query"] },
		);

		expect(error).toBeInstanceOf(DatadogError);
		expect(error.message).toBe("Invalid query");
		expect(error.status).toBe(400);
		expect(error.origin).toBe("server");
		expect(error.body).toBe('{"errors":["Invalid query"]}');
		expect(error.model).toEqual({ errors: ["Invalid query"] });
	});

	it("uses the first entry that describes an error", () => {
		const error = makeServerError(
			{ status: 403 },
			{ errors: ["", "first problem", "second problem"] },
		);
		expect(error.message).toBe("first problem");
	});

	it("keeps the raw response text as the body", () => {
		const raw = '{ "errors": [ "Invalid query" ] }';
		const error = makeServerError(
			{ status: 400 },
			{ errors: ["Invalid query"] },
			raw,
		);
		expect(error.body).toBe(raw);
	});

	it("understands the intake error shape", () => {
		const error = makeServerError(
			{ status: 413 },
			{
				errors: [
					{ status: "413", title: "Payload Too Large", detail: "too big" },
				],
			},
		);
		expect(error.message).toBe("Payload Too Large: too big");
	});

	it("falls back to a text body", () => {
		const error = makeServerError({ status: 502 }, "upstream unavailable");
		expect(error.message).toBe("upstream unavailable");
		expect(error.body).toBe("upstream unavailable");
		expect(error.model).toBeUndefined();
	});

	it("falls back to the status text", () => {
		expect(
			makeServerError({ status: 503, statusText: "Service Unavailable" }, "")
				.message,
		).toBe("HTTP 503 Service Unavailable");
		expect(makeServerError({ status: 500 }, {}).message).toBe("HTTP 500");
	});

	it("reads the rate-limit reset on 429", () => {
		const headers = new Headers({ "x-ratelimit-reset": "2" });
		expect(
			makeServerError({ status: 429, headers }, { errors: ["slow down"] })
				.retryAfterMillis,
		).toBe(2000);
		expect(
			makeServerError({ status: 503, headers }, {}).retryAfterMillis,
		).toBeUndefined();
	});
});

describe("datadogError", () => {
	it("returns DatadogErrors unchanged", () => {
		const error = new DatadogError({ message: "x", status: 404 });
		expect(datadogError(error)).toBe(error);
	});

	it("maps connection failures to 502", () => {
		const error = datadogError(
			new TypeError("fetch failed", {
				cause: withCode("connect ECONNREFUSED", "ECONNREFUSED"),
			}),
		);
		expect(error.status).toBe(502);
		expect(error.code).toBe("ECONNREFUSED");
		expect(error.message).toBe("Connection failed: ECONNREFUSED");
	});

	it("maps DNS failures to a non-retryable 400", () => {
		const error = datadogError(withCode("getaddrinfo", "ENOTFOUND"));
		expect(error.status).toBe(400);
		expect(error.code).toBe("ENOTFOUND");
	});

	it("maps aborts to 499", () => {
		const abort = Object.assign(new Error("This operation was aborted"), {
			name: "AbortError",
		});
		const error = datadogError(abort);
		expect(error.status).toBe(499);
		expect(error.code).toBe("ABORTED");
	});

	it("maps anything else to a local error", () => {
		expect(datadogError(new Error("oops")).message).toBe("oops");
		const unknown = datadogError("oops");
		expect(unknown.message).toBe("Unknown error");
		expect(unknown.status).toBe(0);
	});
});

describe("withDatadogData", () => {
	it("returns the data", async () => {
		await expect(
			withDatadogData(async () => ({ data: { ok: 1 } })),
		).resolves.toEqual({ ok: 1 });
	});

	it("rethrows a DatadogError from the error interceptor", async () => {
		const error = new DatadogError({ message: "nope", status: 404 });
		await expect(withDatadogData(async () => ({ error }))).rejects.toBe(error);
	});

	it("builds a server error from a raw payload", async () => {
		await expect(
			withDatadogData(async () => ({
				error: { errors: ["not found"] },
				response: { status: 404 },
			})),
		).rejects.toMatchObject({ message: "not found", status: 404 });
	});

	it("rejects an empty response", async () => {
		await expect(
			withDatadogData(async () => ({
				data: undefined,
				response: { status: 200 },
			})),
		).rejects.toMatchObject({ message: "Empty response", status: 200 });
	});

	it("wraps thrown transport errors", async () => {
		await expect(
			withDatadogData(async () => {
				throw new TypeError("fetch failed");
			}),
		).rejects.toMatchObject({ status: 502, code: "NETWORK_ERROR" });
	});
});
