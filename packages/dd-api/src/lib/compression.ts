import { deflateSync, gzipSync } from "node:zlib";
import createDebug from "debug";

const debug = createDebug("ddapi:http");

export const CONTENT_ENCODINGS = ["gzip", "deflate"] as const;

/** Request body encodings accepted by the intake endpoints. */
export type ContentEncoding = (typeof CONTENT_ENCODINGS)[number];

export function isContentEncoding(value: string): value is ContentEncoding {
	return (CONTENT_ENCODINGS as readonly string[]).includes(value);
}

/**
 * Compress a serialised body. `deflate` produces zlib-wrapped data, which is
 * what servers expect for `Content-Encoding: deflate`.
 */
export function compressBody(
	data: Uint8Array,
	encoding: ContentEncoding,
): ArrayBuffer {
	const compressed = encoding === "gzip" ? gzipSync(data) : deflateSync(data);
	const out = new ArrayBuffer(compressed.byteLength);
	new Uint8Array(out).set(compressed);
	return out;
}

/**
 * Request interceptor: when an operation set `Content-Encoding`, replace the
 * JSON body with its compressed form.
 */
export async function compressRequest(request: Request): Promise<Request> {
	const encoding = request.headers.get("content-encoding");
	if (!encoding || !isContentEncoding(encoding) || request.body === null) {
		return request;
	}

	const raw = new Uint8Array(await request.arrayBuffer());
	const body = compressBody(raw, encoding);
	debug(
		"compressed %d -> %d bytes (%s)",
		raw.byteLength,
		body.byteLength,
		encoding,
	);

	return new Request(request.url, {
		method: request.method,
		headers: request.headers,
		body,
		signal: request.signal,
	});
}
