import { validationError } from "./error.js";

/**
 * Calculate the UTF-8 byte length of a string.
 * Handles all Unicode characters including surrogate pairs correctly.
 *
 * @param str The string to measure
 * @returns The byte length when encoded as UTF-8
 */
export function utf8ByteLength(str: string): number {
	let bytes = 0;
	for (let i = 0; i < str.length; i++) {
		const code = str.charCodeAt(i);

		if (code <= 0x7f) {
			bytes += 1;
		} else if (code <= 0x7ff) {
			bytes += 2;
		} else if (code >= 0xd800 && code <= 0xdbff) {
			// high surrogate
			if (i + 1 < str.length) {
				const next = str.charCodeAt(i + 1);
				if (next >= 0xdc00 && next <= 0xdfff) {
					// valid surrogate pair → 4 bytes in UTF-8
					bytes += 4;
					i++; // skip low surrogate
				} else {
					bytes += 3;
				}
			} else {
				bytes += 3;
			}
		} else {
			bytes += 3;
		}
	}
	return bytes;
}

/**
 * Format a timestamp the way the API expects query parameters: RFC 3339 in
 * UTC, with milliseconds only when they are non-zero. Strings pass through.
 */
export function formatDateTime(value: Date | string): string {
	if (typeof value === "string") return value;
	if (Number.isNaN(value.getTime())) {
		throw validationError("Invalid date");
	}
	const iso = value.toISOString();
	return value.getUTCMilliseconds() === 0 ? iso.replace(".000Z", "Z") : iso;
}
