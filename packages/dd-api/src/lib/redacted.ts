const NodeInspectSymbol = Symbol.for("nodejs.util.inspect.custom");

/**
 * Wrapper for secrets (API and application keys).
 *
 * The wrapped value never shows up in `String()`, `JSON.stringify` or
 * `util.inspect` output; use {@link value} to read it back.
 */
export class Redacted<A = string> {
	#value: A | undefined;
	#wiped = false;

	constructor(value: A) {
		this.#value = value;
	}

	/** @internal */
	reveal(): A {
		if (this.#wiped || this.#value === undefined) {
			throw new Error("Unable to get redacted value");
		}
		return this.#value;
	}

	/** @internal */
	wipe(): boolean {
		const had = !this.#wiped;
		this.#wiped = true;
		this.#value = undefined;
		return had;
	}

	toString(): string {
		return "<redacted>";
	}

	toJSON(): string {
		return "<redacted>";
	}

	[NodeInspectSymbol](): string {
		return "<redacted>";
	}
}

export const make = <T>(value: T): Redacted<T> => new Redacted(value);

export const value = <T>(self: Redacted<T>): T => self.reveal();

export const unsafeWipe = <T>(self: Redacted<T>): boolean => self.wipe();
