/**
 * Opaque box for secrets (tokens, client secrets).
 *
 * The wrapped value never shows up in `String()`, `JSON.stringify` or
 * `util.inspect`, so credentials can be kept on objects that end up in logs.
 */
const NodeInspectSymbol = Symbol.for("nodejs.util.inspect.custom");

export class Redacted<A = string> {
	readonly #value: A;

	constructor(value: A) {
		this.#value = value;
	}

	toString() {
		return "<redacted>";
	}

	toJSON() {
		return "<redacted>";
	}

	[NodeInspectSymbol]() {
		return "<redacted>";
	}

	/** @internal */
	unwrap(): A {
		return this.#value;
	}
}

export const make = <A>(value: A): Redacted<A> => new Redacted(value);

export const value = <A>(self: Redacted<A>): A => self.unwrap();
