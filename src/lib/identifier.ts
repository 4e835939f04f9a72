import { invalidArgument } from "../error.js";

export type InternalId = { id: number };
export type ExternalId = { externalId: string };

/** Reference to a single resource, by internal or by external id. */
export type Identifier = InternalId | ExternalId;

/** Either form of identifier, as passed to `retrieve`/`delete` style methods. */
export type IdentifierInput = {
	ids?: number | readonly number[];
	externalIds?: string | readonly string[];
};

function isInternalId(identifier: Identifier): identifier is InternalId {
	return "id" in identifier;
}

export function validateId(id: unknown): number {
	if (typeof id !== "number" || !Number.isSafeInteger(id) || id < 1) {
		throw invalidArgument(`Invalid id: ${JSON.stringify(id)}, expected a positive integer`);
	}
	return id;
}

export function validateExternalId(externalId: unknown): string {
	if (typeof externalId !== "string") {
		throw invalidArgument(
			`Invalid externalId: ${JSON.stringify(externalId)}, expected a string`,
		);
	}
	return externalId;
}

/** The id or external id carried by an identifier. */
export function identifierValue(identifier: Identifier): number | string {
	return isInternalId(identifier) ? identifier.id : identifier.externalId;
}

/**
 * Take the identifier off a resource-shaped object: `id` wins over
 * `externalId`. Returns `undefined` when the object carries neither.
 */
export function unwrapIdentifier(item: {
	id?: number | null;
	externalId?: string | null;
}): Identifier | undefined {
	if (typeof item.id === "number") return { id: item.id };
	if (typeof item.externalId === "string") return { externalId: item.externalId };
	return undefined;
}

/**
 * An ordered list of identifiers built from `ids` and `externalIds`.
 *
 * Remembers whether the caller asked for a single resource (a bare value
 * rather than an array) so that `retrieve` can return one item instead of
 * a list.
 */
export class IdentifierSequence {
	private constructor(
		public readonly identifiers: readonly Identifier[],
		public readonly isSingleton: boolean,
	) {}

	static of(...identifiers: Identifier[]): IdentifierSequence {
		return new IdentifierSequence(identifiers, false);
	}

	/** A sequence naming exactly one resource. */
	static single(identifier: Identifier): IdentifierSequence {
		return "id" in identifier
			? IdentifierSequence.load({ ids: identifier.id })
			: IdentifierSequence.load({ externalIds: identifier.externalId });
	}

	/** @throws CdpError when neither `ids` nor `externalIds` is given, or a value is malformed */
	static load({ ids, externalIds }: IdentifierInput): IdentifierSequence {
		const identifiers: Identifier[] = [];
		const single =
			(typeof ids === "number" && externalIds === undefined) ||
			(typeof externalIds === "string" && ids === undefined);

		if (ids !== undefined) {
			const list: readonly number[] = typeof ids === "number" ? [ids] : ids;
			for (const id of list) identifiers.push({ id: validateId(id) });
		}
		if (externalIds !== undefined) {
			const list: readonly string[] =
				typeof externalIds === "string" ? [externalIds] : externalIds;
			for (const externalId of list) {
				identifiers.push({ externalId: validateExternalId(externalId) });
			}
		}
		if (ids === undefined && externalIds === undefined) {
			throw invalidArgument("ids and externalIds cannot both be undefined");
		}
		return new IdentifierSequence(identifiers, single);
	}

	get length(): number {
		return this.identifiers.length;
	}

	/** Identifiers in wire form, e.g. `[{ id: 1 }, { externalId: "a" }]`. */
	asDicts(): Identifier[] {
		return this.identifiers.map((identifier) => ({ ...identifier }));
	}

	asPrimitives(): Array<number | string> {
		return this.identifiers.map(identifierValue);
	}

	/** Split into sequences of at most `size` identifiers. */
	chunked(size: number): IdentifierSequence[] {
		const chunks: IdentifierSequence[] = [];
		for (let i = 0; i < this.identifiers.length; i += size) {
			chunks.push(
				new IdentifierSequence(this.identifiers.slice(i, i + size), this.isSingleton),
			);
		}
		return chunks;
	}

	/** Raise unless this sequence names exactly one resource. */
	assertSingleton(): Identifier {
		const [first] = this.identifiers;
		if (!this.isSingleton || first === undefined || this.identifiers.length !== 1) {
			throw invalidArgument("Exactly one of id or externalId must be specified");
		}
		return first;
	}
}
