import { invalidArgument } from "../error.js";
import type { Identifier } from "./identifier.js";

/**
 * How a full write object is turned into a patch.
 *
 * - `replaceIgnoreNull`: set every field present on the object, leave the rest alone.
 * - `patch`: like `replaceIgnoreNull`, but lists and objects are merged with `add`.
 * - `replace`: set every field present and clear every updatable field that is absent.
 */
export type UpdateMode = "replaceIgnoreNull" | "patch" | "replace";

export type FieldKind = "primitive" | "list" | "object";

export type FieldSpec = {
	kind: FieldKind;
	/** Whether `setNull` is allowed. Lists and objects are cleared by setting them empty. */
	nullable?: boolean;
};

/** Updatable fields of a write type and how each is patched. */
export type UpdateSpec<W> = { readonly [K in keyof W & string]?: FieldSpec };

export type FieldPatch = {
	set?: unknown;
	setNull?: true;
	add?: unknown;
	remove?: unknown;
};

export type ItemPatch = Identifier & { update: Record<string, FieldPatch> };

type RemoveValue<V> = NonNullable<V> extends readonly unknown[]
	? NonNullable<V>
	: string[];

function asRecord(value: unknown): Record<string, unknown> {
	return value && typeof value === "object" && !Array.isArray(value)
		? Object.fromEntries(Object.entries(value))
		: {};
}

/** Object fields (metadata) are cleared with `{ set: {} }`: the API rejects a null object. */
function clearedPatch(spec: FieldSpec): FieldPatch | undefined {
	switch (spec.kind) {
		case "list":
			return { set: [] };
		case "object":
			return { set: {} };
		case "primitive":
			return spec.nullable ? { setNull: true } : undefined;
	}
}

/**
 * Builder for the update of a single resource.
 *
 * @example
 * ```ts
 * const update = new AssetUpdate({ externalId: "pump-1" })
 *   .set("name", "Pump 1")
 *   .add("labels", [{ externalId: "critical" }])
 *   .remove("metadata", ["legacyKey"]);
 * await cdp.assets.update([update]);
 * ```
 */
export class ResourceUpdate<W> {
	private readonly fields: Record<string, FieldPatch> = {};

	constructor(
		private readonly spec: UpdateSpec<W>,
		public readonly identifier: Identifier,
	) {}

	set<K extends keyof W & string>(field: K, value: W[K] | null): this {
		const fieldSpec = this.fieldSpec(field);
		if (value === null || value === undefined) {
			const cleared = clearedPatch(fieldSpec);
			if (!cleared) throw invalidArgument(`Field '${field}' cannot be set to null`);
			this.fields[field] = cleared;
		} else {
			this.fields[field] = { set: value };
		}
		return this;
	}

	setNull<K extends keyof W & string>(field: K): this {
		return this.set(field, null);
	}

	/** Append to a list field or merge keys into an object field. */
	add<K extends keyof W & string>(field: K, value: NonNullable<W[K]>): this {
		this.mergeable(field).add = value;
		return this;
	}

	/** Remove values from a list field, or keys from an object field. */
	remove<K extends keyof W & string>(field: K, value: RemoveValue<W[K]>): this {
		this.mergeable(field).remove = value;
		return this;
	}

	dump(): ItemPatch {
		const update = { ...this.fields };
		return "id" in this.identifier
			? { id: this.identifier.id, update }
			: { externalId: this.identifier.externalId, update };
	}

	private fieldSpec(field: string): FieldSpec {
		const spec = Object.entries(this.spec).find(([name]) => name === field)?.[1];
		if (!isFieldSpec(spec)) {
			throw invalidArgument(`Field '${field}' is not updatable`);
		}
		return spec;
	}

	private mergeable(field: string): FieldPatch {
		if (this.fieldSpec(field).kind === "primitive") {
			throw invalidArgument(`Field '${field}' is not a list or object`);
		}
		const existing = this.fields[field];
		if (existing && (existing.add !== undefined || existing.remove !== undefined)) {
			return existing;
		}
		const created: FieldPatch = {};
		this.fields[field] = created;
		return created;
	}
}

function isFieldSpec(value: unknown): value is FieldSpec {
	const record = asRecord(value);
	return (
		record.kind === "primitive" || record.kind === "list" || record.kind === "object"
	);
}

/**
 * Convert a full write object into a patch.
 *
 * The identifier is lifted out of the object: `id` when present, else
 * `externalId` (which is then not part of the update).
 */
export function toPatchObject<W extends { id?: number | null; externalId?: string | null }>(
	write: W,
	spec: UpdateSpec<W>,
	mode: UpdateMode = "replaceIgnoreNull",
): ItemPatch {
	const values = asRecord(write);
	let identifier: Identifier;
	const lifted = new Set<string>(["id"]);
	if (typeof write.id === "number") {
		identifier = { id: write.id };
	} else if (typeof write.externalId === "string") {
		identifier = { externalId: write.externalId };
		lifted.add("externalId");
	} else {
		throw invalidArgument("An item to update must have an id or an externalId");
	}

	const update: Record<string, FieldPatch> = {};
	for (const [field, fieldSpec] of Object.entries(spec)) {
		if (lifted.has(field) || !isFieldSpec(fieldSpec)) continue;
		const value = values[field];
		if (value === undefined || value === null) {
			if (mode !== "replace") continue;
			const cleared = clearedPatch(fieldSpec);
			if (cleared) update[field] = cleared;
			continue;
		}
		update[field] =
			mode === "patch" && fieldSpec.kind !== "primitive" ? { add: value } : { set: value };
	}

	return { ...identifier, update };
}
