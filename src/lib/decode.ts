import { z } from "zod";
import { CdpError } from "../error.js";
import type { Page } from "./paginate.js";

/**
 * Schema of one item in a response. Resource schemas use `.passthrough()`,
 * so fields the SDK does not know about are kept.
 */
export type Schema<T> = z.ZodType<T>;

const ItemsEnvelope = z.object({ items: z.array(z.unknown()) }).passthrough();
const PageEnvelope = ItemsEnvelope.extend({ nextCursor: z.string().nullish() });

/** Metadata as the API returns it: string keys to string values. */
export const MetadataSchema = z.record(z.string());

export const LabelRefSchema = z.object({ externalId: z.string() }).passthrough();

function unexpected(what: string, data: unknown, error: z.ZodError): CdpError {
	const issue = error.issues[0];
	const where = issue && issue.path.length > 0 ? ` at '${issue.path.join(".")}'` : "";
	return new CdpError({
		message: `Unexpected response: ${what}${where}`,
		code: "UNEXPECTED_RESPONSE",
		status: 0,
		origin: "sdk",
		data,
		cause: error,
	});
}

export function parseItem<T>(data: unknown, schema: Schema<T>): T {
	const result = schema.safeParse(data);
	if (!result.success) throw unexpected("malformed item", data, result.error);
	return result.data;
}

/** Parse an `{ items: [...] }` envelope. */
export function parseItems<T>(data: unknown, schema: Schema<T>): T[] {
	const envelope = ItemsEnvelope.safeParse(data);
	if (!envelope.success) {
		throw unexpected("expected an object with an 'items' list", data, envelope.error);
	}
	return envelope.data.items.map((item) => parseItem(item, schema));
}

/** Parse an `{ items: [...], nextCursor }` page of a listing. */
export function parsePage<T>(data: unknown, schema: Schema<T>): Page<T> {
	const page = PageEnvelope.safeParse(data);
	if (!page.success) {
		throw unexpected("expected an object with an 'items' list", data, page.error);
	}
	return {
		items: page.data.items.map((item) => parseItem(item, schema)),
		nextCursor: page.data.nextCursor ?? undefined,
	};
}
