import { invalidArgument } from "../error.js";

/**
 * Split `items` into consecutive chunks of at most `size` items.
 *
 * @example
 * splitIntoChunks([1, 2, 3, 4, 5], 2); // [[1, 2], [3, 4], [5]]
 */
export function splitIntoChunks<T>(items: readonly T[], size: number): T[][] {
	if (!Number.isInteger(size) || size < 1) {
		throw invalidArgument(`Chunk size must be a positive integer, was ${size}`);
	}
	const chunks: T[][] = [];
	for (let i = 0; i < items.length; i += size) {
		chunks.push(items.slice(i, i + size));
	}
	return chunks;
}
