/** String key/value pairs attached to most resources. */
export type Metadata = Record<string, string>;

export type LabelRef = { externalId: string };

/** Inclusive range of milliseconds since epoch. */
export type TimestampRange = { min?: number; max?: number };

/** Number of concurrent listing partitions, `1` to `10`. */
export type Partitions = number;

/** Fields shared by `list` and `iterate` on listable resources. */
export type ListArgs<F> = {
	/** Filter to apply. */
	filter?: F;
	/**
	 * Maximum number of items to return.
	 * `-1`, `Infinity` and `null` return everything.
	 * @default 25
	 */
	limit?: number | null;
	/**
	 * Retrieve the items through this many parallel partitions.
	 * Requires an unlimited `limit`.
	 */
	partitions?: Partitions;
};

export type IterateArgs<F> = Omit<ListArgs<F>, "partitions">;

export type ChunksArgs<F> = IterateArgs<F> & {
	/** Items per yielded array. */
	chunkSize: number;
};

export type RetrieveMultipleArgs = {
	ids?: readonly number[];
	externalIds?: readonly string[];
	/** Leave out identifiers that do not exist instead of failing. */
	ignoreUnknownIds?: boolean;
};

export type DeleteArgs = RetrieveMultipleArgs;
