import { Cdp, Token } from "../src/index.js";

const token = process.env.CDP_TOKEN;
if (!token) {
	throw new Error("Set CDP_TOKEN to talk to the API.");
}

const cdp = new Cdp({
	project: process.env.CDP_PROJECT ?? "docs",
	cluster: process.env.CDP_CLUSTER ?? "westeurope-1",
	credentials: new Token(token),
	maxWorkers: 8,
	retry: { maxAttempts: 5, minDelayMillis: 250 },
});

const db = "docs";
const table = "readings";

await cdp.raw.rows.insert(
	db,
	table,
	Array.from({ length: 20_000 }, (_, i) => ({
		key: `reading-${i}`,
		columns: { value: Math.sin(i) },
	})),
	true,
);

// Split the table into 8 cursors and read them concurrently.
let total = 0;
for await (const chunk of cdp.raw.rows.chunks(db, table, { partitions: 8, chunkSize: 2_500 })) {
	total += chunk.length;
	console.log("chunk of %d rows, %d so far", chunk.length, total);
}

cdp.close();
