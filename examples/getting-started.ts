import { Cdp, CdpApiError } from "../src/index.js";

const cdp = Cdp.fromEnvironment();

const roots = await cdp.assets.list({ filter: { root: true } });
console.log(
	"Root assets:",
	roots.map((asset) => asset.name),
);

// Create a small hierarchy and show which items made it when a chunk fails.
try {
	await cdp.assets.create([
		{ externalId: "docs/plant", name: "Plant" },
		{ externalId: "docs/pump-1", parentExternalId: "docs/plant", name: "Pump 1" },
	]);
} catch (error) {
	if (!(error instanceof CdpApiError)) throw error;
	console.log("created:", error.successful);
	console.log("rejected:", error.failed);
	console.log("unknown:", error.unknown);
}

const plant = await cdp.assets.retrieve({ externalId: "docs/plant" });
console.dir(plant, { depth: null });

cdp.close();
