import { describe, expect, it } from "vitest";
import { bodyOf, createTestClient, FakeApi, routes } from "./helpers.js";

function updatedEvents() {
	return new FakeApi(
		routes({
			"POST /events/update": (req) => {
				const items = bodyOf(req).items;
				return {
					body: { items: Array.isArray(items) ? items.map((_, i) => ({ id: i + 1, createdTime: 0, lastUpdatedTime: 0 })) : [] },
				};
			},
		}),
	);
}

describe("Events", () => {
	it("clears every absent updatable field in replace mode", async () => {
		const api = updatedEvents();
		const cdp = createTestClient(api);

		await cdp.events.update([{ id: 5, description: "restarted" }], "replace");

		expect(bodyOf(api.requests[0])).toEqual({
			items: [
				{
					id: 5,
					update: {
						externalId: { setNull: true },
						startTime: { setNull: true },
						endTime: { setNull: true },
						type: { setNull: true },
						subtype: { setNull: true },
						description: { set: "restarted" },
						metadata: { set: {} },
						assetIds: { set: [] },
						source: { setNull: true },
						dataSetId: { setNull: true },
					},
				},
			],
		});
	});

	it("merges lists and objects in patch mode", async () => {
		const api = updatedEvents();
		const cdp = createTestClient(api);

		await cdp.events.update(
			[{ externalId: "ev-1", assetIds: [3], metadata: { shift: "night" }, type: "alarm" }],
			"patch",
		);

		expect(bodyOf(api.requests[0])).toEqual({
			items: [
				{
					externalId: "ev-1",
					update: {
						type: { set: "alarm" },
						metadata: { add: { shift: "night" } },
						assetIds: { add: [3] },
					},
				},
			],
		});
	});

	it("sends ignoreUnknownIds on delete", async () => {
		const api = new FakeApi(routes({ "POST /events/delete": () => ({ body: {} }) }));
		const cdp = createTestClient(api);

		await cdp.events.delete({ externalIds: ["ev-1"], ignoreUnknownIds: true });

		expect(bodyOf(api.requests[0])).toEqual({
			ignoreUnknownIds: true,
			items: [{ externalId: "ev-1" }],
		});
	});
});
