import { describe, expect, it } from "vitest";
import { JobUpdate } from "../hostedExtractors.js";
import { bodyOf, createTestClient, FakeApi, routes } from "./helpers.js";

const job = {
	externalId: "job-1",
	sourceId: "mqtt",
	destinationId: "dest",
	format: { type: "json" },
	targetStatus: "running",
	status: "running",
	createdTime: 0,
	lastUpdatedTime: 0,
};

describe("HostedExtractors", () => {
	it("sends the beta version header for jobs only", async () => {
		const api = new FakeApi(
			routes({
				"GET /hostedextractors/jobs": () => ({ body: { items: [job] } }),
				"GET /hostedextractors/sources": () => ({ body: { items: [] } }),
			}),
		);
		const cdp = createTestClient(api);

		expect(await cdp.hostedExtractors.jobs.list()).toEqual([job]);
		await cdp.hostedExtractors.sources.list();

		expect(api.requests[0]?.headers.get("cdp-version")).toBe("beta");
		expect(api.requests[1]?.headers.get("cdp-version")).toBeNull();
	});

	it("keeps caller headers alongside the beta header", async () => {
		const api = new FakeApi(
			routes({ "GET /hostedextractors/jobs": () => ({ body: { items: [] } }) }),
		);
		const cdp = createTestClient(api);

		await cdp.hostedExtractors.jobs.list({}, { headers: { "x-trace": "1" } });

		expect(api.requests[0]?.headers.get("x-trace")).toBe("1");
		expect(api.requests[0]?.headers.get("cdp-version")).toBe("beta");
	});

	it("includes the source type in source updates", async () => {
		const api = new FakeApi(
			routes({
				"POST /hostedextractors/sources/update": () => ({
					body: {
						items: [
							{ externalId: "mqtt", type: "mqtt5", createdTime: 0, lastUpdatedTime: 0 },
						],
					},
				}),
			}),
		);
		const cdp = createTestClient(api);

		await cdp.hostedExtractors.sources.update([
			{ externalId: "mqtt", type: "mqtt5", host: "broker.test", port: 1883 },
		]);

		expect(bodyOf(api.requests[0])).toEqual({
			items: [
				{
					externalId: "mqtt",
					type: "mqtt5",
					update: { host: { set: "broker.test" }, port: { set: 1883 } },
				},
			],
		});
	});

	it("deletes sources with force", async () => {
		const api = new FakeApi(
			routes({ "POST /hostedextractors/sources/delete": () => ({ body: {} }) }),
		);
		const cdp = createTestClient(api);

		await cdp.hostedExtractors.sources.delete("mqtt", { force: true });

		expect(bodyOf(api.requests[0])).toEqual({
			ignoreUnknownIds: false,
			force: true,
			items: [{ externalId: "mqtt" }],
		});
	});

	it("pauses a job through an update builder", async () => {
		const api = new FakeApi(
			routes({
				"POST /hostedextractors/jobs/update": () => ({
					body: { items: [{ ...job, targetStatus: "paused" }] },
				}),
			}),
		);
		const cdp = createTestClient(api);

		const [updated] = await cdp.hostedExtractors.jobs.update([
			new JobUpdate("job-1").set("targetStatus", "paused"),
		]);

		expect(updated?.targetStatus).toBe("paused");
		expect(bodyOf(api.requests[0])).toEqual({
			items: [{ externalId: "job-1", update: { targetStatus: { set: "paused" } } }],
		});
	});

	it("lists job logs filtered by job", async () => {
		const api = new FakeApi(
			routes({
				"GET /hostedextractors/jobs/logs": () => ({
					body: { items: [{ externalId: "job-1", type: "ok", createdTime: 0 }] },
				}),
			}),
		);
		const cdp = createTestClient(api);

		const logs = await cdp.hostedExtractors.jobs.listLogs({ job: "job-1" });

		expect(logs).toEqual([{ externalId: "job-1", type: "ok", createdTime: 0 }]);
		const query = api.requests[0]?.query;
		expect(query?.get("job")).toBe("job-1");
		expect(query?.has("source")).toBe(false);
		expect(query?.get("limit")).toBe("25");
	});
});
