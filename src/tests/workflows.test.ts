import { describe, expect, it } from "vitest";
import { bodyOf, createTestClient, FakeApi, routes } from "./helpers.js";

const execution = {
	id: "exec-1",
	workflowExternalId: "nightly",
	version: "1",
	status: "running",
	createdTime: 0,
};

describe("Workflows", () => {
	it("runs a version with the nonce of a new session", async () => {
		const api = new FakeApi(
			routes({
				"POST /sessions": () => ({
					body: { items: [{ id: 1, status: "READY", nonce: "nonce-1" }] },
				}),
				"POST /workflows/nightly/versions/1/run": () => ({ body: execution }),
			}),
		);
		const cdp = createTestClient(api);

		const result = await cdp.workflows.executions.run({
			workflowExternalId: "nightly",
			version: "1",
			input: { day: "monday" },
		});

		expect(result).toEqual(execution);
		expect(api.requests.map((r) => r.path)).toEqual([
			"/sessions",
			"/workflows/nightly/versions/1/run",
		]);
		expect(bodyOf(api.requests[1])).toEqual({
			authentication: { nonce: "nonce-1" },
			input: { day: "monday" },
		});
	});

	it("returns undefined for a workflow that does not exist", async () => {
		const api = new FakeApi(
			routes({
				"GET /workflows/nightly": () => ({ body: { externalId: "nightly", createdTime: 0 } }),
			}),
		);
		const cdp = createTestClient(api);

		expect(await cdp.workflows.retrieve("nightly")).toEqual({
			externalId: "nightly",
			createdTime: 0,
		});
		expect(await cdp.workflows.retrieve("weekly")).toBeUndefined();
	});

	it("escapes external ids in paths", async () => {
		const api = new FakeApi(routes({}));
		const cdp = createTestClient(api);

		await cdp.workflows.versions.retrieve({ workflowExternalId: "a/b", version: "1 0" });

		expect(api.requests[0]?.path).toBe("/workflows/a%2Fb/versions/1%200");
	});

	it("deletes with ignoreUnknownIds in the query", async () => {
		const api = new FakeApi(
			routes({
				"POST /workflows/delete": () => ({ body: {} }),
				"POST /workflows/versions/delete": () => ({ body: {} }),
			}),
		);
		const cdp = createTestClient(api);

		await cdp.workflows.delete("nightly", true);
		await cdp.workflows.versions.delete([{ workflowExternalId: "nightly", version: "1" }]);

		const [workflowDelete] = api.to("POST", "/workflows/delete");
		expect(workflowDelete?.query.get("ignoreUnknownIds")).toBe("true");
		expect(bodyOf(workflowDelete)).toEqual({ items: [{ externalId: "nightly" }] });
		const [versionDelete] = api.to("POST", "/workflows/versions/delete");
		expect(versionDelete?.query.get("ignoreUnknownIds")).toBe("false");
		expect(bodyOf(versionDelete)).toEqual({
			items: [{ workflowExternalId: "nightly", version: "1" }],
		});
	});

	it("lists versions filtered by workflow", async () => {
		const api = new FakeApi(
			routes({ "POST /workflows/versions/list": () => ({ body: { items: [] } }) }),
		);
		const cdp = createTestClient(api);

		await cdp.workflows.versions.list({ workflows: [{ externalId: "nightly" }] });

		expect(bodyOf(api.requests[0])).toEqual({
			filter: { workflowFilters: [{ externalId: "nightly" }] },
			limit: 25,
		});
	});

	it("cancels an execution with a reason", async () => {
		const api = new FakeApi(
			routes({
				"POST /workflows/executions/exec-1/cancel": () => ({
					body: { ...execution, status: "terminated" },
				}),
			}),
		);
		const cdp = createTestClient(api);

		const cancelled = await cdp.workflows.executions.cancel("exec-1", "no longer needed");

		expect(cancelled.status).toBe("terminated");
		expect(bodyOf(api.requests[0])).toEqual({ reason: "no longer needed" });
	});
});
