import { describe, expect, it } from "vitest";
import { bodyOf, createTestClient, FakeApi, routes } from "./helpers.js";

const UPLOAD_URL = "https://upload.test/bucket/report";

const created = {
	id: 7,
	externalId: "report",
	name: "report.csv",
	mimeType: "text/csv",
	uploaded: false,
	uploadUrl: UPLOAD_URL,
	createdTime: 0,
	lastUpdatedTime: 0,
};

describe("Files", () => {
	it("creates metadata with the overwrite flag", async () => {
		const api = new FakeApi(routes({ "POST /files": () => ({ body: created }) }));
		const cdp = createTestClient(api);

		const file = await cdp.files.create({ name: "report.csv", externalId: "report" }, true);

		expect(file.uploadUrl).toBe(UPLOAD_URL);
		const [req] = api.to("POST", "/files");
		expect(req?.query.get("overwrite")).toBe("true");
		expect(bodyOf(req)).toEqual({ name: "report.csv", externalId: "report" });
	});

	it("uploads the content to the returned URL", async () => {
		const api = new FakeApi(
			routes({
				"POST /files": () => ({ body: created }),
				"PUT /bucket/report": () => ({ status: 200, body: "" }),
			}),
		);
		const cdp = createTestClient(api);

		const file = await cdp.files.upload(
			{ name: "report.csv", externalId: "report", mimeType: "text/csv" },
			"a,b\n1,2",
		);

		expect(file).toMatchObject({ id: 7, uploaded: true });
		expect(file).not.toHaveProperty("uploadUrl");
		const [put] = api.to("PUT", "/bucket/report");
		expect(put?.body).toBe("a,b\n1,2");
		expect(put?.headers.get("content-type")).toBe("text/csv");
		expect(put?.headers.get("authorization")).toBeNull();
		expect(api.to("POST", "/files")[0]?.query.get("overwrite")).toBe("false");
	});

	it("maps download URLs by the identifier they were asked for", async () => {
		const api = new FakeApi(
			routes({
				"POST /files/downloadlink": (req) => {
					const items = bodyOf(req).items;
					return {
						body: {
							items: Array.isArray(items)
								? items.map((item) => ({ ...item, downloadUrl: `https://dl.test/${JSON.stringify(item)}` }))
								: [],
						},
					};
				},
			}),
		);
		const cdp = createTestClient(api);

		const urls = await cdp.files.retrieveDownloadUrls({ ids: [1], externalIds: ["report"] });

		expect(urls.get(1)).toBe('https://dl.test/{"id":1}');
		expect(urls.get("report")).toBe('https://dl.test/{"externalId":"report"}');
	});
});
