import { afterEach, describe, expect, it } from "vitest";
import { DETAIL_MAX, forward } from "../src/bridge/forward.js";
import { type BridgeCall, type ProxyTarget, resolveBridgeCall } from "../src/bridge/rules.js";
import { HUB_RULES } from "../src/bridge/targets.js";
import { type Reply, type Upstream, closedPort, startUpstream } from "./helpers/upstream.js";

let upstream: Upstream | null = null;

afterEach(async () => {
	await upstream?.close();
	upstream = null;
});

function hubAt(baseUrl: string, extra: Partial<ProxyTarget> = {}): ProxyTarget {
	return {
		id: "hub",
		mount: "/api/hub",
		baseUrl,
		timeouts: { short: 200, medium: 1000, long: 2000 },
		rules: HUB_RULES,
		...extra,
	};
}

async function hubWith(reply: (url: string) => Reply, extra: Partial<ProxyTarget> = {}) {
	upstream = await startUpstream((r) => reply(r.url));
	return hubAt(upstream.baseUrl, extra);
}

function resolved(target: ProxyTarget, method: string, url: string, body: string | null = null): BridgeCall {
	const res = resolveBridgeCall([target], method, url, body);
	if (res.kind !== "call") throw new Error(`unexpected ${res.kind}`);
	return res.call;
}

describe("bridge forward", () => {
	it("calls the rewritten upstream path with the query intact", async () => {
		const target = await hubWith(() => ({ body: [{ id: 1 }] }));
		const res = await forward(resolved(target, "GET", "/api/hub/tasks?status=queued"));
		expect(res).toEqual({ status: 200, body: [{ id: 1 }] });
		expect(upstream?.calls.map((c) => c.url)).toEqual(["/api/tasks?status=queued"]);
		expect(upstream?.calls[0].headers.accept).toBe("application/json");
	});

	it("sends JSON bodies and the bearer token on POST", async () => {
		const target = await hubWith(() => ({ body: { queued: true } }), { token: "test-secret" });
		const res = await forward(resolved(target, "POST", "/api/hub/dispatch", '{"task":"t","mode":"queue"}'));
		expect(res.status).toBe(200);
		const c = upstream?.calls[0];
		expect(c?.method).toBe("POST");
		expect(c?.url).toBe("/tasks");
		expect(c?.headers.authorization).toBe("Bearer test-secret");
		expect(c?.headers["content-type"]).toBe("application/json");
		expect(JSON.parse(c?.body ?? "null")).toEqual({ task: "t" });
	});

	it("sends {} for empty-body actions", async () => {
		const target = await hubWith(() => ({ body: { ok: true } }));
		await forward(resolved(target, "POST", "/api/hub/tasks/9/run"));
		expect(upstream?.calls[0].body).toBe("{}");
		expect(upstream?.calls[0].headers.authorization).toBeUndefined();
	});

	it("wraps an upstream HTTP error with a truncated detail", async () => {
		const target = await hubWith(() => ({ status: 503, raw: "x".repeat(2000) }));
		const res = await forward(resolved(target, "GET", "/api/hub/health"));
		expect(res.status).toBe(502);
		expect(res.body).toEqual({ error: "HTTP 503", detail: "x".repeat(DETAIL_MAX) });
	});

	it("truncates the detail on code points, never inside a surrogate pair", async () => {
		const target = await hubWith(() => ({ status: 500, raw: `a${"😀".repeat(600)}` }));
		const res = await forward(resolved(target, "GET", "/api/hub/health"));
		expect(res.body).toEqual({ error: "HTTP 500", detail: `a${"😀".repeat(DETAIL_MAX - 1)}` });
	});

	it("reports invalid JSON from a 2xx upstream", async () => {
		const target = await hubWith(() => ({ raw: "<html>" }));
		const res = await forward(resolved(target, "GET", "/api/hub/capabilities"));
		expect(res).toEqual({ status: 502, body: { error: "invalid JSON from upstream", detail: "<html>" } });
	});

	it("times out within the call-class budget", async () => {
		const target = await hubWith(() => ({ body: {}, delayMs: 1500 }));
		const started = Date.now();
		const res = await forward(resolved(target, "GET", "/api/hub/health"));
		expect(Date.now() - started).toBeLessThan(200 + 500);
		expect(res).toEqual({ status: 504, body: { error: "upstream timed out after 200 ms" } });
	});

	it("turns a refused connection into an error envelope", async () => {
		const port = await closedPort();
		const res = await forward(resolved(hubAt(`http://127.0.0.1:${port}`), "GET", "/api/hub/health"));
		expect(res.status).toBe(502);
		expect(res.body).toEqual({ error: expect.any(String) });
	});
});
