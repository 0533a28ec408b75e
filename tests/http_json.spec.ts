import http from "node:http";
import { afterEach, describe, expect, it } from "vitest";
import { fetchJson } from "../src/lib/http_json.js";

type Hanging = { url: string; cancelled: Promise<boolean>; close: () => Promise<void> };

let open: Hanging | null = null;

afterEach(async () => {
	await open?.close();
	open = null;
});

/** Accepts requests and never answers; `cancelled` resolves once the client hangs up. */
async function hangingUpstream(): Promise<Hanging> {
	let onClose: (cancelled: boolean) => void = () => {};
	const cancelled = new Promise<boolean>((resolve) => {
		onClose = resolve;
	});
	const server = http.createServer((_req, res) => {
		res.on("close", () => onClose(!res.writableFinished));
	});
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	const addr = server.address();
	const port = addr && typeof addr === "object" ? addr.port : 0;
	open = {
		url: `http://127.0.0.1:${port}/health`,
		cancelled,
		close: () =>
			new Promise<void>((resolve) => {
				server.closeAllConnections();
				server.close(() => resolve());
			}),
	};
	return open;
}

describe("fetchJson", () => {
	it("cancels the upstream request when the caller aborts", async () => {
		const upstream = await hangingUpstream();
		const ac = new AbortController();
		setTimeout(() => ac.abort(), 50);
		const started = Date.now();
		const res = await fetchJson(upstream.url, { timeoutMs: 5000, signal: ac.signal });
		expect(Date.now() - started).toBeLessThan(1000);
		expect(res).toEqual({ ok: false, kind: "transport", message: "request aborted" });
		expect(await upstream.cancelled).toBe(true);
	});

	it("still reports its own timeout when a caller signal is given", async () => {
		const upstream = await hangingUpstream();
		const ac = new AbortController();
		const res = await fetchJson(upstream.url, { timeoutMs: 100, signal: ac.signal });
		expect(res).toEqual({ ok: false, kind: "timeout", message: "upstream timed out after 100 ms" });
		expect(await upstream.cancelled).toBe(true);
	});

	it("does not send anything for an already aborted signal", async () => {
		const upstream = await hangingUpstream();
		const res = await fetchJson(upstream.url, { timeoutMs: 5000, signal: AbortSignal.abort() });
		expect(res).toEqual({ ok: false, kind: "transport", message: "request aborted" });
	});
});
