import { describe, expect, it } from "vitest";
import { probePort } from "../src/lib/probe.js";
import { closedPort, startUpstream } from "./helpers/upstream.js";

describe("probe", () => {
	it("reports a listening port as reachable", async () => {
		const up = await startUpstream();
		try {
			const res = await probePort("127.0.0.1", up.port, 1000);
			expect(res.reachable).toBe(true);
		} finally {
			await up.close();
		}
	});

	it("reports a closed port as unreachable within the timeout", async () => {
		const port = await closedPort();
		const started = Date.now();
		const res = await probePort("127.0.0.1", port, 500);
		expect(res.reachable).toBe(false);
		expect(Date.now() - started).toBeLessThan(500 + 200);
		if (!res.reachable) expect(res.error).not.toBe("");
	});

	it("never rejects on a bad host name", async () => {
		const res = await probePort("", 0, 200);
		expect(res.reachable).toBe(false);
	});
});
