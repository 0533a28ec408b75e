import { describe, expect, it } from "vitest";
import { RateLimiter } from "../src/lib/ratelimit.js";

describe("ratelimit", () => {
	it("limits to configured rps", () => {
		let t = 1_000;
		const rl = new RateLimiter(2, () => t);
		expect(rl.allow("a").ok).toBe(true);
		expect(rl.allow("a").ok).toBe(true);
		const c = rl.allow("a");
		expect(c).toEqual({ ok: false, retryAfterMs: 500 });
		expect(rl.allow("b").ok).toBe(true);
		t += 500;
		expect(rl.allow("a").ok).toBe(true);
	});

	it("forgets idle clients", () => {
		let t = 0;
		const rl = new RateLimiter(1, () => t);
		rl.allow("a");
		expect(rl.allow("a").ok).toBe(false);
		t += 5_000;
		rl.sweep();
		expect(rl.allow("a").ok).toBe(true);
	});
});
