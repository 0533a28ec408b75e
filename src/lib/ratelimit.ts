type Bucket = {
	capacity: number; // tokens per second
	tokens: number;
	last: number; // ms
};

/** Token bucket per client key (remote address for inbound API calls). */
export class RateLimiter {
	private readonly buckets = new Map<string, Bucket>();

	constructor(
		private readonly rps: number,
		private readonly now: () => number = Date.now,
	) {}

	allow(key: string): { ok: boolean; retryAfterMs?: number } {
		const t = this.now();
		let b = this.buckets.get(key);
		if (!b) {
			b = { capacity: this.rps, tokens: this.rps, last: t };
			this.buckets.set(key, b);
		}
		// refill
		const delta = Math.max(0, t - b.last) / 1000;
		b.tokens = Math.min(b.capacity, b.tokens + delta * b.capacity);
		b.last = t;
		if (b.tokens >= 1) {
			b.tokens -= 1;
			return { ok: true };
		}
		const needed = 1 - b.tokens;
		return { ok: false, retryAfterMs: Math.ceil((needed / b.capacity) * 1000) };
	}

	/** Drops buckets idle long enough to be full again. */
	sweep(): void {
		const t = this.now();
		for (const [key, b] of this.buckets) {
			if (t - b.last > 1000) this.buckets.delete(key);
		}
	}
}
