export type JsonResult =
	| { ok: true; status: number; data: unknown }
	| { ok: false; kind: "http"; status: number; body: string }
	| { ok: false; kind: "invalid_json"; status: number; body: string }
	| { ok: false; kind: "timeout"; message: string }
	| { ok: false; kind: "transport"; message: string };

export type FetchJsonOptions = {
	timeoutMs: number;
	method?: "GET" | "POST";
	headers?: Record<string, string>;
	body?: unknown;
	/** Caller cancellation, combined with the timeout. */
	signal?: AbortSignal;
};

export type JsonFetcher = (url: string, opts: FetchJsonOptions) => Promise<JsonResult>;

function transportMessage(e: unknown): string {
	if (!(e instanceof Error)) return String(e);
	// undici wraps socket errors: "fetch failed" + cause
	const cause: unknown = e.cause;
	if (cause instanceof Error && cause.message && cause.message !== e.message)
		return `${e.message}: ${cause.message}`;
	return e.message;
}

/**
 * One HTTP exchange expecting a JSON body. The timeout covers connect, headers
 * and body; an aborted `signal` cancels the exchange as a transport failure.
 * Never rejects: every failure is returned as data.
 */
export const fetchJson: JsonFetcher = async (url, opts) => {
	const timeout = AbortSignal.timeout(opts.timeoutMs);
	const signal = opts.signal ? AbortSignal.any([opts.signal, timeout]) : timeout;
	const headers: Record<string, string> = { accept: "application/json", ...opts.headers };
	let body: string | undefined;
	if (opts.body !== undefined) {
		body = JSON.stringify(opts.body);
		headers["content-type"] = "application/json";
	}
	try {
		const res = await fetch(url, { method: opts.method ?? "GET", headers, body, signal });
		const text = await res.text();
		if (!res.ok) return { ok: false, kind: "http", status: res.status, body: text };
		try {
			return { ok: true, status: res.status, data: text ? JSON.parse(text) : null };
		} catch {
			return { ok: false, kind: "invalid_json", status: res.status, body: text };
		}
	} catch (e) {
		if (timeout.aborted)
			return { ok: false, kind: "timeout", message: `upstream timed out after ${opts.timeoutMs} ms` };
		if (opts.signal?.aborted) return { ok: false, kind: "transport", message: "request aborted" };
		return { ok: false, kind: "transport", message: transportMessage(e) };
	}
};

export function isRecord(v: unknown): v is Record<string, unknown> {
	return typeof v === "object" && v !== null && !Array.isArray(v);
}
