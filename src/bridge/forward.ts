import { type JsonFetcher, type JsonResult, fetchJson } from "../lib/http_json.js";
import { logBridgeForwarded } from "../lib/logging/events.js";
import { observeBridgeCall } from "../lib/telemetry/metrics.js";
import { setSpanAttrs, withSpan } from "../lib/telemetry/tracing.js";
import type { BridgeCall, ErrorEnvelope } from "./rules.js";

export const DETAIL_MAX = 500;

export type BridgeResult = { status: number; body: unknown };

type Outcome = "ok" | "http_error" | "transport_error" | "timeout";

function envelope(error: string, detail?: string): ErrorEnvelope {
	return detail === undefined ? { error } : { error, detail: Array.from(detail).slice(0, DETAIL_MAX).join("") };
}

function toResult(res: JsonResult): { result: BridgeResult; outcome: Outcome } {
	if (res.ok) return { result: { status: 200, body: res.data }, outcome: "ok" };
	switch (res.kind) {
		case "http":
			return { result: { status: 502, body: envelope(`HTTP ${res.status}`, res.body) }, outcome: "http_error" };
		case "invalid_json":
			return { result: { status: 502, body: envelope("invalid JSON from upstream", res.body) }, outcome: "http_error" };
		case "timeout":
			return { result: { status: 504, body: envelope(res.message) }, outcome: "timeout" };
		case "transport":
			return { result: { status: 502, body: envelope(res.message) }, outcome: "transport_error" };
	}
}

/**
 * One attempt, never retried. Every upstream failure comes back as an
 * ErrorEnvelope with a gateway status; this never rejects.
 */
export async function forward(call: BridgeCall, fetcher: JsonFetcher = fetchJson): Promise<BridgeResult> {
	const { target } = call;
	const timeoutMs = target.timeouts[call.callClass];
	const url = target.baseUrl.replace(/\/+$/, "") + call.upstreamPath;
	const headers: Record<string, string> = {};
	if (target.token) headers.authorization = `Bearer ${target.token}`;

	return withSpan(
		"bridge.forward",
		{ target: target.id, method: call.method, path: call.upstreamPath, callClass: call.callClass },
		async (span) => {
			const started = Date.now();
			const res = await fetcher(url, {
				timeoutMs,
				method: call.method,
				headers,
				body: call.method === "POST" ? (call.body ?? {}) : undefined,
			});
			const durationMs = Date.now() - started;
			const { result, outcome } = toResult(res);
			setSpanAttrs(span, { status: result.status });
			observeBridgeCall(target.id, outcome, durationMs);
			logBridgeForwarded({
				target: target.id,
				method: call.method,
				upstreamPath: call.upstreamPath,
				callClass: call.callClass,
				status: res.ok || res.kind === "http" || res.kind === "invalid_json" ? res.status : undefined,
				durationMs,
				error: res.ok ? undefined : outcome,
			});
			return result;
		},
	);
}
