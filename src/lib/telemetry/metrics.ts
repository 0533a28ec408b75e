import type { Attributes } from "@opentelemetry/api";
import { meter } from "./otel.js";

const m = meter();
const probes = m.createCounter("deck_probe_total", {
	description: "TCP reachability probes",
});
const bridgeReq = m.createCounter("deck_bridge_requests_total", {
	description: "Bridged upstream calls",
});
const bridgeDur = m.createHistogram("deck_bridge_duration_ms", {
	description: "Bridged upstream call duration",
	unit: "ms",
});
const aggregateDur = m.createHistogram("deck_aggregate_duration_ms", {
	description: "Full systems aggregation duration",
	unit: "ms",
});

export function incProbe(reachable: boolean, attrs?: Attributes) {
	probes.add(1, { result: reachable ? "reachable" : "unreachable", ...attrs });
}

export function observeBridgeCall(
	target: string,
	outcome: "ok" | "http_error" | "transport_error" | "timeout",
	ms: number,
) {
	bridgeReq.add(1, { target, outcome });
	bridgeDur.record(ms, { target, outcome });
}

export function observeAggregate(ms: number, unresponsive: number) {
	aggregateDur.record(ms, { partial: unresponsive > 0 });
}
