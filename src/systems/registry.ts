import type { Config } from "../config.js";
import { logSystemsAggregated } from "../lib/logging/events.js";
import { observeAggregate } from "../lib/telemetry/metrics.js";
import { setSpanAttrs, withSpan } from "../lib/telemetry/tracing.js";
import { DashboardAdapter } from "./dashboard.js";
import { GatewayAdapter } from "./gateway.js";
import { HubAdapter } from "./hub.js";
import { InferenceAdapter } from "./inference.js";
import { PresenceAdapter } from "./presence.js";
import { PortServiceAdapter } from "./service.js";
import type { AdapterDeps, SystemAdapter, SystemStatus } from "./types.js";
import { WorkerAdapter } from "./worker.js";

/**
 * The fixed display order: gateway, hub, inference, presence entries, port
 * services, worker, then the dashboard itself. Adding a subordinate system
 * means adding an adapter here; `aggregate` does not change.
 */
export function buildRegistry(
	config: Readonly<Config>,
	deps: AdapterDeps,
	selfPort: () => number = () => config.server.port,
): SystemAdapter[] {
	const { timeout_ms: probeMs, deadline_ms: deadlineMs } = config.probe;
	const healthMs = Math.min(config.probe.health_timeout_ms, deadlineMs);
	return [
		new GatewayAdapter(config.gateway, deps, probeMs),
		new HubAdapter(config.hub, deps, probeMs, healthMs),
		new InferenceAdapter(config.inference, deps, probeMs, healthMs),
		...config.presence.map((p) => new PresenceAdapter(p)),
		...config.services.map((s) => new PortServiceAdapter(s, deps, probeMs)),
		new WorkerAdapter(config.worker, deps, probeMs, healthMs),
		new DashboardAdapter(selfPort),
	];
}

export type AggregateOptions = { deadlineMs: number };

type Outcome = { status: SystemStatus; late: boolean };

function describeBefore(adapter: SystemAdapter, deadlineMs: number): Promise<Outcome> {
	const ac = new AbortController();
	let timer: NodeJS.Timeout | undefined;
	const late = new Promise<Outcome>((resolve) => {
		timer = setTimeout(() => {
			// adapters past their probe settle on abort; give them this turn
			ac.abort();
			setImmediate(() =>
				resolve({ status: adapter.unresponsive(`No response within ${deadlineMs} ms`), late: true }),
			);
		}, deadlineMs);
	});
	const described = adapter.describe(ac.signal).then(
		(status): Outcome => ({ status, late: false }),
		(e: unknown): Outcome => ({
			status: adapter.unresponsive(e instanceof Error ? e.message : String(e)),
			late: false,
		}),
	);
	return Promise.race([described, late]).finally(() => clearTimeout(timer));
}

/**
 * Runs every adapter at once; total latency is bounded by the deadline, not
 * the sum of probe timeouts. Never rejects, and the result keeps registry order.
 */
export async function aggregate(
	adapters: readonly SystemAdapter[],
	opts: AggregateOptions,
): Promise<SystemStatus[]> {
	return withSpan("systems.aggregate", { adapters: adapters.length, deadlineMs: opts.deadlineMs }, async (span) => {
		const started = Date.now();
		const outcomes = await Promise.all(adapters.map((a) => describeBefore(a, opts.deadlineMs)));
		const durationMs = Date.now() - started;
		const unresponsive = outcomes.filter((o) => o.late).map((o) => o.status.id);
		setSpanAttrs(span, { unresponsive: unresponsive.length });
		observeAggregate(durationMs, unresponsive.length);
		logSystemsAggregated({
			count: outcomes.length,
			durationMs,
			online: outcomes.filter((o) => o.status.state === "online").length,
			unresponsive,
		});
		return outcomes.map((o) => o.status);
	});
}
