import { childLogger } from "../lib/logging/logger.js";
import { isDirectory } from "../lib/paths.js";
import type { ProbeResult } from "../lib/probe.js";
import {
	type AdapterDeps,
	type HealthReport,
	type SystemAdapter,
	type SystemIdentity,
	type SystemStatus,
	makeStatus,
} from "./types.js";

export type Endpoint = { host: string; port: number };

export function endpointOf(baseUrl: string): Endpoint {
	const u = new URL(baseUrl);
	const port = Number(u.port || (u.protocol === "https:" ? 443 : 80));
	return { host: u.hostname, port };
}

/** Resolves null as soon as `signal` aborts; `work` is left to settle on its own. */
function untilAborted<T>(work: Promise<T | null>, signal?: AbortSignal): Promise<T | null> {
	if (!signal) return work;
	if (signal.aborted) return Promise.resolve(null);
	return new Promise((resolve, reject) => {
		const onAbort = () => resolve(null);
		signal.addEventListener("abort", onAbort, { once: true });
		work.then(resolve, reject).finally(() => signal.removeEventListener("abort", onAbort));
	});
}

/**
 * Probe first, enrich second. The probe decides `state`; `enrich` only feeds
 * `render`, and a throwing, empty or aborted enrichment leaves the state
 * untouched. An abort during enrichment renders the probe result alone.
 */
export abstract class NetworkAdapter<T> implements SystemAdapter {
	constructor(
		readonly identity: SystemIdentity,
		protected readonly endpoint: Endpoint,
		protected readonly deps: AdapterDeps,
		protected readonly probeTimeoutMs: number,
		protected readonly installDir?: string,
	) {}

	protected abstract enrich(signal?: AbortSignal): Promise<T | null>;
	protected abstract render(report: HealthReport<T>): SystemStatus;

	async describe(signal?: AbortSignal): Promise<SystemStatus> {
		const probe: ProbeResult = await this.deps.probe(
			this.endpoint.host,
			this.endpoint.port,
			this.probeTimeoutMs,
		);
		let enrichment: T | null = null;
		if (probe.reachable) {
			try {
				enrichment = await untilAborted(this.enrich(signal), signal);
			} catch (e) {
				childLogger({ system: this.identity.id }).debug(
					{ error: e instanceof Error ? e.message : String(e) },
					"enrichment failed",
				);
			}
		}
		const installed =
			!probe.reachable && this.installDir ? await isDirectory(this.installDir) : null;
		return this.render({ probe, enrichment, installed });
	}

	unresponsive(reason: string): SystemStatus {
		return makeStatus(this.identity, { state: "offline", detail: reason, port: this.endpoint.port });
	}
}
