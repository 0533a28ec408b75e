import { z } from "zod";
import type { Config } from "../config.js";
import { NetworkAdapter, endpointOf } from "./base.js";
import { type AdapterDeps, type HealthReport, type SystemStatus, makeStatus } from "./types.js";

const zHubHealth = z.object({
	model: z.string().optional(),
	status: z.string().optional(),
});
type HubHealth = z.infer<typeof zHubHealth>;

/** Task-dispatch hub. */
export class HubAdapter extends NetworkAdapter<HubHealth> {
	constructor(
		private readonly cfg: Config["hub"],
		deps: AdapterDeps,
		probeTimeoutMs: number,
		private readonly healthTimeoutMs: number,
	) {
		super(
			{ id: "hub", displayName: "Task Hub", icon: "🤖", tags: ["ai-agent", "dispatch", "docker"] },
			endpointOf(cfg.base_url),
			deps,
			probeTimeoutMs,
		);
	}

	protected async enrich(signal?: AbortSignal): Promise<HubHealth | null> {
		const res = await this.deps.fetchJson(new URL("/health", this.cfg.base_url).href, {
			timeoutMs: this.healthTimeoutMs,
			signal,
		});
		if (!res.ok) return null;
		const parsed = zHubHealth.safeParse(res.data);
		return parsed.success ? parsed.data : null;
	}

	protected render({ probe, enrichment }: HealthReport<HubHealth>): SystemStatus {
		const port = this.endpoint.port;
		if (!probe.reachable) return makeStatus(this.identity, { state: "offline", detail: "Hub not running", port });
		const detail = enrichment
			? `Model: ${enrichment.model ?? "?"} | ${enrichment.status ?? "?"}`
			: "Port open, health check failed";
		return makeStatus(this.identity, { state: "online", detail, port });
	}
}
