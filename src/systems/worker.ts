import { z } from "zod";
import type { Config } from "../config.js";
import { NetworkAdapter, endpointOf } from "./base.js";
import { type AdapterDeps, type HealthReport, type SystemStatus, makeStatus } from "./types.js";

const count = z.number().int().nonnegative().catch(0);

const zWorkerHealth = z.object({
	status: z.string().optional(),
	mode: z.string().catch("?"),
	active_tasks: count,
	completed_today: count,
	failed_today: count,
});
type WorkerHealth = z.infer<typeof zWorkerHealth>;

const KILL_STATUS = "killed";

/** Autonomous background worker. */
export class WorkerAdapter extends NetworkAdapter<WorkerHealth> {
	constructor(
		private readonly cfg: Config["worker"],
		deps: AdapterDeps,
		probeTimeoutMs: number,
		private readonly healthTimeoutMs: number,
	) {
		super(
			{ id: "worker", displayName: "Background Worker", icon: "⚙️", tags: ["background-worker", "autonomous"] },
			endpointOf(cfg.base_url),
			deps,
			probeTimeoutMs,
			cfg.install_dir,
		);
	}

	protected async enrich(signal?: AbortSignal): Promise<WorkerHealth | null> {
		const res = await this.deps.fetchJson(new URL("/health", this.cfg.base_url).href, {
			timeoutMs: this.healthTimeoutMs,
			signal,
		});
		if (!res.ok) return null;
		const parsed = zWorkerHealth.safeParse(res.data);
		return parsed.success ? parsed.data : null;
	}

	protected render({ probe, enrichment, installed }: HealthReport<WorkerHealth>): SystemStatus {
		if (!probe.reachable)
			return makeStatus(this.identity, {
				state: installed ? "installed" : "missing",
				detail: "Background worker (not running)",
			});
		const port = this.endpoint.port;
		const url = this.cfg.base_url.replace(/\/$/, "");
		if (!enrichment)
			return makeStatus(this.identity, { state: "online", detail: "Port open, health check failed", port, url });
		const h = enrichment;
		const detail =
			h.status === KILL_STATUS
				? `KILLED | ${h.active_tasks} tasks paused`
				: `Mode: ${h.mode} | ${h.active_tasks} active, ${h.completed_today} done, ${h.failed_today} failed today`;
		return makeStatus(this.identity, { state: "online", detail, port, url });
	}
}
