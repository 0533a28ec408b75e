import { z } from "zod";
import type { Config } from "../config.js";
import { NetworkAdapter, endpointOf } from "./base.js";
import { type AdapterDeps, type HealthReport, type SystemStatus, makeStatus } from "./types.js";

const zModelList = z.object({
	models: z.array(z.object({ name: z.string().default("?") }).passthrough()).default([]),
});

const SHOWN_MODELS = 4;

export class InferenceAdapter extends NetworkAdapter<string[]> {
	constructor(
		private readonly cfg: Config["inference"],
		deps: AdapterDeps,
		probeTimeoutMs: number,
		private readonly healthTimeoutMs: number,
	) {
		super(
			{ id: "inference", displayName: "Inference Server", icon: "🧠", tags: ["inference", "local", "gpu"] },
			endpointOf(cfg.base_url),
			deps,
			probeTimeoutMs,
		);
	}

	protected async enrich(signal?: AbortSignal): Promise<string[] | null> {
		const res = await this.deps.fetchJson(new URL("/api/tags", this.cfg.base_url).href, {
			timeoutMs: this.healthTimeoutMs,
			signal,
		});
		if (!res.ok) return null;
		const parsed = zModelList.safeParse(res.data);
		return parsed.success ? parsed.data.models.map((m) => m.name) : null;
	}

	protected render({ probe, enrichment }: HealthReport<string[]>): SystemStatus {
		const port = this.endpoint.port;
		if (!probe.reachable)
			return makeStatus(this.identity, {
				state: "offline",
				detail: "Not running, start the inference server",
				port,
			});
		let detail = "Local model inference";
		if (enrichment)
			detail = enrichment.length
				? `${enrichment.length} models: ${enrichment.slice(0, SHOWN_MODELS).join(", ")}`
				: "0 models installed";
		return makeStatus(this.identity, { state: "online", detail, port });
	}
}
