import type { Config } from "../config.js";
import { NetworkAdapter } from "./base.js";
import { type GatewaySettings, readGatewaySettings, shortModelName } from "./gateway_config.js";
import { type AdapterDeps, type HealthReport, type SystemStatus, makeStatus } from "./types.js";

export class GatewayAdapter extends NetworkAdapter<GatewaySettings> {
	constructor(
		private readonly cfg: Config["gateway"],
		deps: AdapterDeps,
		probeTimeoutMs: number,
	) {
		super(
			{ id: "gateway", displayName: "Agent Gateway", icon: "🦞", tags: ["ai-agent", "local", "chat"] },
			{ host: cfg.host, port: cfg.port },
			deps,
			probeTimeoutMs,
		);
	}

	protected enrich(): Promise<GatewaySettings | null> {
		return readGatewaySettings(this.cfg.config_file);
	}

	protected render({ probe, enrichment }: HealthReport<GatewaySettings>): SystemStatus {
		const url = `http://${this.cfg.host}:${this.cfg.port}/`;
		if (!probe.reachable)
			return makeStatus(this.identity, { state: "offline", detail: "Gateway not running", port: this.cfg.port, url });
		const detail = enrichment
			? `Model: ${shortModelName(enrichment.model ?? "unknown")} | ${enrichment.plugins.length} plugins`
			: "Gateway running, config unreadable";
		return makeStatus(this.identity, { state: "online", detail, port: this.cfg.port, url });
	}
}
