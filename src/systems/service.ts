import type { ServiceConfig } from "../config.js";
import { NetworkAdapter } from "./base.js";
import { type AdapterDeps, type HealthReport, type SystemStatus, makeStatus } from "./types.js";

/** A locally served app with no health endpoint: the open port is the whole signal. */
export class PortServiceAdapter extends NetworkAdapter<never> {
	constructor(
		private readonly cfg: ServiceConfig,
		deps: AdapterDeps,
		probeTimeoutMs: number,
	) {
		super(
			{ id: cfg.id, displayName: cfg.name, icon: cfg.icon, tags: cfg.tags },
			{ host: cfg.host, port: cfg.port },
			deps,
			probeTimeoutMs,
			cfg.dir,
		);
	}

	protected async enrich(): Promise<null> {
		return null;
	}

	protected render({ probe, installed }: HealthReport<never>): SystemStatus {
		if (probe.reachable)
			return makeStatus(this.identity, {
				state: "online",
				detail: `Live on :${this.cfg.port}`,
				port: this.cfg.port,
				url: `http://localhost:${this.cfg.port}`,
			});
		return makeStatus(this.identity, {
			state: installed ? "installed" : this.cfg.dir ? "missing" : "offline",
			detail: this.cfg.description,
		});
	}
}
