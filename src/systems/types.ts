import type { JsonFetcher } from "../lib/http_json.js";
import type { ProbeResult, Prober } from "../lib/probe.js";

export const SYSTEM_STATES = ["online", "offline", "installed", "missing"] as const;
export type SystemState = (typeof SYSTEM_STATES)[number];

export type SystemStatus = {
	id: string;
	displayName: string;
	icon: string;
	state: SystemState;
	port: number | null;
	url: string | null;
	detail: string;
	tags: string[];
};

/** Raw signal plus best-effort enrichment; stays inside its adapter. */
export type HealthReport<T> = {
	probe: ProbeResult;
	enrichment: T | null;
	/** Install directory presence, checked only when the probe failed. */
	installed: boolean | null;
};

export type SystemIdentity = {
	id: string;
	displayName: string;
	icon: string;
	tags: readonly string[];
};

/** What adapters reach the outside world through. Swapped out in tests. */
export type AdapterDeps = {
	probe: Prober;
	fetchJson: JsonFetcher;
};

export interface SystemAdapter {
	readonly identity: SystemIdentity;
	describe(signal?: AbortSignal): Promise<SystemStatus>;
	/** Status reported when `describe` does not finish before the deadline. */
	unresponsive(reason: string): SystemStatus;
}

export function makeStatus(
	identity: SystemIdentity,
	fields: {
		state: SystemState;
		detail: string;
		port?: number | null;
		url?: string | null;
	},
): SystemStatus {
	return {
		id: identity.id,
		displayName: identity.displayName,
		icon: identity.icon,
		state: fields.state,
		port: fields.port ?? null,
		url: fields.url ?? null,
		detail: fields.detail.trim() || `${identity.displayName}: no detail available`,
		tags: [...new Set(identity.tags)],
	};
}
