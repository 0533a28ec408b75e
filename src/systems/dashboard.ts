import { type SystemAdapter, type SystemStatus, makeStatus } from "./types.js";

/** The dashboard reports itself; if this runs, it is online. */
export class DashboardAdapter implements SystemAdapter {
	readonly identity = {
		id: "control-deck",
		displayName: "Control Deck",
		icon: "🎛️",
		tags: ["dashboard", "always-on"],
	};

	/** `port` is read per call: the listener may be bound to an ephemeral port. */
	constructor(private readonly port: () => number) {}

	private status(): SystemStatus {
		return makeStatus(this.identity, {
			state: "online",
			detail: "This dashboard, aggregating all subordinate systems",
			port: this.port(),
			url: `http://localhost:${this.port()}`,
		});
	}

	async describe(): Promise<SystemStatus> {
		return this.status();
	}

	unresponsive(): SystemStatus {
		return this.status();
	}
}
