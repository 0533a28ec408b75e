import net from "node:net";
import { incProbe } from "./telemetry/metrics.js";

export type ProbeResult =
	| { reachable: true; latencyMs: number }
	| { reachable: false; error: string };

export type Prober = (
	host: string,
	port: number,
	timeoutMs: number,
) => Promise<ProbeResult>;

/**
 * Bounded TCP connect. Refusal, timeout and socket errors all resolve to
 * `{ reachable: false }`; the promise never rejects.
 */
export const probePort: Prober = (host, port, timeoutMs) => {
	const started = Date.now();
	return new Promise<ProbeResult>((resolve) => {
		let settled = false;
		const finish = (result: ProbeResult) => {
			if (settled) return;
			settled = true;
			clearTimeout(timer);
			sock.destroy();
			incProbe(result.reachable, { port });
			resolve(result);
		};
		const sock = new net.Socket();
		const timer = setTimeout(
			() => finish({ reachable: false, error: `timeout after ${timeoutMs} ms` }),
			timeoutMs,
		);
		sock.once("connect", () =>
			finish({ reachable: true, latencyMs: Date.now() - started }),
		);
		sock.once("error", (err) => finish({ reachable: false, error: err.message }));
		try {
			sock.connect({ host, port });
		} catch (e) {
			finish({ reachable: false, error: e instanceof Error ? e.message : String(e) });
		}
	});
};
