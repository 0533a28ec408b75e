import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { type Config, parseConfig } from "../../src/config.js";
import type { JsonFetcher, JsonResult } from "../../src/lib/http_json.js";
import type { ProbeResult, Prober } from "../../src/lib/probe.js";
import type { AdapterDeps } from "../../src/systems/types.js";

export function tmpDir(prefix = "deck-"): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeFile(file: string, content: string): string {
	fs.mkdirSync(path.dirname(file), { recursive: true });
	fs.writeFileSync(file, content);
	return file;
}

export function testConfig(input: Record<string, unknown> = {}): Readonly<Config> {
	return parseConfig(input);
}

export const UP: ProbeResult = { reachable: true, latencyMs: 1 };
export const DOWN: ProbeResult = { reachable: false, error: "connect ECONNREFUSED" };

/** Probe stub keyed by port; unknown ports are unreachable. */
export function probeByPort(open: readonly number[]): Prober {
	return async (_host, port) => (open.includes(port) ? UP : DOWN);
}

/** Fetch stub keyed by URL path; unknown paths fail as transport errors. */
export function fetchByPath(routes: Record<string, JsonResult>): JsonFetcher {
	return async (url) => {
		const p = new URL(url).pathname;
		return routes[p] ?? { ok: false, kind: "transport", message: "fetch failed" };
	};
}

export function deps(open: readonly number[] = [], routes: Record<string, JsonResult> = {}): AdapterDeps {
	return { probe: probeByPort(open), fetchJson: fetchByPath(routes) };
}

export const okJson = (data: unknown): JsonResult => ({ ok: true, status: 200, data });
