#!/usr/bin/env node
import { ConfigError, getConfig } from "./config.js";
import { defaultDeps, startDeckServer } from "./http/server.js";
import { logServiceStart } from "./lib/logging/events.js";
import { logger } from "./lib/logging/logger.js";
import { getVersion } from "./lib/version.js";
import { buildRegistry } from "./systems/registry.js";

async function main() {
	const cfg = getConfig();
	const running = await startDeckServer(cfg);
	logServiceStart({
		version: getVersion(),
		host: cfg.server.host,
		port: running.port,
		env: cfg.telemetry.env,
		systems: buildRegistry(cfg, defaultDeps).length,
		authRequired: Boolean(cfg.server.token),
	});

	let stopping = false;
	for (const sig of ["SIGINT", "SIGTERM"] as const) {
		process.on(sig, () => {
			if (stopping) return;
			stopping = true;
			logger().info({ signal: sig }, "shutting down");
			running
				.close()
				.catch((e: unknown) => logger().warn({ error: String(e) }, "close failed"))
				.finally(() => process.exit(0));
		});
	}
}

main().catch((err: unknown) => {
	if (err instanceof ConfigError) {
		process.stderr.write(`[control-deck] ${err.message}\n${err.issues.map((i) => `  ${i}`).join("\n")}\n`);
		process.exit(2);
	}
	process.stderr.write(`[control-deck] fatal ${err instanceof Error ? (err.stack ?? err.message) : String(err)}\n`);
	process.exit(1);
});
