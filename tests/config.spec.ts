import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { ConfigError, loadConfig, parseConfig } from "../src/config.js";
import { tmpDir, writeFile } from "./helpers/fixtures.js";

describe("config", () => {
	afterEach(() => {
		delete process.env.CONTROL_DECK_PORT;
		delete process.env.GATEWAY_TOKEN;
	});

	it("fills every section with defaults", () => {
		const cfg = parseConfig({});
		expect(cfg.server).toMatchObject({ host: "127.0.0.1", port: 8090, rate_limit_rps: 20, max_body_bytes: 1_000_000 });
		expect(cfg.probe).toEqual({ timeout_ms: 1000, deadline_ms: 2500, health_timeout_ms: 3000 });
		expect(cfg.hub.timeouts).toEqual({ short_ms: 3000, medium_ms: 10000, long_ms: 300000 });
		expect(cfg.worker.timeouts.long_ms).toBe(30000);
		expect(cfg.gateway.timeouts.long_ms).toBe(120000);
		expect(cfg.activity.window_hours).toBe(48);
		expect(cfg.presence).toEqual([]);
	});

	it("expands ~ in paths", () => {
		const cfg = parseConfig({ activity: { history_file: "~/logs/h.jsonl" } });
		expect(cfg.activity.history_file).toBe(path.join(os.homedir(), "logs", "h.jsonl"));
	});

	it("is frozen", () => {
		const cfg = parseConfig({});
		expect(Object.isFrozen(cfg)).toBe(true);
		expect(Object.isFrozen(cfg.server)).toBe(true);
	});

	it("applies environment overrides", () => {
		process.env.CONTROL_DECK_PORT = "9191";
		process.env.GATEWAY_TOKEN = "test-secret";
		const cfg = parseConfig({});
		expect(cfg.server.port).toBe(9191);
		expect(cfg.gateway.token).toBe("test-secret");
	});

	it("raises ConfigError with the offending keys", () => {
		try {
			parseConfig({ server: { port: "eighty" }, hub: { base_url: "not a url" } });
			expect.unreachable();
		} catch (e) {
			expect(e).toBeInstanceOf(ConfigError);
			if (!(e instanceof ConfigError)) return;
			expect(e.code).toBe("config_invalid");
			expect(e.issues.map((i) => i.split(":")[0])).toEqual(["server.port", "hub.base_url"]);
		}
	});

	it("loads TOML from disk and treats a missing file as empty", () => {
		const dir = tmpDir();
		const file = writeFile(
			path.join(dir, "config.toml"),
			['[server]', 'port = 9000', '', '[[services]]', 'id = "web"', 'name = "Web"', 'port = 3000', 'description = "web app"', ''].join("\n"),
		);
		const cfg = loadConfig(file);
		expect(cfg.server.port).toBe(9000);
		expect(cfg.services).toEqual([
			{ id: "web", name: "Web", icon: "🔌", host: "127.0.0.1", port: 3000, description: "web app", tags: [] },
		]);
		expect(loadConfig(path.join(dir, "absent.toml")).server.port).toBe(8090);
	});

	it("reports unparseable TOML", () => {
		const file = writeFile(path.join(tmpDir(), "bad.toml"), "[server\nport = ");
		expect(() => loadConfig(file)).toThrow(/cannot parse config/);
	});
});
