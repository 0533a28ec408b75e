import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import * as toml from "toml";
import { z } from "zod";
import { defaultDataDir, expandTilde } from "./lib/paths.js";

export class ConfigError extends Error {
	readonly code = "config_invalid";
	constructor(
		message: string,
		readonly issues: string[] = [],
	) {
		super(message);
		this.name = "ConfigError";
	}
}

const zTimeouts = (short: number, medium: number, long: number) =>
	z
		.object({
			short_ms: z.number().int().positive().default(short),
			medium_ms: z.number().int().positive().default(medium),
			long_ms: z.number().int().positive().default(long),
		})
		.default({ short_ms: short, medium_ms: medium, long_ms: long });

const zPresence = z.object({
	id: z.string().min(1),
	name: z.string().min(1),
	icon: z.string().default("📦"),
	dir: z.string().min(1),
	description: z.string().min(1),
	artifact: z
		.object({
			kind: z.enum(["lines", "files"]),
			path: z.string().min(1),
			extension: z.string().default(".md"),
			detail: z.string().default("{count} entries"),
		})
		.optional(),
	tags: z.array(z.string()).default([]),
});

const zService = z.object({
	id: z.string().min(1),
	name: z.string().min(1),
	icon: z.string().default("🔌"),
	host: z.string().default("127.0.0.1"),
	port: z.number().int().min(1).max(65535),
	dir: z.string().optional(),
	description: z.string().min(1),
	tags: z.array(z.string()).default([]),
});

export const zConfig = z.object({
	server: z
		.object({
			host: z.string().default("127.0.0.1"),
			port: z.number().int().min(0).max(65535).default(8090),
			token: z.string().optional(),
			allowed_origins: z.array(z.string()).default([]),
			rate_limit_rps: z.number().positive().default(20),
			max_body_bytes: z.number().int().positive().default(1_000_000),
		})
		.default({}),
	probe: z
		.object({
			timeout_ms: z.number().int().positive().default(1000),
			deadline_ms: z.number().int().positive().default(2500),
			health_timeout_ms: z.number().int().positive().default(3000),
		})
		.default({}),
	gateway: z
		.object({
			host: z.string().default("127.0.0.1"),
			port: z.number().int().min(1).max(65535).default(18800),
			config_file: z.string().default("~/.gateway/gateway.json"),
			workspace: z.string().default("~/.gateway/workspace"),
			sessions_dir: z.string().default("~/.gateway/agents/main/sessions"),
			token: z.string().optional(),
			chat_model: z.string().default("qwen2.5:14b-instruct"),
			timeouts: zTimeouts(3000, 10000, 120000),
		})
		.default({}),
	hub: z
		.object({
			base_url: z.string().url().default("http://127.0.0.1:8002"),
			token: z.string().optional(),
			timeouts: zTimeouts(3000, 10000, 300000),
		})
		.default({}),
	inference: z
		.object({
			base_url: z.string().url().default("http://127.0.0.1:11434"),
		})
		.default({}),
	worker: z
		.object({
			base_url: z.string().url().default("http://127.0.0.1:8095"),
			install_dir: z.string().default("~/projects/worker"),
			token: z.string().optional(),
			timeouts: zTimeouts(3000, 10000, 30000),
		})
		.default({}),
	presence: z.array(zPresence).default([]),
	services: z.array(zService).default([]),
	activity: z
		.object({
			history_file: z.string().default("~/projects/.sessions/history.jsonl"),
			projects_file: z.string().default("~/projects/PROJECTS.json"),
			projects_root: z.string().default("~/projects"),
			window_hours: z.number().positive().default(48),
			labels_file: z.string().optional(),
		})
		.default({}),
	telemetry: z
		.object({
			env: z.string().default("local"),
			logs: z
				.object({
					level: z
						.enum(["trace", "debug", "info", "warn", "error", "silent"])
						.default("info"),
					dir: z.string().default(path.join(defaultDataDir(), "logs")),
				})
				.default({}),
			redact: z
				.object({
					paths: z.array(z.string()).default([]),
					censor: z.string().default("[REDACTED]"),
				})
				.default({}),
		})
		.default({}),
});

export type Config = z.infer<typeof zConfig>;
export type PresenceConfig = z.infer<typeof zPresence>;
export type ServiceConfig = z.infer<typeof zService>;
export type TimeoutBudgets = Config["hub"]["timeouts"];

export function defaultConfigPath(): string {
	return (
		process.env.CONTROL_DECK_CONFIG ??
		path.join(os.homedir(), ".config", "control-deck", "config.toml")
	);
}

function readToml(cfgPath: string): unknown {
	let raw: string;
	try {
		raw = fs.readFileSync(cfgPath, "utf8");
	} catch (e) {
		if ((e as NodeJS.ErrnoException).code === "ENOENT") return {};
		throw new ConfigError(
			`cannot read config ${cfgPath}: ${(e as Error).message}`,
		);
	}
	try {
		return toml.parse(raw);
	} catch (e) {
		throw new ConfigError(
			`cannot parse config ${cfgPath}: ${(e as Error).message}`,
		);
	}
}

function applyEnv(cfg: Config): Config {
	const port = process.env.CONTROL_DECK_PORT;
	if (port && /^\d+$/.test(port)) cfg.server.port = Number(port);
	if (process.env.CONTROL_DECK_TOKEN) cfg.server.token = process.env.CONTROL_DECK_TOKEN;
	if (process.env.GATEWAY_TOKEN) cfg.gateway.token = process.env.GATEWAY_TOKEN;
	return cfg;
}

function expandPaths(cfg: Config): Config {
	cfg.gateway.config_file = expandTilde(cfg.gateway.config_file);
	cfg.gateway.workspace = expandTilde(cfg.gateway.workspace);
	cfg.gateway.sessions_dir = expandTilde(cfg.gateway.sessions_dir);
	cfg.worker.install_dir = expandTilde(cfg.worker.install_dir);
	cfg.activity.history_file = expandTilde(cfg.activity.history_file);
	cfg.activity.projects_file = expandTilde(cfg.activity.projects_file);
	cfg.activity.projects_root = expandTilde(cfg.activity.projects_root);
	if (cfg.activity.labels_file)
		cfg.activity.labels_file = expandTilde(cfg.activity.labels_file);
	cfg.telemetry.logs.dir = expandTilde(cfg.telemetry.logs.dir);
	for (const p of cfg.presence) {
		p.dir = expandTilde(p.dir);
	}
	for (const s of cfg.services) {
		if (s.dir) s.dir = expandTilde(s.dir);
	}
	return cfg;
}

function deepFreeze<T>(value: T): Readonly<T> {
	if (value && typeof value === "object") {
		for (const v of Object.values(value)) deepFreeze(v);
		Object.freeze(value);
	}
	return value;
}

/** Parses an already-decoded config object. Used by tests and `loadConfig`. */
export function parseConfig(input: unknown): Readonly<Config> {
	const parsed = zConfig.safeParse(input ?? {});
	if (!parsed.success) {
		const issues = parsed.error.issues.map(
			(i) => `${i.path.join(".") || "<root>"}: ${i.message}`,
		);
		throw new ConfigError("invalid configuration", issues);
	}
	return deepFreeze(expandPaths(applyEnv(parsed.data)));
}

export function loadConfig(cfgPath = defaultConfigPath()): Readonly<Config> {
	return parseConfig(readToml(cfgPath));
}

let cached: Readonly<Config> | null = null;

/**
 * Process-wide configuration, read once. Business logic receives the value
 * explicitly; only entry points and the logger reach for this.
 */
export function getConfig(): Readonly<Config> {
	if (!cached) cached = loadConfig();
	return cached;
}

export function __setTestConfig(cfg: Readonly<Config> | null): void {
	cached = cfg;
}
