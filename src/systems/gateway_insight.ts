import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import type { Config } from "../config.js";
import { readJsonFile } from "../lib/jsonl.js";
import { childLogger } from "../lib/logging/logger.js";
import type { Prober } from "../lib/probe.js";
import { readGatewaySettings } from "./gateway_config.js";

const HEALTH_PROBE_MS = 2000;
const MAX_ITEMS = 10;

export type GatewayHealth = {
	status: "online" | "offline";
	port: number;
	version: string | null;
	model: string | null;
	plugins: string[];
	channels: string[];
	workspace: string;
};

export async function gatewayHealth(cfg: Config["gateway"], probe: Prober): Promise<GatewayHealth> {
	const out: GatewayHealth = {
		status: "offline",
		port: cfg.port,
		version: null,
		model: null,
		plugins: [],
		channels: [],
		workspace: cfg.workspace,
	};
	const res = await probe(cfg.host, cfg.port, HEALTH_PROBE_MS);
	if (!res.reachable) return out;
	out.status = "online";
	const settings = await readGatewaySettings(cfg.config_file);
	if (settings) {
		out.version = settings.version;
		out.model = settings.model ?? "unknown";
		out.plugins = settings.plugins;
		out.channels = settings.channels;
	}
	return out;
}

const zSessionMeta = z
	.object({
		id: z.string().optional(),
		updatedAt: z.union([z.string(), z.number()]).nullable().optional(),
		messageCount: z.number().optional(),
	})
	.passthrough();
type SessionMeta = z.infer<typeof zSessionMeta>;

export type GatewaySessionRef = {
	id: string;
	updated: string | number | null;
	messages: number;
};

export type GatewayActivity = {
	sessions: GatewaySessionRef[];
	dailyNotes: string[];
	overnightTasks: string[];
	heartbeat: unknown;
};

function sessionRef(id: string, meta: SessionMeta): GatewaySessionRef {
	return { id, updated: meta.updatedAt ?? null, messages: meta.messageCount ?? 0 };
}

async function readSessions(file: string): Promise<GatewaySessionRef[]> {
	const data = await readJsonFile(file);
	const out: GatewaySessionRef[] = [];
	if (Array.isArray(data)) {
		for (const raw of data.slice(0, MAX_ITEMS)) {
			const parsed = zSessionMeta.safeParse(raw);
			if (parsed.success) out.push(sessionRef(parsed.data.id ?? "?", parsed.data));
		}
	} else if (data && typeof data === "object") {
		for (const [id, raw] of Object.entries(data).slice(0, MAX_ITEMS)) {
			const parsed = zSessionMeta.safeParse(raw);
			if (parsed.success) out.push(sessionRef(id, parsed.data));
		}
	}
	return out;
}

async function markdownLines(file: string, prefix: string): Promise<string[]> {
	let text: string;
	try {
		text = await fs.promises.readFile(file, "utf8");
	} catch (e) {
		if ((e as NodeJS.ErrnoException).code !== "ENOENT")
			childLogger({ file }).debug({ error: (e as Error).message }, "cannot read notes");
		return [];
	}
	return text
		.split(/\r?\n/)
		.map((l) => l.trim())
		.filter((l) => l.startsWith(prefix));
}

function localDay(d: Date): string {
	return `${d.getFullYear()}-${String(d.getMonth() + 1).padStart(2, "0")}-${String(d.getDate()).padStart(2, "0")}`;
}

/** Each source is optional; a missing or unreadable one leaves its field empty. */
export async function gatewayActivity(cfg: Config["gateway"], now: Date = new Date()): Promise<GatewayActivity> {
	const memory = path.join(cfg.workspace, "memory");
	const [sessions, notes, overnight, heartbeat] = await Promise.all([
		readSessions(path.join(cfg.sessions_dir, "sessions.json")),
		markdownLines(path.join(memory, `${localDay(now)}.md`), "- "),
		markdownLines(path.join(cfg.workspace, "OVERNIGHT.md"), "- ["),
		readJsonFile(path.join(memory, "heartbeat-state.json")),
	]);
	return {
		sessions,
		dailyNotes: notes.slice(-MAX_ITEMS),
		overnightTasks: overnight.slice(0, MAX_ITEMS),
		heartbeat,
	};
}
