import { z } from "zod";
import { readJsonFile } from "../lib/jsonl.js";

const zToggle = z.object({ enabled: z.boolean().optional() }).passthrough();

const zGatewayFile = z
	.object({
		meta: z.object({ lastTouchedVersion: z.string().optional() }).passthrough().optional(),
		agents: z
			.object({
				defaults: z
					.object({
						model: z.object({ primary: z.string().optional() }).passthrough().optional(),
					})
					.passthrough()
					.optional(),
			})
			.passthrough()
			.optional(),
		plugins: z.object({ entries: z.record(zToggle).optional() }).passthrough().optional(),
		channels: z.record(zToggle).optional(),
	})
	.passthrough();

export type GatewaySettings = {
	version: string | null;
	model: string | null;
	plugins: string[];
	channels: string[];
};

function enabledKeys(rec: Record<string, { enabled?: boolean }> | undefined): string[] {
	return Object.entries(rec ?? {})
		.filter(([, v]) => v.enabled === true)
		.map(([k]) => k);
}

/** Reads the gateway's own JSON config; null when missing or not the expected shape. */
export async function readGatewaySettings(file: string): Promise<GatewaySettings | null> {
	const parsed = zGatewayFile.safeParse(await readJsonFile(file));
	if (!parsed.success) return null;
	const cfg = parsed.data;
	return {
		version: cfg.meta?.lastTouchedVersion ?? null,
		model: cfg.agents?.defaults?.model?.primary ?? null,
		plugins: enabledKeys(cfg.plugins?.entries),
		channels: enabledKeys(cfg.channels),
	};
}

/** "ollama/qwen2.5:14b" -> "qwen2.5:14b" */
export function shortModelName(model: string): string {
	const i = model.indexOf("/");
	return i >= 0 ? model.slice(i + 1) : model;
}
