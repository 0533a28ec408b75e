import fs from "node:fs";
import { fileURLToPath } from "node:url";
import yaml from "js-yaml";
import { z } from "zod";
import { childLogger } from "../lib/logging/logger.js";

const zLabelTable = z.object({
	projects: z
		.array(z.object({ match: z.string().min(1), label: z.string().min(1) }))
		.default([]),
	messages: z
		.array(z.object({ keywords: z.array(z.string().min(1)).min(1), label: z.string().min(1) }))
		.default([]),
});

/** Ordered matchers; the first hit wins. Operator data, kept out of code. */
export type LabelTable = z.infer<typeof zLabelTable>;

export const EMPTY_LABELS: LabelTable = { projects: [], messages: [] };

// src/activity in a checkout, dist/src/activity once built
const BUNDLED = ["../../config/labels.yaml", "../../../config/labels.yaml"].map((rel) =>
	fileURLToPath(new URL(rel, import.meta.url)),
);

export function defaultLabelsFile(): string {
	return BUNDLED.find((f) => fs.existsSync(f)) ?? BUNDLED[0];
}

export async function loadLabelTable(file: string = defaultLabelsFile()): Promise<LabelTable> {
	const log = childLogger({ file });
	let text: string;
	try {
		text = await fs.promises.readFile(file, "utf8");
	} catch (e) {
		log.warn({ error: (e as Error).message }, "label table unreadable");
		return EMPTY_LABELS;
	}
	let doc: unknown;
	try {
		doc = yaml.load(text);
	} catch (e) {
		log.warn({ error: (e as Error).message }, "label table is not valid YAML");
		return EMPTY_LABELS;
	}
	const parsed = zLabelTable.safeParse(doc ?? {});
	if (!parsed.success) {
		log.warn({ issues: parsed.error.issues.length }, "label table has the wrong shape");
		return EMPTY_LABELS;
	}
	return parsed.data;
}

/** "my-cool_app" -> "My Cool App" */
export function titleCase(identity: string): string {
	return identity
		.replace(/[-_]/g, " ")
		.split(" ")
		.filter(Boolean)
		.map((w) => w[0].toUpperCase() + w.slice(1).toLowerCase())
		.join(" ");
}

export function resolveLabel(table: LabelTable, identity: string, firstMessage = ""): string {
	const id = identity.toLowerCase();
	for (const rule of table.projects) {
		if (id.includes(rule.match.toLowerCase())) return rule.label;
	}
	const msg = firstMessage.toLowerCase();
	for (const rule of table.messages) {
		if (rule.keywords.some((k) => msg.includes(k.toLowerCase()))) return rule.label;
	}
	return titleCase(identity) || "Unknown";
}
