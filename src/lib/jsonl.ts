import fs from "node:fs";
import type { z } from "zod";
import { childLogger } from "./logging/logger.js";

export type JsonLines<T> = { items: T[]; skipped: number };

async function readText(file: string): Promise<string | null> {
	try {
		return await fs.promises.readFile(file, "utf8");
	} catch (e) {
		if ((e as NodeJS.ErrnoException).code !== "ENOENT")
			childLogger({ file }).warn({ error: (e as Error).message }, "cannot read file");
		return null;
	}
}

/**
 * Parses newline-delimited JSON. Blank lines are ignored; a line that is not
 * JSON or fails the schema is counted in `skipped` and never aborts the read.
 * A missing file yields no items.
 */
export async function readJsonLines<S extends z.ZodTypeAny>(
	file: string,
	schema: S,
): Promise<JsonLines<z.output<S>>> {
	const out: JsonLines<z.output<S>> = { items: [], skipped: 0 };
	const text = await readText(file);
	if (text === null) return out;
	for (const line of text.split("\n")) {
		const s = line.trim();
		if (!s) continue;
		let raw: unknown;
		try {
			raw = JSON.parse(s);
		} catch {
			out.skipped++;
			continue;
		}
		const parsed = schema.safeParse(raw);
		if (parsed.success) out.items.push(parsed.data);
		else out.skipped++;
	}
	return out;
}

/** Non-blank line count, or null when the file cannot be read. */
export async function countLines(file: string): Promise<number | null> {
	const text = await readText(file);
	if (text === null) return null;
	let n = 0;
	for (const line of text.split("\n")) if (line.trim()) n++;
	return n;
}

/** Parsed JSON document, or null when missing or malformed. */
export async function readJsonFile(file: string): Promise<unknown> {
	const text = await readText(file);
	if (text === null) return null;
	try {
		return JSON.parse(text);
	} catch {
		childLogger({ file }).debug("malformed JSON document");
		return null;
	}
}
