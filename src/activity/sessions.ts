import { z } from "zod";
import { readJsonLines } from "../lib/jsonl.js";

export const PREVIEW_CHARS = 200;

/** One session-log line. The log is append-only; we never write it. */
const zSessionLine = z.object({
	sessionId: z.string().default("unknown"),
	project: z.string().default("unknown"),
	display: z
		.string()
		.default("")
		.transform((s) => s.slice(0, PREVIEW_CHARS)),
	timestamp: z
		.number()
		.finite()
		.refine((ms) => Number.isFinite(new Date(ms).getTime()), "timestamp out of range"),
});

export type SessionEntry = {
	sessionId: string;
	projectIdentifier: string;
	firstMessagePreview: string;
	timestamp: Date;
};

export type SessionSummary = {
	sessionId: string;
	projectIdentifier: string;
	firstMessage: string;
	messageCount: number;
	firstTimestamp: string;
	lastTimestamp: string;
};

export async function loadSessionEntries(
	file: string,
): Promise<{ entries: SessionEntry[]; skipped: number }> {
	const { items, skipped } = await readJsonLines(file, zSessionLine);
	const entries = items.map((l) => ({
		sessionId: l.sessionId,
		projectIdentifier: l.project,
		firstMessagePreview: l.display,
		timestamp: new Date(l.timestamp),
	}));
	return { entries, skipped };
}

/**
 * Groups entries by session in log order. The first entry of a session names
 * its first message; timestamps are the min and max seen. Newest first.
 */
export function summarizeSessions(entries: readonly SessionEntry[]): SessionSummary[] {
	const groups = new Map<string, { head: SessionEntry; count: number; first: number; last: number }>();
	for (const e of entries) {
		const t = e.timestamp.getTime();
		const g = groups.get(e.sessionId);
		if (!g) {
			groups.set(e.sessionId, { head: e, count: 1, first: t, last: t });
			continue;
		}
		g.count++;
		g.first = Math.min(g.first, t);
		g.last = Math.max(g.last, t);
	}
	return [...groups.values()]
		.sort((a, b) => b.last - a.last)
		.map((g) => ({
			sessionId: g.head.sessionId,
			projectIdentifier: g.head.projectIdentifier,
			firstMessage: g.head.firstMessagePreview,
			messageCount: g.count,
			firstTimestamp: new Date(g.first).toISOString(),
			lastTimestamp: new Date(g.last).toISOString(),
		}));
}
