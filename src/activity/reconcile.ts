import { lastSegment } from "../lib/paths.js";
import { type LabelTable, resolveLabel } from "./labels.js";
import type { ProjectRecord } from "./projects.js";
import type { SessionSummary } from "./sessions.js";

export const PROVENANCES = ["session-log", "project-metadata"] as const;
export type Provenance = (typeof PROVENANCES)[number];

export type ActivityRecord = {
	identity: string;
	label: string;
	project: string;
	firstMessage: string;
	messageCount: number;
	sessionCount: number;
	lastTimestamp: string;
	provenance: Provenance;
	sessionId: string | null;
};

export type ReconcileInput = {
	summaries: readonly SessionSummary[];
	projects: readonly ProjectRecord[];
	labels: LabelTable;
	now: Date;
	windowHours: number;
};

/** Last path segment, lower-cased. Accepts both separator styles. */
export function projectIdentity(p: string | null | undefined): string {
	return p ? lastSegment(p).toLowerCase() : "";
}

const BARE_DATE = /^\d{4}-\d{2}-\d{2}$/;
const HAS_OFFSET = /(?:Z|[+-]\d{2}:?\d{2})$/i;

/**
 * `YYYY-MM-DD` means the end of that day in UTC; a full timestamp without an
 * offset is UTC. Null when absent or unparseable.
 */
export function parseLastActive(value: string | null | undefined): Date | null {
	const v = value?.trim();
	if (!v) return null;
	let iso: string;
	if (v.length <= 10) {
		if (!BARE_DATE.test(v)) return null;
		iso = `${v}T23:59:59Z`;
	} else {
		iso = v.replace(" ", "T");
		if (!HAS_OFFSET.test(iso)) iso += "Z";
	}
	const d = new Date(iso);
	return Number.isNaN(d.getTime()) ? null : d;
}

/**
 * Merges recent sessions with recently active registry projects into one
 * feed, at most one record per identity. Session data always wins over
 * metadata for the same identity. Pure: same input, same output.
 */
export function reconcileActivity(input: ReconcileInput): ActivityRecord[] {
	const nowMs = input.now.getTime();
	const windowMs = input.windowHours * 3_600_000;
	const inWindow = (t: number) => nowMs - t < windowMs;

	const bySession = new Map<string, { record: ActivityRecord; lastMs: number }>();
	for (const s of input.summaries) {
		const lastMs = Date.parse(s.lastTimestamp);
		if (Number.isNaN(lastMs) || !inWindow(lastMs)) continue;
		const identity = projectIdentity(s.projectIdentifier) || "unknown";
		const cur = bySession.get(identity);
		if (!cur) {
			bySession.set(identity, {
				lastMs,
				record: {
					identity,
					label: "",
					project: s.projectIdentifier,
					firstMessage: s.firstMessage,
					messageCount: s.messageCount,
					sessionCount: 1,
					lastTimestamp: s.lastTimestamp,
					provenance: "session-log",
					sessionId: s.sessionId,
				},
			});
			continue;
		}
		const r = cur.record;
		r.messageCount += s.messageCount;
		r.sessionCount += 1;
		if (lastMs > cur.lastMs) {
			cur.lastMs = lastMs;
			r.project = s.projectIdentifier;
			r.firstMessage = s.firstMessage;
			r.lastTimestamp = s.lastTimestamp;
			r.sessionId = s.sessionId;
		}
	}

	const out: { record: ActivityRecord; lastMs: number }[] = [];
	for (const entry of bySession.values()) {
		entry.record.label = resolveLabel(input.labels, entry.record.identity, entry.record.firstMessage);
		out.push(entry);
	}

	const seen = new Set(bySession.keys());
	for (const p of input.projects) {
		const identity = projectIdentity(p.path);
		if (!identity || seen.has(identity)) continue;
		const last = parseLastActive(p.lastActive);
		if (!last || !inWindow(last.getTime())) continue;
		seen.add(identity);
		out.push({
			lastMs: last.getTime(),
			record: {
				identity,
				label: resolveLabel(input.labels, identity),
				project: p.path ?? "",
				firstMessage: p.description,
				messageCount: 0,
				sessionCount: 0,
				lastTimestamp: last.toISOString(),
				provenance: "project-metadata",
				sessionId: null,
			},
		});
	}

	return out.sort((a, b) => b.lastMs - a.lastMs).map((e) => e.record);
}
