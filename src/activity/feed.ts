import type { Config } from "../config.js";
import { logActivityReconciled } from "../lib/logging/events.js";
import { setSpanAttrs, withSpan } from "../lib/telemetry/tracing.js";
import { loadLabelTable } from "./labels.js";
import { type ProjectStats, loadProjectRegistry, projectStats } from "./projects.js";
import { type ActivityRecord, reconcileActivity } from "./reconcile.js";
import { type SessionSummary, loadSessionEntries, summarizeSessions } from "./sessions.js";

type ActivityConfig = Config["activity"];

// Every call re-reads its sources; nothing is cached between requests.

export async function sessionSummaries(cfg: ActivityConfig): Promise<SessionSummary[]> {
	const { entries } = await loadSessionEntries(cfg.history_file);
	return summarizeSessions(entries);
}

export async function activeSessions(cfg: ActivityConfig, now: Date = new Date()): Promise<ActivityRecord[]> {
	return withSpan("activity.reconcile", { windowHours: cfg.window_hours }, async (span) => {
		const [{ entries, skipped }, projects, labels] = await Promise.all([
			loadSessionEntries(cfg.history_file),
			loadProjectRegistry(cfg.projects_file),
			loadLabelTable(cfg.labels_file),
		]);
		const records = reconcileActivity({
			summaries: summarizeSessions(entries),
			projects,
			labels,
			now,
			windowHours: cfg.window_hours,
		});
		const fromSessions = records.filter((r) => r.provenance === "session-log").length;
		setSpanAttrs(span, { records: records.length });
		logActivityReconciled({
			sessions: records.length,
			fromSessions,
			fromMetadata: records.length - fromSessions,
			skippedLines: skipped,
		});
		return records;
	});
}

export async function activityStats(cfg: ActivityConfig): Promise<ProjectStats> {
	const [projects, summaries] = await Promise.all([
		loadProjectRegistry(cfg.projects_file),
		sessionSummaries(cfg),
	]);
	return projectStats(projects, summaries);
}
