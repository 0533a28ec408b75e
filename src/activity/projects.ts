import { z } from "zod";
import { readJsonFile } from "../lib/jsonl.js";
import type { SessionSummary } from "./sessions.js";

const zOptText = z.string().nullish().catch(null);

const zProject = z
	.object({
		path: zOptText,
		last_active: zOptText,
		description: zOptText,
		status: zOptText,
		pinned: z.boolean().catch(false),
	})
	.passthrough();

export type ProjectRecord = {
	path: string | null;
	lastActive: string | null;
	description: string;
	status: string | null;
	pinned: boolean;
};

/**
 * Read-only view of the project registry (`{ projects: [...] }`). Mutation
 * belongs to whoever owns the file. Entries that are not objects are dropped.
 */
export async function loadProjectRegistry(file: string): Promise<ProjectRecord[]> {
	const doc = await readJsonFile(file);
	const list = z.object({ projects: z.array(z.unknown()) }).safeParse(doc);
	if (!list.success) return [];
	const out: ProjectRecord[] = [];
	for (const raw of list.data.projects) {
		const p = zProject.safeParse(raw);
		if (!p.success) continue;
		out.push({
			path: p.data.path ?? null,
			lastActive: p.data.last_active ?? null,
			description: p.data.description ?? "",
			status: p.data.status ?? null,
			pinned: p.data.pinned,
		});
	}
	return out;
}

export type ProjectStats = {
	totalProjects: number;
	activeProjects: number;
	pinnedProjects: number;
	totalSessions: number;
	totalMessages: number;
};

const ACTIVE = new Set(["active", "in_progress"]);

export function projectStats(
	projects: readonly ProjectRecord[],
	summaries: readonly SessionSummary[],
): ProjectStats {
	return {
		totalProjects: projects.length,
		activeProjects: projects.filter((p) => p.status !== null && ACTIVE.has(p.status)).length,
		pinnedProjects: projects.filter((p) => p.pinned).length,
		totalSessions: summaries.length,
		totalMessages: summaries.reduce((n, s) => n + s.messageCount, 0),
	};
}
