import { describe, expect, it } from "vitest";
import { EMPTY_LABELS, type LabelTable } from "../src/activity/labels.js";
import type { ProjectRecord } from "../src/activity/projects.js";
import { parseLastActive, projectIdentity, reconcileActivity } from "../src/activity/reconcile.js";
import type { SessionSummary } from "../src/activity/sessions.js";

const NOW = new Date("2024-03-10T12:00:00Z");
const hoursAgo = (h: number) => new Date(NOW.getTime() - h * 3_600_000).toISOString();

function summary(sessionId: string, project: string, lastTimestamp: string, extra: Partial<SessionSummary> = {}): SessionSummary {
	return {
		sessionId,
		projectIdentifier: project,
		firstMessage: `${sessionId} first`,
		messageCount: 1,
		firstTimestamp: lastTimestamp,
		lastTimestamp,
		...extra,
	};
}

function project(path: string | null, lastActive: string | null, extra: Partial<ProjectRecord> = {}): ProjectRecord {
	return { path, lastActive, description: `about ${path}`, status: null, pinned: false, ...extra };
}

const labels: LabelTable = {
	projects: [{ match: "deck", label: "Control Deck" }],
	messages: [{ keywords: ["security", "harden"], label: "Security Hardening" }],
};

describe("reconcile: identity and dates", () => {
	it("normalizes both separator styles", () => {
		expect(projectIdentity("C:\\Work\\Deck\\")).toBe("deck");
		expect(projectIdentity("/home/dev/My-App/")).toBe("my-app");
		expect(projectIdentity("")).toBe("");
		expect(projectIdentity(null)).toBe("");
	});

	it("reads a bare date as the end of that UTC day", () => {
		expect(parseLastActive("2024-01-01")?.toISOString()).toBe("2024-01-01T23:59:59.000Z");
	});

	it("treats an offset-less timestamp as UTC", () => {
		expect(parseLastActive("2024-01-01T08:30:00")?.toISOString()).toBe("2024-01-01T08:30:00.000Z");
		expect(parseLastActive("2024-01-01T08:30:00+02:00")?.toISOString()).toBe("2024-01-01T06:30:00.000Z");
	});

	it("rejects absent and unparseable values", () => {
		expect(parseLastActive(undefined)).toBeNull();
		expect(parseLastActive("")).toBeNull();
		expect(parseLastActive("soon")).toBeNull();
		expect(parseLastActive("last tuesday at noon")).toBeNull();
	});
});

describe("reconcile: activity feed", () => {
	it("applies the bare-date window boundary", () => {
		const projects = [project("/p/alpha", "2024-01-01")];
		const inside = reconcileActivity({
			summaries: [],
			projects,
			labels: EMPTY_LABELS,
			now: new Date("2024-01-02T00:00:00Z"),
			windowHours: 48,
		});
		const outside = reconcileActivity({
			summaries: [],
			projects,
			labels: EMPTY_LABELS,
			now: new Date("2024-01-05T00:00:00Z"),
			windowHours: 48,
		});
		expect(inside).toHaveLength(1);
		expect(outside).toHaveLength(0);
	});

	it("prefers session data over metadata for the same identity", () => {
		const out = reconcileActivity({
			summaries: [summary("s1", "/home/dev/deck", hoursAgo(10))],
			projects: [project("D:\\Projects\\Deck", hoursAgo(1)), project("/p/other", hoursAgo(2))],
			labels,
			now: NOW,
			windowHours: 48,
		});
		expect(out.map((r) => [r.identity, r.provenance])).toEqual([
			["other", "project-metadata"],
			["deck", "session-log"],
		]);
		expect(out[1]).toMatchObject({ label: "Control Deck", sessionId: "s1", messageCount: 1, sessionCount: 1 });
		expect(out[0]).toMatchObject({
			label: "Other",
			firstMessage: "about /p/other",
			messageCount: 0,
			sessionCount: 0,
			sessionId: null,
		});
	});

	it("merges several sessions of one project into its most recent", () => {
		const out = reconcileActivity({
			summaries: [
				summary("new", "/a/deck", hoursAgo(1), { messageCount: 3, firstMessage: "latest work" }),
				summary("old", "/b/Deck/", hoursAgo(5), { messageCount: 4 }),
			],
			projects: [],
			labels: EMPTY_LABELS,
			now: NOW,
			windowHours: 48,
		});
		expect(out).toEqual([
			{
				identity: "deck",
				label: "Deck",
				project: "/a/deck",
				firstMessage: "latest work",
				messageCount: 7,
				sessionCount: 2,
				lastTimestamp: hoursAgo(1),
				provenance: "session-log",
				sessionId: "new",
			},
		]);
	});

	it("drops sessions and projects outside the window or without a usable date", () => {
		const out = reconcileActivity({
			summaries: [summary("stale", "/p/stale", hoursAgo(48)), summary("fresh", "/p/fresh", hoursAgo(47))],
			projects: [project("/p/undated", null), project("/p/garbled", "not a date"), project(null, hoursAgo(1))],
			labels: EMPTY_LABELS,
			now: NOW,
			windowHours: 48,
		});
		expect(out.map((r) => r.identity)).toEqual(["fresh"]);
	});

	it("labels by message keyword, then by title-cased identity", () => {
		const out = reconcileActivity({
			summaries: [
				summary("a", "/p/web_site", hoursAgo(1), { firstMessage: "Harden the SSH config" }),
				summary("b", "/p/my-cool_tool", hoursAgo(2)),
				summary("c", "", hoursAgo(3)),
			],
			projects: [],
			labels,
			now: NOW,
			windowHours: 48,
		});
		expect(out.map((r) => r.label)).toEqual(["Security Hardening", "My Cool Tool", "Unknown"]);
		expect(out[2].identity).toBe("unknown");
	});

	it("is deterministic for identical input", () => {
		const input = {
			summaries: [summary("a", "/p/a", hoursAgo(3)), summary("b", "/p/b", hoursAgo(3))],
			projects: [project("/p/c", hoursAgo(3)), project("/p/a", hoursAgo(1))],
			labels,
			now: NOW,
			windowHours: 48,
		};
		const first = reconcileActivity(input);
		expect(reconcileActivity(input)).toEqual(first);
		expect(first.map((r) => r.identity)).toEqual(["a", "b", "c"]);
		expect(new Set(first.map((r) => r.identity)).size).toBe(first.length);
	});
});
