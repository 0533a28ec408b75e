import fs from "node:fs";
import path from "node:path";
import type { PresenceConfig } from "../config.js";
import { countLines } from "../lib/jsonl.js";
import { childLogger } from "../lib/logging/logger.js";
import { isDirectory } from "../lib/paths.js";
import { type SystemAdapter, type SystemIdentity, type SystemStatus, makeStatus } from "./types.js";

async function countFiles(dir: string, extension: string): Promise<number | null> {
	try {
		const ents = await fs.promises.readdir(dir, { withFileTypes: true });
		return ents.filter((e) => e.isFile() && e.name.endsWith(extension)).length;
	} catch {
		return null;
	}
}

/**
 * Installed-but-not-networked system: present when its directory exists,
 * detail from a counted artifact (journal lines, memory files).
 */
export class PresenceAdapter implements SystemAdapter {
	readonly identity: SystemIdentity;

	constructor(private readonly cfg: PresenceConfig) {
		this.identity = { id: cfg.id, displayName: cfg.name, icon: cfg.icon, tags: cfg.tags };
	}

	private async artifactCount(): Promise<number | null> {
		const artifact = this.cfg.artifact;
		if (!artifact) return null;
		const target = path.resolve(this.cfg.dir, artifact.path);
		try {
			return artifact.kind === "lines"
				? await countLines(target)
				: await countFiles(target, artifact.extension);
		} catch (e) {
			childLogger({ system: this.cfg.id }).debug({ error: String(e) }, "artifact count failed");
			return null;
		}
	}

	async describe(): Promise<SystemStatus> {
		if (!(await isDirectory(this.cfg.dir)))
			return makeStatus(this.identity, { state: "missing", detail: `Not installed at ${this.cfg.dir}` });
		const n = await this.artifactCount();
		const detail =
			n === null || !this.cfg.artifact
				? this.cfg.description
				: this.cfg.artifact.detail.replaceAll("{count}", String(n));
		return makeStatus(this.identity, { state: "installed", detail });
	}

	unresponsive(reason: string): SystemStatus {
		return makeStatus(this.identity, { state: "missing", detail: reason });
	}
}
