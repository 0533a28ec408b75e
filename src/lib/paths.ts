import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export function expandTilde(p: string): string {
	if (p === "~") return os.homedir();
	if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
	return p;
}

/** Final path segment of a Windows or POSIX path, without trailing separators. */
export function lastSegment(p: string): string {
	const parts = p.replace(/\\/g, "/").replace(/\/+$/, "").split("/");
	return parts[parts.length - 1] ?? "";
}

export async function isDirectory(p: string): Promise<boolean> {
	try {
		return (await fs.promises.stat(p)).isDirectory();
	} catch {
		return false;
	}
}

export function defaultDataDir(): string {
	if (process.platform === "darwin")
		return path.join(
			os.homedir(),
			"Library",
			"Application Support",
			"control-deck",
		);
	if (process.platform === "win32")
		return path.join(
			process.env.LOCALAPPDATA ?? path.join(os.homedir(), "AppData", "Local"),
			"control-deck",
		);
	const xdg =
		process.env.XDG_DATA_HOME ?? path.join(os.homedir(), ".local", "share");
	return path.join(xdg, "control-deck");
}
