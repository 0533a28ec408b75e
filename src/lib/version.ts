import fs from "node:fs";
import path from "node:path";

export const SERVICE_NAME = "control-deck";

let version: string | null = null;

// Get version from package.json safely
export function getVersion(): string {
	if (version) return version;
	version = "0.0.0";
	try {
		const pkgPath = path.join(process.cwd(), "package.json");
		const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf-8"));
		if (pkg && typeof pkg === "object" && "version" in pkg && typeof pkg.version === "string")
			version = pkg.version;
	} catch {
		// not started from the package root
	}
	return version;
}
