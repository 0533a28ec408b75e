import fs from "node:fs";
import { childLogger } from "../lib/logging/logger.js";

export type DiskUsage = {
	total_gb: number;
	used_gb: number;
	free_gb: number;
	percent_used: number;
};

const GB = 1024 ** 3;
const round1 = (n: number) => Math.round(n * 10) / 10;

/** Usage of the filesystem holding `root`; null when it cannot be queried. */
export async function getDiskUsage(root: string): Promise<DiskUsage | null> {
	try {
		const st = await fs.promises.statfs(root);
		const total = st.blocks * st.bsize;
		if (total <= 0) return null;
		const used = (st.blocks - st.bfree) * st.bsize;
		const free = st.bavail * st.bsize;
		return {
			total_gb: round1(total / GB),
			used_gb: round1(used / GB),
			free_gb: round1(free / GB),
			percent_used: round1((used / total) * 100),
		};
	} catch (e) {
		childLogger({ root }).debug({ error: (e as Error).message }, "statfs failed");
		return null;
	}
}
