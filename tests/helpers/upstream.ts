import http from "node:http";

export type Recorded = {
	method: string;
	url: string;
	headers: http.IncomingHttpHeaders;
	body: string;
};

export type Reply = {
	status?: number;
	/** Serialized as JSON unless `raw` is given. */
	body?: unknown;
	raw?: string;
	delayMs?: number;
};

export type Upstream = {
	baseUrl: string;
	port: number;
	calls: Recorded[];
	close: () => Promise<void>;
};

/** In-process stand-in for a subordinate REST API. Records every request. */
export async function startUpstream(reply: (r: Recorded) => Reply = () => ({ body: { ok: true } })): Promise<Upstream> {
	const calls: Recorded[] = [];
	const server = http.createServer((req, res) => {
		const chunks: Buffer[] = [];
		req.on("data", (c: Buffer) => chunks.push(c));
		req.on("end", () => {
			const rec: Recorded = {
				method: req.method ?? "GET",
				url: req.url ?? "/",
				headers: req.headers,
				body: Buffer.concat(chunks).toString("utf8"),
			};
			calls.push(rec);
			const r = reply(rec);
			const send = () => {
				res.writeHead(r.status ?? 200, { "content-type": "application/json" });
				res.end(r.raw ?? JSON.stringify(r.body ?? {}));
			};
			if (r.delayMs) setTimeout(send, r.delayMs);
			else send();
		});
	});
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	const addr = server.address();
	const port = addr && typeof addr === "object" ? addr.port : 0;
	return {
		baseUrl: `http://127.0.0.1:${port}`,
		port,
		calls,
		close: () =>
			new Promise<void>((resolve) => {
				server.closeAllConnections();
				server.close(() => resolve());
			}),
	};
}

/** A port that was just bound and released, so nothing listens on it. */
export async function closedPort(): Promise<number> {
	const server = http.createServer();
	await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
	const addr = server.address();
	const port = addr && typeof addr === "object" ? addr.port : 0;
	await new Promise<void>((resolve) => server.close(() => resolve()));
	return port;
}
