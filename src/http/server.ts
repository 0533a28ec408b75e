import http, { type IncomingMessage, type ServerResponse } from "node:http";
import { activeSessions, activityStats, sessionSummaries } from "../activity/feed.js";
import { forward } from "../bridge/forward.js";
import { type ProxyTarget, resolveBridgeCall } from "../bridge/rules.js";
import { buildBridgeTargets } from "../bridge/targets.js";
import type { Config } from "../config.js";
import { type JsonFetcher, fetchJson } from "../lib/http_json.js";
import { logRequestFailed } from "../lib/logging/events.js";
import { childLogger } from "../lib/logging/logger.js";
import { type Prober, probePort } from "../lib/probe.js";
import { RateLimiter } from "../lib/ratelimit.js";
import { SERVICE_NAME, getVersion } from "../lib/version.js";
import { getDiskUsage } from "../resources/disk_usage.js";
import { gatewayActivity, gatewayHealth } from "../systems/gateway_insight.js";
import { aggregate, buildRegistry } from "../systems/registry.js";
import { type Handler, type RouteResult, Router, ok } from "./router.js";

export class RequestError extends Error {
	constructor(
		readonly status: number,
		readonly code: string,
	) {
		super(code);
		this.name = "RequestError";
	}
}

export type ServerDeps = {
	probe: Prober;
	fetchJson: JsonFetcher;
	now: () => Date;
};

export const defaultDeps: ServerDeps = { probe: probePort, fetchJson, now: () => new Date() };

function readBody(req: IncomingMessage, maxBytes: number): Promise<string> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		let size = 0;
		let tooBig = false;
		req.on("data", (chunk: Buffer) => {
			size += chunk.length;
			if (size > maxBytes) tooBig = true;
			if (!tooBig) chunks.push(chunk);
		});
		req.on("end", () => {
			if (tooBig) reject(new RequestError(413, "payload_too_large"));
			else resolve(Buffer.concat(chunks).toString("utf8"));
		});
		req.on("error", reject);
	});
}

function sendJson(res: ServerResponse, status: number, body: unknown, headers: Record<string, string> = {}) {
	const payload = JSON.stringify(body ?? null);
	res.writeHead(status, {
		...headers,
		"content-type": "application/json; charset=utf-8",
		"content-length": Buffer.byteLength(payload),
	});
	res.end(payload);
}

function bridgeHandler(targets: readonly ProxyTarget[], fetcher: JsonFetcher): Handler {
	return async ({ method, rawUrl, body }) => {
		const resolution = resolveBridgeCall(targets, method, rawUrl, body);
		switch (resolution.kind) {
			case "unmatched":
				return { status: 404, body: { error: "not_found" } };
			case "reject":
				return { status: resolution.status, body: resolution.envelope };
			case "call":
				return forward(resolution.call, fetcher);
		}
	};
}

export function buildRoutes(config: Readonly<Config>, deps: ServerDeps, selfPort: () => number): Router {
	const started = Date.now();
	const bridge = bridgeHandler(buildBridgeTargets(config), deps.fetchJson);
	const registry = buildRegistry(config, deps, selfPort);
	const wrap =
		(fn: () => Promise<unknown>): Handler =>
		async () =>
			ok(await fn());

	return new Router()
		.get(
			"/api/health",
			wrap(async () => ({
				status: "ok",
				service: SERVICE_NAME,
				version: getVersion(),
				uptimeSec: Math.round((Date.now() - started) / 1000),
			})),
		)
		.get("/api/systems", wrap(() => aggregate(registry, { deadlineMs: config.probe.deadline_ms })))
		.get("/api/active-sessions", wrap(() => activeSessions(config.activity, deps.now())))
		.get("/api/sessions", wrap(() => sessionSummaries(config.activity)))
		.get("/api/stats", wrap(() => activityStats(config.activity)))
		.get("/api/disk", wrap(() => getDiskUsage(config.activity.projects_root)))
		.get("/api/gateway/health", wrap(() => gatewayHealth(config.gateway, deps.probe)))
		.get("/api/gateway/activity", wrap(() => gatewayActivity(config.gateway, deps.now())))
		.post("/api/gateway/send", bridge)
		.get({ prefix: "/api/hub" }, bridge)
		.post({ prefix: "/api/hub" }, bridge)
		.get({ prefix: "/api/worker" }, bridge)
		.post({ prefix: "/api/worker" }, bridge);
}

export function createDeckServer(config: Readonly<Config>, deps: ServerDeps = defaultDeps): http.Server {
	const srv = config.server;
	const log = childLogger({ component: "http" });
	const limiter = new RateLimiter(srv.rate_limit_rps);
	const server = http.createServer();
	const sweeper = setInterval(() => limiter.sweep(), 60_000).unref();
	server.on("close", () => clearInterval(sweeper));
	const selfPort = () => {
		const addr = server.address();
		return addr && typeof addr === "object" ? addr.port : srv.port;
	};
	const router = buildRoutes(config, deps, selfPort);

	const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
		const method = (req.method ?? "GET").toUpperCase();
		const rawUrl = req.url ?? "/";
		const url = new URL(rawUrl, "http://localhost");

		const origin = req.headers.origin;
		const cors: Record<string, string> = {};
		if (origin && srv.allowed_origins.includes(origin)) {
			cors["access-control-allow-origin"] = origin;
			cors.vary = "origin";
		}
		if (method === "OPTIONS") {
			res.writeHead(204, {
				...cors,
				"access-control-allow-methods": "GET,POST,OPTIONS",
				"access-control-allow-headers": "authorization,content-type",
			});
			res.end();
			return;
		}

		const ip = req.socket.remoteAddress ?? "unknown";
		const rate = limiter.allow(ip);
		if (!rate.ok) {
			sendJson(res, 429, { error: "rate_limited" }, { ...cors, "retry-after": String(Math.ceil((rate.retryAfterMs ?? 1000) / 1000)) });
			return;
		}

		if (srv.token) {
			const auth = req.headers.authorization ?? "";
			if (auth !== `Bearer ${srv.token}`) {
				sendJson(res, 401, { error: "unauthorized" }, cors);
				return;
			}
		}

		const match = router.match(method, url.pathname);
		if (match.kind === "not_found") {
			sendJson(res, 404, { error: "not_found" }, cors);
			return;
		}
		if (match.kind === "method_not_allowed") {
			sendJson(res, 405, { error: "method_not_allowed" }, { ...cors, allow: match.allow.join(", ") });
			return;
		}

		let result: RouteResult;
		try {
			const body = method === "POST" ? await readBody(req, srv.max_body_bytes) : null;
			result = await match.handler({ method, url, rawUrl, body, req });
		} catch (e) {
			if (e instanceof RequestError) {
				sendJson(res, e.status, { error: e.code }, cors);
				return;
			}
			logRequestFailed({ method, path: url.pathname, error: e instanceof Error ? e.message : String(e) });
			sendJson(res, 500, { error: "internal_error" }, cors);
			return;
		}
		sendJson(res, result.status, result.body, { ...cors, ...result.headers });
	};

	server.on("request", (req: IncomingMessage, res: ServerResponse) => {
		handle(req, res).catch((e: unknown) => {
			log.error({ error: e instanceof Error ? e.message : String(e) }, "response failed");
			if (!res.headersSent) sendJson(res, 500, { error: "internal_error" });
			else res.destroy();
		});
	});
	return server;
}

export type RunningServer = { server: http.Server; port: number; close: () => Promise<void> };

export async function startDeckServer(config: Readonly<Config>, deps: ServerDeps = defaultDeps): Promise<RunningServer> {
	const server = createDeckServer(config, deps);
	await new Promise<void>((resolve, reject) => {
		server.once("error", reject);
		server.listen(config.server.port, config.server.host, () => {
			server.off("error", reject);
			resolve();
		});
	});
	const addr = server.address();
	const port = addr && typeof addr === "object" ? addr.port : config.server.port;
	return {
		server,
		port,
		close: () =>
			new Promise<void>((resolve, reject) => {
				server.close((err) => (err ? reject(err) : resolve()));
				server.closeAllConnections();
			}),
	};
}
