import type { IncomingMessage } from "node:http";

export type RequestContext = {
	method: string;
	/** Parsed URL; `rawUrl` keeps the query string exactly as received. */
	url: URL;
	rawUrl: string;
	/** Raw request body for POST, null otherwise. */
	body: string | null;
	req: IncomingMessage;
};

export type RouteResult = { status: number; body: unknown; headers?: Record<string, string> };
export type Handler = (ctx: RequestContext) => Promise<RouteResult>;
export type RoutePath = string | { prefix: string };

type Route = { method: string; exact?: string; prefix?: string; handler: Handler };

export type RouteMatch =
	| { kind: "found"; handler: Handler }
	| { kind: "method_not_allowed"; allow: string[] }
	| { kind: "not_found" };

export const ok = (body: unknown): RouteResult => ({ status: 200, body });

/** Exact and prefix routes, tried in registration order. No other logic. */
export class Router {
	private readonly routes: Route[] = [];

	add(method: string, path: RoutePath, handler: Handler): this {
		const m = method.toUpperCase();
		if (typeof path === "string") this.routes.push({ method: m, exact: path, handler });
		else this.routes.push({ method: m, prefix: path.prefix.replace(/\/+$/, ""), handler });
		return this;
	}

	get(path: RoutePath, handler: Handler): this {
		return this.add("GET", path, handler);
	}

	post(path: RoutePath, handler: Handler): this {
		return this.add("POST", path, handler);
	}

	match(method: string, pathname: string): RouteMatch {
		const allow: string[] = [];
		for (const r of this.routes) {
			const hit =
				r.exact !== undefined
					? pathname === r.exact
					: r.prefix !== undefined && (pathname === r.prefix || pathname.startsWith(`${r.prefix}/`));
			if (!hit) continue;
			if (r.method === method.toUpperCase()) return { kind: "found", handler: r.handler };
			if (!allow.includes(r.method)) allow.push(r.method);
		}
		return allow.length ? { kind: "method_not_allowed", allow } : { kind: "not_found" };
	}
}
