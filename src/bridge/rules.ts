import { isRecord } from "../lib/http_json.js";

export type CallClass = "short" | "medium" | "long";
export type HttpMethod = "GET" | "POST";
export type JsonObject = Record<string, unknown>;

/**
 * How a POST body is prepared: `empty` always sends `{}`, `json` requires a
 * JSON object, `lenient` sends the parsed object or `{}`.
 */
export type BodyMode = "empty" | "json" | "lenient";

export type ErrorEnvelope = { error: string; detail?: string };

/** May pick the upstream path from the body and rewrite the body itself. */
export type BodyShaper = (
	body: JsonObject,
) => { ok: true; path?: string; body: JsonObject } | { ok: false; error: string };

export type BridgeRule = {
	method: HttpMethod;
	/** Path below the mount. `:name` segments capture one segment. */
	inbound: string;
	/** Exact rules: the upstream path, `:name` substituted. Prefix rules: the replacement prefix. */
	upstream: string;
	match?: "exact" | "prefix";
	callClass: CallClass;
	body?: BodyMode;
	shape?: BodyShaper;
	/** Applied in order to the rewritten path when the inbound call carries no query. */
	bareRewrites?: readonly { pattern: RegExp; replace: string }[];
};

export type ProxyTarget = Readonly<{
	id: string;
	/** Inbound namespace, e.g. `/api/hub`. */
	mount: string;
	baseUrl: string;
	token?: string;
	timeouts: Readonly<Record<CallClass, number>>;
	rules: readonly BridgeRule[];
}>;

export type BridgeCall = {
	target: ProxyTarget;
	method: HttpMethod;
	/** Path plus the inbound query string, verbatim. */
	upstreamPath: string;
	callClass: CallClass;
	body?: JsonObject;
};

export type Resolution =
	| { kind: "call"; call: BridgeCall }
	| { kind: "reject"; status: 400; envelope: ErrorEnvelope }
	| { kind: "unmatched" };

const patterns = new WeakMap<BridgeRule, RegExp>();

function escapeRe(s: string): string {
	return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function patternOf(rule: BridgeRule): RegExp {
	let re = patterns.get(rule);
	if (!re) {
		const body = rule.inbound
			.split("/")
			.map((seg) => (seg.startsWith(":") ? `(?<${seg.slice(1)}>[^/]+)` : escapeRe(seg)))
			.join("/");
		re = new RegExp(rule.match === "prefix" ? `^${body}(?<rest>/.*)?$` : `^${body}$`);
		patterns.set(rule, re);
	}
	return re;
}

function rewrite(rule: BridgeRule, pathname: string): string | null {
	const m = patternOf(rule).exec(pathname);
	if (!m) return null;
	const groups = m.groups ?? {};
	if (rule.match === "prefix") return rule.upstream + (groups.rest ?? "");
	return rule.upstream.replace(/:(\w+)/g, (whole, name: string) => groups[name] ?? whole);
}

function withQuery(path: string, query: string): string {
	if (!query) return path;
	return `${path}${path.includes("?") ? "&" : "?"}${query}`;
}

type PreparedBody = { ok: true; body: JsonObject } | { ok: false; error: string };

function prepareBody(mode: BodyMode, raw: string | null): PreparedBody {
	if (mode === "empty") return { ok: true, body: {} };
	let parsed: unknown = undefined;
	if (raw?.trim()) {
		try {
			parsed = JSON.parse(raw);
		} catch {
			parsed = undefined;
		}
	}
	if (isRecord(parsed)) return { ok: true, body: parsed };
	return mode === "lenient" ? { ok: true, body: {} } : { ok: false, error: "invalid_json" };
}

function mountOf(targets: readonly ProxyTarget[], pathname: string): { target: ProxyTarget; rest: string } | null {
	for (const target of targets) {
		if (pathname === target.mount || pathname.startsWith(`${target.mount}/`))
			return { target, rest: pathname.slice(target.mount.length) || "/" };
	}
	return null;
}

/**
 * Maps an inbound call onto its target's namespace. First matching rule wins;
 * the query string is carried over untouched.
 */
export function resolveBridgeCall(
	targets: readonly ProxyTarget[],
	method: string,
	rawUrl: string,
	rawBody: string | null = null,
): Resolution {
	const q = rawUrl.indexOf("?");
	const pathname = q < 0 ? rawUrl : rawUrl.slice(0, q);
	const query = q < 0 ? "" : rawUrl.slice(q + 1);
	const mounted = mountOf(targets, pathname);
	if (!mounted) return { kind: "unmatched" };
	const { target, rest } = mounted;

	for (const rule of target.rules) {
		if (rule.method !== method) continue;
		let path = rewrite(rule, rest);
		if (path === null) continue;
		if (!query) for (const r of rule.bareRewrites ?? []) path = path.replace(r.pattern, r.replace);

		if (rule.method === "GET")
			return {
				kind: "call",
				call: { target, method: "GET", upstreamPath: withQuery(path, query), callClass: rule.callClass },
			};

		const prepared = prepareBody(rule.body ?? "empty", rawBody);
		if (!prepared.ok) return { kind: "reject", status: 400, envelope: { error: prepared.error } };
		let body = prepared.body;
		if (rule.shape) {
			const shaped = rule.shape(body);
			if (!shaped.ok) return { kind: "reject", status: 400, envelope: { error: shaped.error } };
			body = shaped.body;
			if (shaped.path) path = shaped.path;
		}
		return {
			kind: "call",
			call: { target, method: "POST", upstreamPath: withQuery(path, query), callClass: rule.callClass, body },
		};
	}
	return { kind: "unmatched" };
}
