import type { Config, TimeoutBudgets } from "../config.js";
import type { BodyShaper, BridgeRule, CallClass, ProxyTarget } from "./rules.js";

function budgets(t: TimeoutBudgets): Record<CallClass, number> {
	return { short: t.short_ms, medium: t.medium_ms, long: t.long_ms };
}

/** `mode: "sync"` (the default) runs inline on the hub, anything else queues. */
const dispatchByMode: BodyShaper = ({ mode = "sync", ...rest }) => ({
	ok: true,
	path: mode === "sync" ? "/run" : "/tasks",
	body: rest,
});

export const HUB_RULES: readonly BridgeRule[] = [
	{ method: "GET", inbound: "/health", upstream: "/health", callClass: "short" },
	{ method: "GET", inbound: "/capabilities", upstream: "/api/capabilities", callClass: "medium" },
	{
		method: "GET",
		inbound: "/tasks",
		match: "prefix",
		upstream: "/api/tasks",
		callClass: "medium",
		// the hub serves single tasks outside its /api namespace
		bareRewrites: [{ pattern: /^\/api\/tasks\/(.+)$/, replace: "/tasks/$1" }],
	},
	{ method: "POST", inbound: "/dispatch", upstream: "/run", callClass: "long", body: "json", shape: dispatchByMode },
	{ method: "POST", inbound: "/tasks/:id/run", upstream: "/tasks/:id/run", callClass: "long" },
	{ method: "POST", inbound: "/tasks/:id/approve", upstream: "/api/tasks/:id/approve", callClass: "medium" },
	{ method: "POST", inbound: "/tasks/:id/handoff", upstream: "/api/tasks/:id/handoff", callClass: "medium" },
];

export const WORKER_RULES: readonly BridgeRule[] = [
	{ method: "GET", inbound: "/health", upstream: "/health", callClass: "short" },
	{ method: "GET", inbound: "/status", upstream: "/api/status", callClass: "medium" },
	{ method: "GET", inbound: "/tasks", match: "prefix", upstream: "/api/tasks", callClass: "medium" },
	{ method: "GET", inbound: "/knowledge", upstream: "/api/knowledge", callClass: "medium" },
	{ method: "GET", inbound: "/journal", upstream: "/api/journal?n=20", callClass: "medium" },
	{ method: "POST", inbound: "/tasks/approve-all", upstream: "/api/tasks/approve-all", callClass: "long" },
	{ method: "POST", inbound: "/tasks/:id/approve", upstream: "/api/tasks/:id/approve", callClass: "long" },
	{ method: "POST", inbound: "/tasks/:id/reject", upstream: "/api/tasks/:id/reject", callClass: "long", body: "lenient" },
	{ method: "POST", inbound: "/kill", upstream: "/api/kill", callClass: "long", body: "lenient" },
	{ method: "POST", inbound: "/resume", upstream: "/api/resume", callClass: "long" },
];

function gatewayRules(chatModel: string): BridgeRule[] {
	const toChat: BodyShaper = ({ message }) =>
		typeof message === "string" && message.length > 0
			? {
					ok: true,
					body: { model: chatModel, messages: [{ role: "user", content: message }], stream: false },
				}
			: { ok: false, error: "message required" };
	return [
		{ method: "POST", inbound: "/send", upstream: "/v1/chat/completions", callClass: "long", body: "json", shape: toChat },
	];
}

export function buildBridgeTargets(config: Readonly<Config>): ProxyTarget[] {
	const gw = config.gateway;
	return [
		{
			id: "hub",
			mount: "/api/hub",
			baseUrl: config.hub.base_url,
			token: config.hub.token,
			timeouts: budgets(config.hub.timeouts),
			rules: HUB_RULES,
		},
		{
			id: "worker",
			mount: "/api/worker",
			baseUrl: config.worker.base_url,
			token: config.worker.token,
			timeouts: budgets(config.worker.timeouts),
			rules: WORKER_RULES,
		},
		{
			id: "gateway",
			mount: "/api/gateway",
			baseUrl: `http://${gw.host}:${gw.port}`,
			token: gw.token,
			timeouts: budgets(gw.timeouts),
			rules: gatewayRules(gw.chat_model),
		},
	];
}
