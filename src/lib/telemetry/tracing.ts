import { type Attributes, type Span, SpanStatusCode } from "@opentelemetry/api";
import { tracer } from "./otel.js";

export type SpanName = "systems.aggregate" | "activity.reconcile" | "bridge.forward";

/** Field name on our side, attribute key on the wire. */
const ATTRIBUTE_KEYS = {
	adapters: "deck.systems.adapters",
	deadlineMs: "deck.systems.deadline_ms",
	unresponsive: "deck.systems.unresponsive",
	windowHours: "deck.activity.window_hours",
	records: "deck.activity.records",
	target: "deck.bridge.target",
	callClass: "deck.bridge.call_class",
	method: "http.request.method",
	path: "url.path",
	status: "http.response.status_code",
} as const;

type SpanField = keyof typeof ATTRIBUTE_KEYS;
export type SpanAttrs = Partial<Record<SpanField, string | number>>;

const isSpanField = (k: string): k is SpanField => Object.hasOwn(ATTRIBUTE_KEYS, k);

const MAX_VALUE = 256;

/** Maps span fields to attribute keys. Paths are recorded without their query string. */
export function spanAttributes(attrs: SpanAttrs): Attributes {
	const out: Attributes = {};
	for (const [field, value] of Object.entries(attrs)) {
		if (value === undefined || !isSpanField(field)) continue;
		let v = value;
		if (typeof v === "string") {
			if (field === "path") v = v.replace(/\?.*$/s, "");
			if (v.length > MAX_VALUE) v = `${v.slice(0, MAX_VALUE)}…`;
		}
		out[ATTRIBUTE_KEYS[field]] = v;
	}
	return out;
}

export function setSpanAttrs(span: Span, attrs: SpanAttrs): void {
	span.setAttributes(spanAttributes(attrs));
}

export async function withSpan<T>(name: SpanName, attrs: SpanAttrs, fn: (span: Span) => Promise<T>): Promise<T> {
	return await tracer().startActiveSpan(name, { attributes: spanAttributes(attrs) }, async (span) => {
		try {
			return await fn(span);
		} catch (e: unknown) {
			span.recordException(e instanceof Error ? e : String(e));
			span.setStatus({ code: SpanStatusCode.ERROR, message: e instanceof Error ? e.message : String(e) });
			throw e;
		} finally {
			span.end();
		}
	});
}
