import { z } from "zod";
import { childLogger } from "./logger.js";

const EVENT_VERSION = "1";
function stamp<T extends Record<string, unknown>>(
	fields: T,
): T & { event_version: string; iso_time: string } {
	return {
		event_version: EVENT_VERSION,
		iso_time: new Date().toISOString(),
		...fields,
	};
}

function devValidate<T>(
	event: string,
	schema: z.ZodType<T>,
	value: unknown,
): boolean {
	const parsed = schema.safeParse(value);
	if (!parsed.success) {
		childLogger({ event }).warn(
			{ error: parsed.error.message },
			"invalid_event_payload",
		);
		return false;
	}
	return true;
}

export function logServiceStart(fields: {
	version: string;
	host: string;
	port: number;
	env: string;
	systems: number;
	authRequired: boolean;
}) {
	childLogger({ event: "ServiceStart" }).info(stamp(fields), "service started");
}

const zSystemsAggregated = z.object({
	count: z.number().int().nonnegative(),
	durationMs: z.number().nonnegative(),
	online: z.number().int().nonnegative(),
	unresponsive: z.array(z.string()),
});

export function logSystemsAggregated(fields: z.infer<typeof zSystemsAggregated>) {
	if (!devValidate("SystemsAggregated", zSystemsAggregated, fields)) return;
	const log = childLogger({ event: "SystemsAggregated" });
	if (fields.unresponsive.length)
		log.warn(stamp(fields), "systems aggregated past deadline");
	else log.debug(stamp(fields), "systems aggregated");
}

const zBridgeForwarded = z.object({
	target: z.string(),
	method: z.enum(["GET", "POST"]),
	upstreamPath: z.string(),
	callClass: z.enum(["short", "medium", "long"]),
	status: z.number().int().optional(),
	durationMs: z.number().nonnegative(),
	error: z.string().optional(),
});

export function logBridgeForwarded(fields: z.infer<typeof zBridgeForwarded>) {
	if (!devValidate("BridgeForwarded", zBridgeForwarded, fields)) return;
	const log = childLogger({ event: "BridgeForwarded" });
	if (fields.error) log.warn(stamp(fields), "bridge call failed");
	else log.info(stamp(fields), "bridge call forwarded");
}

export function logActivityReconciled(fields: {
	sessions: number;
	fromSessions: number;
	fromMetadata: number;
	skippedLines: number;
}) {
	childLogger({ event: "ActivityReconciled" }).debug(
		stamp(fields),
		"activity reconciled",
	);
}

export function logRequestFailed(fields: {
	method: string;
	path: string;
	error: string;
}) {
	childLogger({ event: "RequestFailed" }).error(stamp(fields), "request failed");
}
