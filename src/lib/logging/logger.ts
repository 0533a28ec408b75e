import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { type SpanContext, context, trace } from "@opentelemetry/api";
import pino, {
	type DestinationStream,
	type Logger,
	type LoggerOptions,
	type TransportTargetOptions,
} from "pino";
import { getConfig } from "../../config.js";
import { SERVICE_NAME, getVersion } from "../version.js";

// Bind OTel trace/span if present
let __testSpan: SpanContext | null = null;
function traceBindings() {
	try {
		const span = trace.getSpan(context.active());
		const sc = span?.spanContext();
		if (sc?.traceId) return { trace_id: sc.traceId, span_id: sc.spanId };
	} catch {
		// no active context manager
	}
	if (__testSpan?.traceId)
		return { trace_id: __testSpan.traceId, span_id: __testSpan.spanId };
	return {};
}

// Redaction keys (merged with config.telemetry.redact)
const DEFAULT_REDACT = [
	"GATEWAY_TOKEN",
	"CONTROL_DECK_TOKEN",
	"authorization",
	"headers.authorization",
	"*.token",
	"*.secret",
	"*.password",
	"*.apiKey",
	"*.api_key",
];

function fmtDay(x: Date): string {
	return `${x.getFullYear()}-${String(x.getMonth() + 1).padStart(2, "0")}-${String(x.getDate()).padStart(2, "0")}`;
}

// Rotate server.ndjson daily or when it grows too large
function rotate(logsDir: string, maxMb: number): void {
	const cur = path.join(logsDir, "server.ndjson");
	let st: fs.Stats;
	try {
		st = fs.statSync(cur);
	} catch {
		return;
	}
	const d = new Date(st.mtimeMs);
	const tooBig = st.size > maxMb * 1024 * 1024;
	if (fmtDay(d) === fmtDay(new Date()) && !tooBig) return;
	const ts = `${String(d.getHours()).padStart(2, "0")}${String(d.getMinutes()).padStart(2, "0")}${String(d.getSeconds()).padStart(2, "0")}`;
	let rotated = path.join(logsDir, `server-${fmtDay(d)}-${ts}.ndjson`);
	for (let attempt = 1; fs.existsSync(rotated) && attempt < 5; attempt++) {
		rotated = path.join(
			logsDir,
			`server-${fmtDay(d)}-${ts}-${process.pid}-${attempt}.ndjson`,
		);
	}
	try {
		fs.renameSync(cur, rotated);
	} catch (e) {
		process.stderr.write(`[logger] rotate failed: ${(e as Error).message}\n`);
	}
}

export function buildLogger(destOverride?: DestinationStream): Logger {
	const cfg = getConfig();
	const env = cfg.telemetry.env;
	const opts: LoggerOptions = {
		base: {
			service: SERVICE_NAME,
			version: getVersion(),
			env,
			host: os.hostname(),
		},
		level: cfg.telemetry.logs.level,
		redact: {
			paths: [...DEFAULT_REDACT, ...cfg.telemetry.redact.paths],
			censor: cfg.telemetry.redact.censor,
		},
		mixin: traceBindings,
		messageKey: "msg",
	};

	// If override provided (for testing), use it
	if (destOverride) return pino(opts, destOverride);

	if (env === "local") {
		// In tests, avoid touching the filesystem
		if (process.env.NODE_ENV === "test" || process.env.VITEST) {
			return pino(opts, pino.destination(2));
		}
		const logsDir = cfg.telemetry.logs.dir;
		fs.mkdirSync(logsDir, { recursive: true });
		rotate(logsDir, 64);

		// Pretty to TTY + JSON file for troubleshooting
		const targets: TransportTargetOptions[] = [
			{
				target: "pino-pretty",
				options: { colorize: true, translateTime: "SYS:standard" },
				level: opts.level,
			},
			{
				target: "pino/file",
				options: {
					destination: path.join(logsDir, "server.ndjson"),
					mkdir: true,
				},
				level: opts.level,
			},
		];
		return pino(opts, pino.transport({ targets }));
	}

	// CI/Prod: JSON to stderr
	return pino(opts, pino.destination(2));
}

// Singleton logger
let _logger: Logger | null = null;

export function logger(): Logger {
	if (!_logger) {
		_logger = buildLogger();
	}
	return _logger;
}

// Helper to create scoped/child loggers
export function childLogger(bindings: Record<string, unknown>): Logger {
	return logger().child(bindings);
}

// Test helper to inject custom logger
export function __setTestLogger(l: Logger | null): void {
	_logger = l;
}
export function __setTestSpanContext(sc: SpanContext | null): void {
	__testSpan = sc;
}
