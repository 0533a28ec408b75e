import { type Meter, type Tracer, metrics, trace } from "@opentelemetry/api";
import { SERVICE_NAME, getVersion } from "../version.js";

// Global providers are no-ops until the host registers an SDK.
export function tracer(): Tracer {
	return trace.getTracer(SERVICE_NAME, getVersion());
}

export function meter(): Meter {
	return metrics.getMeter(SERVICE_NAME, getVersion());
}
