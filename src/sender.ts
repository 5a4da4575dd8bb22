import { version } from "../package.json" with { type: "json" };
import {
	ATTR_DEPLOYMENT_ENVIRONMENT,
	ATTR_SERVICE_NAME,
	ATTR_TELEMETRY_SDK_NAME,
} from "./otel-attributes";
import type { Attributes, Span } from "./span-recorder";

export const INSTRUMENTATION_SCOPE = "tracewright";

export const OTLP_TRACES_PATH = "/v1/traces";

export interface SendSpansOptions {
	tracesEndpoint: string;
	headers?: Record<string, string>;
	serviceName: string;
	environment: string;
	/** Abort the request after this many milliseconds. Defaults to 10000. */
	timeoutMs?: number;
	debug?: boolean;
}

export const DEFAULT_EXPORT_TIMEOUT_MS = 10_000;

// Convert Date to nanoseconds for OTLP format
function dateToNanoseconds(date: Date): string {
	return (BigInt(date.getTime()) * BigInt(1_000_000)).toString();
}

// Convert simple attributes to OTLP format
function toOtlpAttributes(attributes: Attributes) {
	return Object.entries(attributes).map(([key, value]) => {
		if (typeof value === "number") {
			return {
				key,
				value: Number.isInteger(value)
					? { intValue: value }
					: { doubleValue: value },
			};
		} else if (typeof value === "boolean") {
			return {
				key,
				value: { boolValue: value },
			};
		} else {
			return {
				key,
				value: { stringValue: value },
			};
		}
	});
}

// SPAN_KIND_INTERNAL = 1
const SPAN_KIND_INTERNAL = 1;

/**
 * Append the OTLP traces path unless the endpoint already points at it.
 */
export function resolveTracesUrl(endpoint: string): string {
	const trimmed = endpoint.replace(/\/+$/, "");
	if (trimmed.endsWith(OTLP_TRACES_PATH)) {
		return trimmed;
	}
	return `${trimmed}${OTLP_TRACES_PATH}`;
}

// Build the OTLP trace export request
export function buildOtlpRequest(
	spans: Span[],
	serviceName: string,
	environment: string,
) {
	const otlpSpans = spans.map((span) => ({
		traceId: span.traceId,
		spanId: span.spanId,
		parentSpanId: span.parentSpanId || undefined,
		name: span.name,
		kind: SPAN_KIND_INTERNAL,
		startTimeUnixNano: dateToNanoseconds(span.startTime),
		endTimeUnixNano: dateToNanoseconds(span.endTime),
		attributes: toOtlpAttributes(span.attributes),
		droppedAttributesCount: 0,
		events: [],
		droppedEventsCount: 0,
		status: span.status,
		links: [],
		droppedLinksCount: 0,
	}));

	return {
		resourceSpans: [
			{
				resource: {
					attributes: toOtlpAttributes({
						[ATTR_SERVICE_NAME]: serviceName,
						[ATTR_DEPLOYMENT_ENVIRONMENT]: environment,
						[ATTR_TELEMETRY_SDK_NAME]: INSTRUMENTATION_SCOPE,
					}),
				},
				scopeSpans: [
					{
						scope: {
							name: INSTRUMENTATION_SCOPE,
							version,
						},
						spans: otlpSpans,
					},
				],
			},
		],
	};
}

export async function sendSpans(
	spans: Span[],
	options: SendSpansOptions,
): Promise<void> {
	if (spans.length === 0) {
		return;
	}

	const endpoint = options.tracesEndpoint;
	const headers = options.headers || {};

	const body = JSON.stringify(
		buildOtlpRequest(spans, options.serviceName, options.environment),
	);

	if (options.debug) {
		console.log(`Sending ${spans.length} span(s) to`, endpoint);
	}

	const response = await fetch(endpoint, {
		method: "POST",
		body,
		headers: {
			"content-type": "application/json",
			...headers,
		},
		signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_EXPORT_TIMEOUT_MS),
	});

	if (!response.ok) {
		const error = await response.text();
		throw new Error(
			`Failed to send spans: ${response.status} ${response.statusText}, ${error}`,
		);
	}
}
