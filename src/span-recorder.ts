import { randomBytes } from "node:crypto";
import { errorMessage, SpanStateError } from "./errors";
import type { SpanExporter } from "./exporters/types";

export type AttributeValue = string | number | boolean;
export type Attributes = Record<string, AttributeValue>;

// Same numbering as OTLP: 0=UNSET, 1=OK, 2=ERROR
export const SpanStatusCode = {
	UNSET: 0,
	OK: 1,
	ERROR: 2,
} as const;
export type SpanStatusCode =
	(typeof SpanStatusCode)[keyof typeof SpanStatusCode];

export type SpanStatus = { code: SpanStatusCode; message?: string };

/** A completed span, as handed to the exporter. */
export type Span = {
	traceId: string;
	spanId: string;
	parentSpanId?: string;
	name: string;
	startTime: Date;
	endTime: Date;
	attributes: Attributes;
	status: SpanStatus;
};

/** Snapshot of a span that may still be open. */
export type SpanSnapshot = Omit<Span, "endTime"> & {
	endTime?: Date;
	durationMs?: number;
};

type RecordedSpan = {
	traceId: string;
	spanId: string;
	parentSpanId?: string;
	name: string;
	startTime: Date;
	endTime?: Date;
	attributes: Attributes;
	status: SpanStatus;
};

export interface SpanRecorderOptions {
	exporter: SpanExporter;
	now?: () => Date;
}

export const INTERRUPTED_BY_PARENT = "interrupted: parent span closed";

/**
 * Records the spans of a single trace.
 *
 * Spans are addressed by id. A closed span is frozen: any further write
 * throws {@link SpanStateError}. Each span is pushed to the exporter exactly
 * once, when it closes; exporter failures are logged and dropped.
 */
export class SpanRecorder {
	readonly traceId: string = generateTraceId();
	private spans: Map<string, RecordedSpan> = new Map();
	private exporter: SpanExporter;
	private now: () => Date;

	constructor(options: SpanRecorderOptions) {
		this.exporter = options.exporter;
		this.now = options.now ?? (() => new Date());
	}

	open(
		parentSpanId: string | null,
		name: string,
		attributes: Attributes = {},
	): string {
		if (parentSpanId !== null) {
			const parent = this.spans.get(parentSpanId);
			if (!parent) {
				throw new SpanStateError(
					`Cannot open span "${name}": parent span ${parentSpanId} does not exist`,
				);
			}
			if (parent.endTime) {
				throw new SpanStateError(
					`Cannot open span "${name}": parent span "${parent.name}" is already closed`,
				);
			}
		}

		const spanId = generateSpanId();
		this.spans.set(spanId, {
			traceId: this.traceId,
			spanId,
			parentSpanId: parentSpanId ?? undefined,
			name,
			startTime: this.now(),
			attributes: { ...attributes },
			status: { code: SpanStatusCode.UNSET },
		});
		return spanId;
	}

	setAttribute(spanId: string, key: string, value: AttributeValue): void {
		const span = this.getOpenSpan(spanId, `set attribute "${key}"`);
		span.attributes[key] = value;
	}

	setAttributes(spanId: string, attributes: Attributes): void {
		const span = this.getOpenSpan(spanId, "set attributes");
		Object.assign(span.attributes, attributes);
	}

	setStatus(spanId: string, status: "ok" | "error", message?: string): void {
		const span = this.getOpenSpan(spanId, "set status");
		span.status =
			status === "ok"
				? { code: SpanStatusCode.OK }
				: message === undefined
					? { code: SpanStatusCode.ERROR }
					: { code: SpanStatusCode.ERROR, message };
	}

	/**
	 * Close a span and push it to the exporter. Children that are still open
	 * are closed first, with an error status. Closing a closed span returns
	 * its duration again without pushing it a second time.
	 *
	 * @returns duration in milliseconds
	 */
	async close(spanId: string): Promise<number> {
		const span = this.spans.get(spanId);
		if (!span) {
			throw new SpanStateError(`Cannot close span ${spanId}: unknown span`);
		}
		if (span.endTime) {
			return durationOf(span.startTime, span.endTime);
		}

		for (const child of this.openChildren(spanId)) {
			this.interrupt(child, INTERRUPTED_BY_PARENT);
			await this.close(child.spanId);
		}

		const now = this.now();
		const endTime = now < span.startTime ? span.startTime : now;
		// Marked closed before the push, so a concurrent close can't push twice
		span.endTime = endTime;

		await this.export({
			traceId: span.traceId,
			spanId: span.spanId,
			parentSpanId: span.parentSpanId,
			name: span.name,
			startTime: span.startTime,
			endTime,
			attributes: { ...span.attributes },
			status: { ...span.status },
		});

		return durationOf(span.startTime, endTime);
	}

	/**
	 * Close every open span below the root with an error status.
	 *
	 * @returns names of the spans that were still open
	 */
	async closeOrphans(reason: string): Promise<string[]> {
		const orphans = [...this.spans.values()].filter(
			(span) => !span.endTime && span.parentSpanId !== undefined,
		);
		if (orphans.length === 0) {
			return [];
		}

		const names = orphans.map((span) => span.name);
		console.warn(
			`Closing ${orphans.length} orphaned span(s) (${reason}): ${names.join(", ")}`,
		);

		for (const span of orphans) {
			this.interrupt(span, reason);
		}
		// Outermost first; close() takes care of the descendants
		const outermost = orphans.filter(
			(span) => !orphans.some((other) => other.spanId === span.parentSpanId),
		);
		for (const span of outermost) {
			await this.close(span.spanId);
		}
		return names;
	}

	isOpen(spanId: string): boolean {
		const span = this.spans.get(spanId);
		return span !== undefined && span.endTime === undefined;
	}

	openSpanIds(): string[] {
		return [...this.spans.values()]
			.filter((span) => !span.endTime)
			.map((span) => span.spanId);
	}

	getSpan(spanId: string): SpanSnapshot | undefined {
		const span = this.spans.get(spanId);
		if (!span) {
			return undefined;
		}
		return {
			...span,
			attributes: { ...span.attributes },
			status: { ...span.status },
			durationMs: span.endTime
				? durationOf(span.startTime, span.endTime)
				: undefined,
		};
	}

	private getOpenSpan(spanId: string, operation: string): RecordedSpan {
		const span = this.spans.get(spanId);
		if (!span) {
			throw new SpanStateError(
				`Cannot ${operation} on span ${spanId}: unknown span`,
			);
		}
		if (span.endTime) {
			throw new SpanStateError(
				`Cannot ${operation} on span "${span.name}": span is closed`,
			);
		}
		return span;
	}

	private openChildren(spanId: string): RecordedSpan[] {
		return [...this.spans.values()].filter(
			(span) => span.parentSpanId === spanId && !span.endTime,
		);
	}

	private interrupt(span: RecordedSpan, reason: string) {
		if (span.status.code !== SpanStatusCode.ERROR) {
			span.status = { code: SpanStatusCode.ERROR, message: reason };
		}
	}

	private async export(span: Span) {
		try {
			const result = await this.exporter.push(span);
			if (!result.ok) {
				warnExportFailure(span, result.error.message);
			}
		} catch (error) {
			warnExportFailure(span, errorMessage(error));
		}
	}
}

function warnExportFailure(span: Span, message: string) {
	console.warn(`Failed to export span "${span.name}": ${message}`);
}

function durationOf(startTime: Date, endTime: Date): number {
	return endTime.getTime() - startTime.getTime();
}

/**
 * Generate a random 32-character hex trace ID.
 */
export function generateTraceId(): string {
	return randomBytes(16).toString("hex");
}

/**
 * Generate a random 16-character hex span ID.
 */
export function generateSpanId(): string {
	return randomBytes(8).toString("hex");
}
