import { resolveTracesUrl, sendSpans } from "../sender";
import type { Span } from "../span-recorder";
import {
	EXPORT_OK,
	type ExportResult,
	exportFailure,
	type SpanExporter,
} from "./types";

export interface OtlpHttpExporterOptions {
	/** Collector base URL, or the full `/v1/traces` URL. */
	endpoint: string;
	headers?: Record<string, string>;
	serviceName: string;
	environment: string;
	/** Spans buffered before a request is sent. Defaults to 64. */
	maxBatchSize?: number;
	/** Per-request timeout in milliseconds. */
	timeoutMs?: number;
	debug?: boolean;
}

const DEFAULT_MAX_BATCH_SIZE = 64;

/**
 * Buffers completed spans and POSTs them as OTLP/HTTP JSON.
 *
 * `push` only starts a request when a batch fills up and never waits for
 * it, so a slow collector can't hold up the test that ended the span.
 * Every request is settled by `shutdown`, which reports the ones that
 * failed. Nothing here throws.
 */
export class OtlpHttpExporter implements SpanExporter {
	private buffer: Span[] = [];
	private pending: Set<Promise<void>> = new Set();
	private failures: Error[] = [];
	private closed = false;
	private readonly tracesUrl: string;
	private readonly maxBatchSize: number;

	constructor(private options: OtlpHttpExporterOptions) {
		this.tracesUrl = resolveTracesUrl(options.endpoint);
		this.maxBatchSize = Math.max(
			1,
			options.maxBatchSize ?? DEFAULT_MAX_BATCH_SIZE,
		);
	}

	async push(span: Span): Promise<ExportResult> {
		if (this.closed) {
			return exportFailure(
				new Error(`Exporter is shut down, dropping span "${span.name}"`),
			);
		}
		this.buffer.push(span);
		if (this.buffer.length >= this.maxBatchSize) {
			this.startSend();
		}
		return EXPORT_OK;
	}

	/** Send whatever is buffered and wait for every request in flight. */
	async flush(): Promise<ExportResult> {
		this.startSend();
		await Promise.all(this.pending);

		const failures = this.failures;
		this.failures = [];
		if (failures.length === 0) {
			return EXPORT_OK;
		}
		const messages = [...new Set(failures.map((error) => error.message))];
		return exportFailure(
			new Error(
				`${failures.length} batch(es) failed to send: ${messages.join("; ")}`,
			),
		);
	}

	async shutdown(): Promise<ExportResult> {
		if (this.closed) {
			return EXPORT_OK;
		}
		this.closed = true;
		return this.flush();
	}

	private startSend() {
		if (this.buffer.length === 0) {
			return;
		}
		const batch = this.buffer;
		this.buffer = [];

		const request: Promise<void> = this.send(batch).then((result) => {
			this.pending.delete(request);
			if (!result.ok) {
				this.failures.push(result.error);
			}
		});
		this.pending.add(request);
	}

	private async send(batch: Span[]): Promise<ExportResult> {
		try {
			await sendSpans(batch, {
				tracesEndpoint: this.tracesUrl,
				headers: this.options.headers,
				serviceName: this.options.serviceName,
				environment: this.options.environment,
				timeoutMs: this.options.timeoutMs,
				debug: this.options.debug,
			});
			return EXPORT_OK;
		} catch (error) {
			return exportFailure(error);
		}
	}
}
