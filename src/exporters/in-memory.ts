import type { Span } from "../span-recorder";
import { EXPORT_OK, type ExportResult, type SpanExporter } from "./types";

/**
 * Keeps every pushed span in memory. Useful for tests and for inspecting a
 * run in-process.
 */
export class InMemorySpanExporter implements SpanExporter {
	private spans: Span[] = [];
	private stopped = false;

	async push(span: Span): Promise<ExportResult> {
		this.spans.push(span);
		return EXPORT_OK;
	}

	async shutdown(): Promise<ExportResult> {
		this.stopped = true;
		return EXPORT_OK;
	}

	getFinishedSpans(): Span[] {
		return [...this.spans];
	}

	findSpan(name: string): Span | undefined {
		return this.spans.find((span) => span.name === name);
	}

	get isShutdown(): boolean {
		return this.stopped;
	}
}
