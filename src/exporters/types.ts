import type { Span } from "../span-recorder";

export type ExportResult = { ok: true } | { ok: false; error: Error };

export const EXPORT_OK: ExportResult = { ok: true };

/**
 * Receives completed spans. Implementations report failure through the
 * result instead of throwing; callers treat a throw the same way.
 */
export interface SpanExporter {
	push(span: Span): Promise<ExportResult>;
	/** Flush anything buffered and release the connection. */
	shutdown(): Promise<ExportResult>;
}

export function exportFailure(error: unknown): ExportResult {
	return {
		ok: false,
		error: error instanceof Error ? error : new Error(String(error)),
	};
}
