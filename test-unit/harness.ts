import type {
	Driver,
	ElementState,
	NavigationResult,
} from "../src/driver";
import { InMemorySpanExporter } from "../src/exporters/in-memory";
import type { ExportResult, SpanExporter } from "../src/exporters/types";
import type { Span } from "../src/span-recorder";
import { SuiteController, type SuiteOptions } from "../src/suite";

export const DEFAULT_START_TIME = new Date("2025-11-06T10:00:00.000Z");

/**
 * A clock that advances by `stepMs` on every read, starting at `start`.
 */
export function steppingClock(start = DEFAULT_START_TIME, stepMs = 100) {
	let current = start.getTime() - stepMs;
	return () => {
		current += stepMs;
		return new Date(current);
	};
}

export class FakeTimeoutError extends Error {
	override name = "TimeoutError";
}

/**
 * Scriptable stand-in for a browser page. Selectors in `missing` never
 * become visible; everything else is present immediately.
 */
export class FakeDriver implements Driver {
	url = "http://localhost:8080/";
	calls: string[] = [];
	missing: Set<string> = new Set();
	texts: Map<string, string> = new Map();
	counts: Map<string, number> = new Map();
	navigation: NavigationResult = { status: 200 };
	clickError?: Error;
	fillError?: unknown;
	screenshots: string[] = [];
	screenshotError?: Error;

	async navigate(url: string): Promise<NavigationResult> {
		this.calls.push(`navigate ${url}`);
		this.url = url;
		return this.navigation;
	}

	async click(selector: string, _timeoutMs: number): Promise<void> {
		this.calls.push(`click ${selector}`);
		if (this.clickError) {
			throw this.clickError;
		}
	}

	async fill(selector: string, _value: string, _timeoutMs: number) {
		this.calls.push(`fill ${selector}`);
		if (this.fillError) {
			throw this.fillError;
		}
	}

	async waitForState(
		selector: string,
		state: ElementState,
		timeoutMs: number,
	): Promise<void> {
		this.calls.push(`wait ${selector} ${state}`);
		if (this.missing.has(selector)) {
			throw new FakeTimeoutError(
				`Timeout ${timeoutMs}ms exceeded waiting for "${selector}" to be ${state}`,
			);
		}
	}

	async getText(selector: string): Promise<string> {
		return this.texts.get(selector) ?? "";
	}

	async countMatches(selector: string): Promise<number> {
		return this.counts.get(selector) ?? 0;
	}

	currentUrl(): string {
		return this.url;
	}

	async screenshot(path: string): Promise<void> {
		if (this.screenshotError) {
			throw this.screenshotError;
		}
		this.screenshots.push(path);
	}
}

/** Rejects every span, the way an unreachable collector would. */
export class FailingExporter implements SpanExporter {
	pushes = 0;
	shutdowns = 0;

	async push(_span: Span): Promise<ExportResult> {
		this.pushes += 1;
		return { ok: false, error: new Error("collector unavailable") };
	}

	async shutdown(): Promise<ExportResult> {
		this.shutdowns += 1;
		throw new Error("connection reset");
	}
}

export interface TestSuite {
	suite: SuiteController;
	exporter: InMemorySpanExporter;
	driver: FakeDriver;
}

/**
 * A suite wired to an in-memory exporter and a fake driver, isolated from
 * the process environment and git.
 */
export function createTestSuite(options: SuiteOptions = {}): TestSuite {
	const exporter = new InMemorySpanExporter();
	const driver = new FakeDriver();
	const suite = new SuiteController({
		suiteName: "smoke",
		exporter,
		driver,
		vcs: false,
		env: {},
		...options,
	});
	return { suite, exporter, driver };
}

export function spanNamed(exporter: InMemorySpanExporter, name: string): Span {
	const span = exporter.findSpan(name);
	if (!span) {
		const names = exporter.getFinishedSpans().map((s) => s.name);
		throw new Error(`No span named ${name}, got: ${names.join(", ")}`);
	}
	return span;
}
