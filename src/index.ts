import { runSuite, SuiteController } from "./suite";

export type {
	ActionOperation,
	ActionOutcome,
	ActionResult,
	ActionStep,
	ActionTarget,
	ActionType,
} from "./actions";
export { ActionController } from "./actions";
export type { BrowserLauncher, BrowserSession } from "./browser";
export { launchBrowser } from "./browser";
export type {
	BrowserName,
	ConfigIssue,
	ConfigOptions,
	ResolvedConfig,
	ScreenshotPolicy,
} from "./config";
export { DEFAULT_CONFIG, parseOtlpHeaders, resolveConfig } from "./config";
export type {
	Driver,
	ElementState,
	NavigationResult,
	NavigationTiming,
	PageDriver,
} from "./driver";
export { createPageDriver } from "./driver";
export {
	ActionFailure,
	AssertionFailure,
	SpanStateError,
	TestSkipped,
} from "./errors";
export { InMemorySpanExporter } from "./exporters/in-memory";
export {
	OtlpHttpExporter,
	type OtlpHttpExporterOptions,
} from "./exporters/otlp-http";
export type { ExportResult, SpanExporter } from "./exporters/types";
export * from "./otel-attributes";
export {
	REDACTED,
	redactIfNeeded,
	redactValue,
	SENSITIVE_SELECTOR_KEYWORDS,
	shouldRedact,
} from "./redaction";
export type {
	AttributeValue,
	Attributes,
	Span,
	SpanSnapshot,
	SpanStatus,
} from "./span-recorder";
export { SpanRecorder, SpanStatusCode } from "./span-recorder";
export type {
	SuiteOptions,
	SuiteResult,
	SuiteState,
	SuiteSummary,
	TestCaseOptions,
} from "./suite";
export { computeSuiteResult } from "./suite";
export type {
	FillOptions,
	TestCaseInfo,
	TestCaseOutcome,
	TestCaseState,
} from "./test-case";
export { TestCaseController } from "./test-case";
export type { TracedTestInfo } from "./test-info";
export { endTestCase, startTestCase, testCaseInfoFrom } from "./test-info";

export { runSuite, SuiteController };
export default runSuite;
