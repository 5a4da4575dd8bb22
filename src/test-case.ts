import path from "node:path";
import {
	type ActionOperation,
	ActionController,
	type ActionType,
} from "./actions";
import type { ResolvedConfig } from "./config";
import { type Driver, type NavigationResult, safeCurrentUrl } from "./driver";
import {
	AssertionFailure,
	errorMessage,
	SpanStateError,
	TestSkipped,
} from "./errors";
import {
	ATTR_TEST_ACTION_ACTUAL,
	ATTR_TEST_ACTION_EXPECTED,
	ATTR_TEST_ACTION_INPUT_VALUE,
	ATTR_TEST_CASE_DESCRIPTION,
	ATTR_TEST_CASE_FAILURE_REASON,
	ATTR_TEST_CASE_FAILURE_URL,
	ATTR_TEST_CASE_ID,
	ATTR_TEST_CASE_NAME,
	ATTR_TEST_CASE_RESULT,
	ATTR_TEST_CASE_SCREENSHOT_PATH,
	ATTR_TEST_CASE_SKIP_REASON,
	ATTR_TEST_CASE_TAGS,
	ATTR_TEST_NAVIGATION_DOM_CONTENT_LOADED_MS,
	ATTR_TEST_NAVIGATION_DOM_INTERACTIVE_MS,
	ATTR_TEST_NAVIGATION_LOAD_EVENT_MS,
	ATTR_TEST_NAVIGATION_RESPONSE_STATUS,
	ATTR_TEST_NAVIGATION_TRANSFER_SIZE_BYTES,
	testSpanName,
} from "./otel-attributes";
import { redactValue, shouldRedact } from "./redaction";
import type { AttributeValue, Attributes, SpanRecorder } from "./span-recorder";

export interface TestCaseInfo {
	name: string;
	id?: string;
	tags?: string | string[];
	description?: string;
}

export type TestCaseOutcome = "passed" | "failed" | "skipped";

export type TestCaseState = "created" | "running" | TestCaseOutcome;

export interface FillOptions {
	/** Redact the value even when the selector doesn't look sensitive. */
	sensitive?: boolean;
}

/**
 * What a test case needs from the suite that owns it.
 */
export interface TestCaseHost {
	readonly recorder: SpanRecorder;
	readonly suiteSpanId: string;
	readonly config: Readonly<ResolvedConfig>;
	readonly runId: string;
	/** Throws when another test case of the suite is still running. */
	begin(test: TestCaseController): void;
	report(test: TestCaseController, outcome: TestCaseOutcome): void;
}

/**
 * One test case: owns the `test("{name}")` span and parents every action
 * run through it.
 *
 * A failure inside the test is recorded on the span and then rethrown; the
 * surrounding test framework decides what to do with it.
 */
export class TestCaseController {
	private currentState: TestCaseState = "created";
	private spanId?: string;
	private actions?: ActionController;

	constructor(
		private host: TestCaseHost,
		readonly info: TestCaseInfo,
		private actionDriver: Driver,
	) {}

	get state(): TestCaseState {
		return this.currentState;
	}

	/** The driver actions run against, for work the built-in actions don't cover. */
	get driver(): Driver {
		return this.actionDriver;
	}

	/** Span id of the test case, once started. */
	get id(): string | undefined {
		return this.spanId;
	}

	/**
	 * Run `body` as this test case. Resolves with the body's value, or with
	 * `undefined` when the body skipped the test.
	 */
	async run<T>(
		body: (test: TestCaseController) => Promise<T>,
	): Promise<T | undefined> {
		this.start();
		let value: T;
		try {
			value = await body(this);
		} catch (error) {
			const outcome = await this.fail(error);
			if (outcome === "skipped") {
				return undefined;
			}
			throw error;
		}
		await this.finish();
		return value;
	}

	start(): void {
		if (this.currentState !== "created") {
			throw new SpanStateError(
				`Test case "${this.info.name}" was already started`,
			);
		}
		this.host.begin(this);

		const attributes: Attributes = {
			[ATTR_TEST_CASE_NAME]: this.info.name,
		};
		if (this.info.id) {
			attributes[ATTR_TEST_CASE_ID] = this.info.id;
		}
		const tags = Array.isArray(this.info.tags)
			? this.info.tags.join(",")
			: this.info.tags;
		if (tags) {
			attributes[ATTR_TEST_CASE_TAGS] = tags;
		}
		if (this.info.description) {
			attributes[ATTR_TEST_CASE_DESCRIPTION] = this.info.description;
		}

		const spanId = this.host.recorder.open(
			this.host.suiteSpanId,
			testSpanName(this.info.name),
			attributes,
		);
		this.spanId = spanId;
		this.actions = new ActionController(
			this.host.recorder,
			spanId,
			this.actionDriver,
			this.host.config.actionTimeoutMs,
		);
		this.currentState = "running";
	}

	/** End the test case as passed. */
	async finish(): Promise<TestCaseOutcome> {
		return this.end("passed", undefined);
	}

	/**
	 * End the test case with whatever the body threw: a {@link TestSkipped}
	 * means skipped, any other value (`undefined` included) failed.
	 */
	async fail(error: unknown): Promise<TestCaseOutcome> {
		return this.end(error instanceof TestSkipped ? "skipped" : "failed", error);
	}

	private async end(
		outcome: TestCaseOutcome,
		error: unknown,
	): Promise<TestCaseOutcome> {
		const spanId = this.requireRunning("finish");
		const { recorder } = this.host;

		// Closed from outside (orphan cleanup): report, but record nothing
		if (recorder.isOpen(spanId)) {
			recorder.setAttribute(spanId, ATTR_TEST_CASE_RESULT, outcome);
			if (outcome === "passed") {
				recorder.setStatus(spanId, "ok");
			} else if (outcome === "skipped") {
				recorder.setAttribute(
					spanId,
					ATTR_TEST_CASE_SKIP_REASON,
					errorMessage(error),
				);
				recorder.setStatus(spanId, "ok");
			} else {
				this.recordFailure(spanId, error);
			}

			await this.captureScreenshot(spanId, outcome);
			await recorder.close(spanId);
		}

		this.currentState = outcome;
		this.host.report(this, outcome);
		return outcome;
	}

	/** Set a custom attribute on the test case span. */
	setAttribute(key: string, value: AttributeValue): void {
		const spanId = this.requireRunning("set attribute");
		this.host.recorder.setAttribute(spanId, key, value);
	}

	/** End the test case as skipped. */
	skip(reason = "skipped"): never {
		throw new TestSkipped(reason);
	}

	async navigate(url: string): Promise<NavigationResult> {
		const { value } = await this.requireActions().run(
			"navigate",
			{ targetUrl: url },
			async (step) => {
				const result = await this.actionDriver.navigate(url);
				if (result.status !== undefined) {
					step.set(ATTR_TEST_NAVIGATION_RESPONSE_STATUS, result.status);
				}
				if (result.timing) {
					step.setAttributes({
						[ATTR_TEST_NAVIGATION_DOM_CONTENT_LOADED_MS]:
							result.timing.domContentLoadedMs,
						[ATTR_TEST_NAVIGATION_DOM_INTERACTIVE_MS]:
							result.timing.domInteractiveMs,
						[ATTR_TEST_NAVIGATION_LOAD_EVENT_MS]: result.timing.loadEventMs,
						[ATTR_TEST_NAVIGATION_TRANSFER_SIZE_BYTES]:
							result.timing.transferSizeBytes,
					});
				}
				return result;
			},
		);
		return value;
	}

	async click(selector: string): Promise<void> {
		const timeoutMs = this.host.config.actionTimeoutMs;
		await this.requireActions().run("click", { selector }, async (step) => {
			await step.waitFor(selector, "visible");
			await this.actionDriver.click(selector, timeoutMs);
		});
	}

	async fill(
		selector: string,
		value: string,
		{ sensitive = false }: FillOptions = {},
	): Promise<void> {
		const timeoutMs = this.host.config.actionTimeoutMs;
		const redact = shouldRedact(selector, sensitive);
		await this.requireActions().run(
			"fill",
			{ selector },
			async (step) => {
				await step.waitFor(selector, "visible");
				await this.actionDriver.fill(selector, value, timeoutMs);
			},
			{
				attributes: {
					[ATTR_TEST_ACTION_INPUT_VALUE]: redact ? redactValue(value) : value,
				},
				secret: redact ? value : undefined,
			},
		);
	}

	async assertVisible(selector: string): Promise<void> {
		await this.requireActions().run(
			"assert_visible",
			{ selector },
			async (step) => {
				await step.waitFor(selector, "visible");
			},
		);
	}

	/** Case-insensitive "contains" check on the element's text. */
	async assertText(selector: string, expected: string): Promise<void> {
		await this.requireActions().run(
			"assert_text",
			{ selector },
			async (step) => {
				step.set(ATTR_TEST_ACTION_EXPECTED, expected);
				await step.waitFor(selector, "visible");
				const text = await this.actionDriver.getText(selector);
				if (!text.toLowerCase().includes(expected.toLowerCase())) {
					throw new AssertionFailure(`Expected '${expected}' in '${text}'`);
				}
			},
		);
	}

	async assertCount(selector: string, expected: number): Promise<void> {
		await this.requireActions().run(
			"assert_count",
			{ selector },
			async (step) => {
				const actual = await this.actionDriver.countMatches(selector);
				step.setAttributes({
					[ATTR_TEST_ACTION_EXPECTED]: expected,
					[ATTR_TEST_ACTION_ACTUAL]: actual,
				});
				if (actual !== expected) {
					throw new AssertionFailure(
						`Expected ${expected} elements matching '${selector}', got ${actual}`,
					);
				}
			},
		);
	}

	/** Passes when the current URL contains `pattern`. */
	async assertUrl(pattern: string): Promise<void> {
		await this.requireActions().run("assert_url", {}, async (step) => {
			const url = this.actionDriver.currentUrl();
			step.set(ATTR_TEST_ACTION_EXPECTED, pattern);
			if (!url.includes(pattern)) {
				throw new AssertionFailure(`Expected '${pattern}' in URL, got ${url}`);
			}
		});
	}

	/**
	 * Wrap a custom block in an action span, e.g. for page interactions the
	 * built-in actions don't cover.
	 */
	async action<T>(
		type: ActionType,
		selector: string | undefined,
		operation: ActionOperation<T>,
	): Promise<T> {
		const { value } = await this.requireActions().run(
			type,
			{ selector },
			operation,
		);
		return value;
	}

	private recordFailure(spanId: string, error: unknown) {
		const { recorder, config } = this.host;
		const reason =
			error === undefined || error === null
				? `Test case threw ${error}`
				: errorMessage(error);
		recorder.setAttribute(spanId, ATTR_TEST_CASE_FAILURE_REASON, reason);
		const url = safeCurrentUrl(this.actionDriver);
		if (url) {
			recorder.setAttribute(spanId, ATTR_TEST_CASE_FAILURE_URL, url);
		}
		recorder.setStatus(spanId, "error", reason);

		const label = this.info.id || this.info.name;
		console.error(
			`Test case FAILED: ${label} [${config.suiteName}] ${reason} (url=${url ?? "unknown"}, trace_id=${recorder.traceId}, span_id=${spanId})`,
		);
	}

	private async captureScreenshot(spanId: string, outcome: TestCaseOutcome) {
		const { config, recorder, runId } = this.host;
		const wanted =
			config.screenshots === "on" ||
			(config.screenshots === "only-on-failure" && outcome === "failed");
		if (!wanted || !this.actionDriver.screenshot) {
			return;
		}

		const filePath = path.join(
			config.screenshotDir,
			`${runId}-${slugify(this.info.id || this.info.name)}.png`,
		);
		try {
			await this.actionDriver.screenshot(filePath);
			recorder.setAttribute(spanId, ATTR_TEST_CASE_SCREENSHOT_PATH, filePath);
		} catch (error) {
			console.warn(
				`Failed to capture screenshot for "${this.info.name}": ${errorMessage(error)}`,
			);
		}
	}

	private requireRunning(operation: string): string {
		if (this.currentState !== "running" || !this.spanId) {
			throw new SpanStateError(
				`Cannot ${operation}: test case "${this.info.name}" is ${this.currentState}, not running`,
			);
		}
		return this.spanId;
	}

	private requireActions(): ActionController {
		this.requireRunning("run an action");
		if (!this.actions) {
			throw new SpanStateError(
				`Test case "${this.info.name}" has no action context`,
			);
		}
		return this.actions;
	}
}

function slugify(value: string): string {
	return (
		value
			.toLowerCase()
			.replace(/[^a-z0-9]+/g, "-")
			.replace(/^-+|-+$/g, "") || "test"
	);
}
