import { randomUUID } from "node:crypto";
import type { Page } from "@playwright/test";
import {
	type BrowserLauncher,
	type BrowserSession,
	launchBrowser,
} from "./browser";
import {
	type ConfigOptions,
	type ResolvedConfig,
	resolveConfig,
} from "./config";
import type { Driver } from "./driver";
import { errorMessage, SpanStateError } from "./errors";
import { OtlpHttpExporter } from "./exporters/otlp-http";
import type { SpanExporter } from "./exporters/types";
import {
	ATTR_TEST_BROWSER_HEADLESS,
	ATTR_TEST_BROWSER_NAME,
	ATTR_TEST_RUN_TIMESTAMP,
	ATTR_TEST_RUN_TRIGGER,
	ATTR_TEST_SUITE_FAILED,
	ATTR_TEST_SUITE_ID,
	ATTR_TEST_SUITE_NAME,
	ATTR_TEST_SUITE_PASSED,
	ATTR_TEST_SUITE_RESULT,
	ATTR_TEST_SUITE_SKIPPED,
	ATTR_TEST_SUITE_TOTAL_TESTS,
	ATTR_TEST_TARGET_BASE_URL,
	ATTR_TEST_TARGET_ENVIRONMENT,
	ATTR_TEST_VIEWPORT_HEIGHT,
	ATTR_TEST_VIEWPORT_WIDTH,
	suiteSpanName,
} from "./otel-attributes";
import { type Attributes, SpanRecorder } from "./span-recorder";
import {
	TestCaseController,
	type TestCaseHost,
	type TestCaseInfo,
	type TestCaseOutcome,
} from "./test-case";
import { getGitInfo, type VcsInfo } from "./vcs";

export interface SuiteOptions extends ConfigOptions {
	/** Where completed spans go. Defaults to OTLP/HTTP at `otlpEndpoint`. */
	exporter?: SpanExporter;
	/** Drive this instead of launching a browser. */
	driver?: Driver;
	/**
	 * Launch a browser when no `driver` is given. With `false`, every test
	 * case must bring its own driver. Defaults to `true`.
	 */
	launch?: boolean;
	launcher?: BrowserLauncher;
	/** VCS attributes for the root span; discovered from git when omitted. */
	vcs?: VcsInfo | false;
	env?: NodeJS.ProcessEnv;
	now?: () => Date;
}

export interface TestCaseOptions {
	/** Driver for this test case only, e.g. a per-test page. */
	driver?: Driver;
}

export type SuiteState = "created" | "running" | "finalized";

export type SuiteResult = "passed" | "failed" | "partial";

export interface SuiteSummary {
	runId: string;
	traceId: string;
	total: number;
	passed: number;
	failed: number;
	skipped: number;
	result: SuiteResult;
}

export const ORPHANED_AT_SUITE_END = "orphaned: suite finished first";

/**
 * `passed` when nothing failed, `failed` when nothing passed, `partial`
 * otherwise (including an empty run).
 */
export function computeSuiteResult(passed: number, failed: number): SuiteResult {
	const total = passed + failed;
	if (total > 0 && failed === 0) {
		return "passed";
	}
	if (total > 0 && passed === 0) {
		return "failed";
	}
	return "partial";
}

/**
 * Root of a suite run's trace. Owns the root span, the pass/fail tallies,
 * the exporter, and the browser when it launched one.
 */
export class SuiteController {
	readonly runId: string = randomUUID();
	readonly config: Readonly<ResolvedConfig>;

	private currentState: SuiteState = "created";
	private exporter?: SpanExporter;
	private recorder?: SpanRecorder;
	private rootSpanId?: string;
	private session?: BrowserSession;
	private driver?: Driver;
	private activeTest?: TestCaseController;
	private reported: WeakSet<TestCaseController> = new WeakSet();
	private counts = { passed: 0, failed: 0, skipped: 0 };
	private summary?: SuiteSummary;

	constructor(private options: SuiteOptions = {}) {
		this.config = resolveConfig(options, {
			env: options.env,
			onInvalid: (issue) =>
				console.warn(
					`Ignoring ${issue.variable}="${issue.value}" (${issue.message}), using the default`,
				),
		});
	}

	get state(): SuiteState {
		return this.currentState;
	}

	get traceId(): string | undefined {
		return this.recorder?.traceId;
	}

	/** Page of the browser this suite launched, if it launched one. */
	get page(): Page | undefined {
		return this.session?.page;
	}

	get passed(): number {
		return this.counts.passed;
	}

	get failed(): number {
		return this.counts.failed;
	}

	get skipped(): number {
		return this.counts.skipped;
	}

	get total(): number {
		return this.counts.passed + this.counts.failed;
	}

	async start(): Promise<this> {
		if (this.currentState !== "created") {
			throw new SpanStateError(
				`Suite "${this.config.suiteName}" was already started`,
			);
		}
		const { config } = this;

		const exporter =
			this.options.exporter ??
			new OtlpHttpExporter({
				endpoint: config.otlpEndpoint,
				headers: { ...config.otlpHeaders },
				serviceName: config.serviceName,
				environment: config.environment,
				timeoutMs: config.otlpTimeoutMs,
				debug: config.debug,
			});
		const recorder = new SpanRecorder({ exporter, now: this.options.now });
		const startedAt = (this.options.now ?? (() => new Date()))();

		const attributes: Attributes = {
			[ATTR_TEST_SUITE_NAME]: config.suiteName,
			[ATTR_TEST_SUITE_ID]: this.runId,
			[ATTR_TEST_RUN_TRIGGER]: config.trigger,
			[ATTR_TEST_RUN_TIMESTAMP]: startedAt.toISOString(),
			[ATTR_TEST_TARGET_BASE_URL]: config.baseUrl,
			[ATTR_TEST_TARGET_ENVIRONMENT]: config.environment,
			[ATTR_TEST_BROWSER_NAME]: config.browser,
			[ATTR_TEST_BROWSER_HEADLESS]: config.headless,
			[ATTR_TEST_VIEWPORT_WIDTH]: config.viewportWidth,
			[ATTR_TEST_VIEWPORT_HEIGHT]: config.viewportHeight,
		};
		const vcs =
			this.options.vcs === undefined ? getGitInfo() : this.options.vcs;
		if (vcs) {
			for (const [key, value] of Object.entries(vcs)) {
				if (value) {
					attributes[key] = value;
				}
			}
		}

		const rootSpanId = recorder.open(
			null,
			suiteSpanName(config.suiteName),
			attributes,
		);

		if (this.options.driver) {
			this.driver = this.options.driver;
		} else if (this.options.launch !== false) {
			try {
				this.session = await (this.options.launcher ?? launchBrowser)(config);
			} catch (error) {
				recorder.setStatus(
					rootSpanId,
					"error",
					`Browser launch failed: ${errorMessage(error)}`,
				);
				await recorder.close(rootSpanId);
				await shutdownExporter(exporter);
				throw error;
			}
			this.driver = this.session.driver;
		}

		this.exporter = exporter;
		this.recorder = recorder;
		this.rootSpanId = rootSpanId;
		this.currentState = "running";
		return this;
	}

	/**
	 * Create a test case parented to the suite span. It starts when run.
	 */
	testCase(
		info: TestCaseInfo,
		options: TestCaseOptions = {},
	): TestCaseController {
		const host = this.host();
		const driver = options.driver ?? this.driver;
		if (!driver) {
			throw new SpanStateError(
				`Test case "${info.name}" has no driver: pass one to the suite or the test case`,
			);
		}
		return new TestCaseController(host, info, driver);
	}

	/** Create and run a test case. Failures propagate after being recorded. */
	async runTest<T>(
		info: TestCaseInfo,
		body: (test: TestCaseController) => Promise<T>,
		options: TestCaseOptions = {},
	): Promise<T | undefined> {
		return this.testCase(info, options).run(body);
	}

	/**
	 * Finalize the run: close leftover spans, write the tallies and result,
	 * close the root span, then release the browser and the exporter.
	 * Calling it again returns the same summary.
	 */
	async finish(): Promise<SuiteSummary> {
		if (this.summary) {
			return this.summary;
		}
		const { recorder, rootSpanId, exporter } = this;
		if (
			this.currentState !== "running" ||
			!recorder ||
			!rootSpanId ||
			!exporter
		) {
			throw new SpanStateError(
				`Suite "${this.config.suiteName}" is ${this.currentState}, not running`,
			);
		}

		await recorder.closeOrphans(ORPHANED_AT_SUITE_END);
		this.activeTest = undefined;

		const { passed, failed, skipped } = this.counts;
		const result = computeSuiteResult(passed, failed);
		recorder.setAttributes(rootSpanId, {
			[ATTR_TEST_SUITE_TOTAL_TESTS]: passed + failed,
			[ATTR_TEST_SUITE_PASSED]: passed,
			[ATTR_TEST_SUITE_FAILED]: failed,
			[ATTR_TEST_SUITE_SKIPPED]: skipped,
			[ATTR_TEST_SUITE_RESULT]: result,
		});
		if (failed > 0) {
			recorder.setStatus(rootSpanId, "error", `${failed} test case(s) failed`);
		} else {
			recorder.setStatus(rootSpanId, "ok");
		}
		await recorder.close(rootSpanId);
		this.currentState = "finalized";

		if (this.session) {
			try {
				await this.session.close();
			} catch (error) {
				console.warn(`Failed to close the browser: ${errorMessage(error)}`);
			}
		}
		await shutdownExporter(exporter);

		this.summary = {
			runId: this.runId,
			traceId: recorder.traceId,
			total: passed + failed,
			passed,
			failed,
			skipped,
			result,
		};
		return this.summary;
	}

	private host(): TestCaseHost {
		const { recorder, rootSpanId } = this;
		if (this.currentState !== "running" || !recorder || !rootSpanId) {
			throw new SpanStateError(
				`Suite "${this.config.suiteName}" is ${this.currentState}, not running`,
			);
		}
		return {
			recorder,
			suiteSpanId: rootSpanId,
			config: this.config,
			runId: this.runId,
			begin: (test) => {
				if (this.currentState !== "running") {
					throw new SpanStateError(
						`Cannot start test case "${test.info.name}": suite is ${this.currentState}`,
					);
				}
				if (this.activeTest && this.activeTest.state === "running") {
					throw new SpanStateError(
						`Cannot start test case "${test.info.name}" while "${this.activeTest.info.name}" is running`,
					);
				}
				this.activeTest = test;
			},
			report: (test, outcome) => this.report(test, outcome),
		};
	}

	private report(test: TestCaseController, outcome: TestCaseOutcome) {
		if (this.reported.has(test)) {
			return;
		}
		this.reported.add(test);
		if (this.activeTest === test) {
			this.activeTest = undefined;
		}
		// Outcomes reported after the suite finished no longer change the totals
		if (this.currentState !== "running") {
			return;
		}
		this.counts[outcome] += 1;
	}
}

/**
 * Run `body` inside a suite: start, run, and always finish, whether the
 * body returns or throws.
 */
export async function runSuite<T>(
	options: SuiteOptions,
	body: (suite: SuiteController) => Promise<T>,
): Promise<T> {
	const suite = new SuiteController(options);
	await suite.start();
	try {
		return await body(suite);
	} finally {
		await suite.finish();
	}
}

async function shutdownExporter(exporter: SpanExporter) {
	try {
		const result = await exporter.shutdown();
		if (!result.ok) {
			console.warn(`Failed to shut down the exporter: ${result.error.message}`);
		}
	} catch (error) {
		console.warn(`Failed to shut down the exporter: ${errorMessage(error)}`);
	}
}
