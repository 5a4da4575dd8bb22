import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { BrowserLauncher } from "../src/browser";
import { SpanStateError } from "../src/errors";
import { InMemorySpanExporter } from "../src/exporters/in-memory";
import {
	computeSuiteResult,
	ORPHANED_AT_SUITE_END,
	runSuite,
	SuiteController,
	type SuiteResult,
} from "../src/suite";
import {
	createTestSuite,
	FailingExporter,
	FakeDriver,
	spanNamed,
	steppingClock,
} from "./harness";

describe("computeSuiteResult", () => {
	it.each<[number, number, SuiteResult]>([
		[3, 0, "passed"],
		[0, 2, "failed"],
		[1, 1, "partial"],
		[0, 0, "partial"],
	])("%i passed, %i failed is %s", (passed, failed, expected) => {
		expect(computeSuiteResult(passed, failed)).toBe(expected);
	});
});

describe("SuiteController", () => {
	beforeEach(() => {
		vi.spyOn(console, "error").mockImplementation(() => {});
		vi.spyOn(console, "warn").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	it("writes the run metadata and tallies on the root span", async () => {
		const { suite, exporter } = createTestSuite({
			now: steppingClock(),
			baseUrl: "http://localhost:8080",
			environment: "staging",
			trigger: "ci",
			vcs: { "vcs.commit.sha": "abc123", "vcs.branch": "main" },
		});
		await suite.start();
		const summary = await suite.finish();

		const root = spanNamed(exporter, 'suite("smoke")');
		expect(root.parentSpanId).toBeUndefined();
		expect(root.traceId).toBe(summary.traceId);
		expect(root.startTime.toISOString()).toBe("2025-11-06T10:00:00.100Z");
		expect(root.attributes).toEqual({
			"test.suite.name": "smoke",
			"test.suite.id": suite.runId,
			"test.run.trigger": "ci",
			"test.run.timestamp": "2025-11-06T10:00:00.000Z",
			"test.target.base_url": "http://localhost:8080",
			"test.target.environment": "staging",
			"test.browser.name": "chromium",
			"test.browser.headless": true,
			"test.viewport.width": 1280,
			"test.viewport.height": 720,
			"vcs.commit.sha": "abc123",
			"vcs.branch": "main",
			"test.suite.total_tests": 0,
			"test.suite.passed": 0,
			"test.suite.failed": 0,
			"test.suite.skipped": 0,
			"test.suite.result": "partial",
		});
		expect(root.status).toEqual({ code: 1 });
		expect(summary).toEqual({
			runId: suite.runId,
			traceId: root.traceId,
			total: 0,
			passed: 0,
			failed: 0,
			skipped: 0,
			result: "partial",
		});
	});

	it("reports a mixed run as partial", async () => {
		const { suite, exporter } = createTestSuite();
		await suite.start();

		await suite.runTest({ name: "home" }, async (t) => {
			await t.navigate("http://localhost:8080/");
		});
		await expect(
			suite.runTest({ name: "checkout" }, async (t) => {
				await t.fill("input#card-number", "4111111111111111");
				throw new Error("payment declined");
			}),
		).rejects.toThrow("payment declined");
		await suite.runTest({ name: "beta" }, async (t) => t.skip());
		const summary = await suite.finish();

		expect(summary).toMatchObject({
			total: 2,
			passed: 1,
			failed: 1,
			skipped: 1,
			result: "partial",
		});
		const root = spanNamed(exporter, 'suite("smoke")');
		expect(root.attributes["test.suite.result"]).toBe("partial");
		expect(root.attributes["test.suite.total_tests"]).toBe(2);
		expect(root.status).toEqual({
			code: 2,
			message: "1 test case(s) failed",
		});
	});

	it("records a passing and a failing test case as a partial run", async () => {
		const { suite, exporter, driver } = createTestSuite();
		driver.texts.set("h1", "Welcome to the shop");
		await suite.start();

		await suite.runTest({ name: "browse" }, async (t) => {
			await t.navigate("http://localhost:8080/");
			await t.assertVisible("h1");
			await t.assertText("h1", "welcome");
		});
		driver.clickError = new Error('No element matches selector "#missing"');
		await expect(
			suite.runTest({ name: "buy" }, async (t) => {
				await t.navigate("http://localhost:8080/cart");
				await t.click("#missing");
			}),
		).rejects.toThrow('No element matches selector "#missing"');
		const summary = await suite.finish();

		expect(summary).toMatchObject({
			result: "partial",
			passed: 1,
			failed: 1,
		});
		const root = spanNamed(exporter, 'suite("smoke")');
		expect(root.attributes).toMatchObject({
			"test.suite.total_tests": 2,
			"test.suite.passed": 1,
			"test.suite.failed": 1,
			"test.suite.result": "partial",
		});

		const buy = spanNamed(exporter, 'test("buy")');
		expect(buy.attributes["test.case.result"]).toBe("failed");
		expect(buy.attributes["test.case.failure_reason"]).toBe(
			'No element matches selector "#missing"',
		);
		const [firstAction, failedAction] = exporter
			.getFinishedSpans()
			.filter((span) => span.parentSpanId === buy.spanId);
		expect(firstAction.name).toBe("navigate");
		expect(firstAction.attributes["test.action.result"]).toBe("success");
		expect(failedAction.name).toBe("click(#missing)");
		expect(failedAction.attributes["test.action.result"]).toBe("failed");
		expect(failedAction.status).toEqual({
			code: 2,
			message: 'No element matches selector "#missing"',
		});

		const browse = spanNamed(exporter, 'test("browse")');
		expect(
			exporter
				.getFinishedSpans()
				.filter((span) => span.parentSpanId === browse.spanId)
				.map((span) => span.attributes["test.action.result"]),
		).toEqual(["success", "success", "success"]);
	});

	it("reports a run where nothing passed as failed", async () => {
		const { suite } = createTestSuite();
		await suite.start();

		await expect(
			suite.runTest({ name: "login" }, async () => {
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");

		expect((await suite.finish()).result).toBe("failed");
	});

	it("builds one tree per run, children inside their parents", async () => {
		const { suite, exporter } = createTestSuite({ now: steppingClock() });
		await suite.start();

		await suite.runTest({ name: "login" }, async (t) => {
			await t.navigate("http://localhost:8080/login");
			await t.fill("#email", "alice@example.com");
			await t.click("button[type=submit]");
		});
		await suite.runTest({ name: "logout" }, async (t) => {
			await t.click("#logout");
		});
		await suite.finish();

		const spans = exporter.getFinishedSpans();
		expect(spans).toHaveLength(7);
		expect(new Set(spans.map((span) => span.traceId)).size).toBe(1);

		const roots = spans.filter((span) => span.parentSpanId === undefined);
		expect(roots.map((span) => span.name)).toEqual(['suite("smoke")']);

		const byId = new Map(spans.map((span) => [span.spanId, span]));
		for (const span of spans) {
			if (span.parentSpanId === undefined) {
				continue;
			}
			const parent = byId.get(span.parentSpanId);
			expect(parent).toBeDefined();
			if (parent) {
				expect(span.startTime.getTime()).toBeGreaterThanOrEqual(
					parent.startTime.getTime(),
				);
				expect(span.endTime.getTime()).toBeLessThanOrEqual(
					parent.endTime.getTime(),
				);
			}
		}

		const login = spanNamed(exporter, 'test("login")');
		expect(
			spans
				.filter((span) => span.parentSpanId === login.spanId)
				.map((span) => span.name),
		).toEqual(["navigate", "fill(#email)", "click(button[type=submit])"]);
	});

	it("finishes even when the exporter is unreachable", async () => {
		const exporter = new FailingExporter();
		const suite = new SuiteController({
			suiteName: "smoke",
			exporter,
			driver: new FakeDriver(),
			vcs: false,
			env: {},
		});
		await suite.start();

		await suite.runTest({ name: "login" }, async (t) => {
			await t.click("#login");
		});
		const summary = await suite.finish();

		expect(summary.result).toBe("passed");
		expect(exporter.pushes).toBe(3);
		expect(exporter.shutdowns).toBe(1);
		expect(console.warn).toHaveBeenCalledWith(
			'Failed to export span "test("login")": collector unavailable',
		);
		expect(console.warn).toHaveBeenCalledWith(
			"Failed to shut down the exporter: connection reset",
		);
	});

	it("closes test cases still open when the suite finishes", async () => {
		const { suite, exporter } = createTestSuite();
		await suite.start();
		const hung = suite.testCase({ name: "hung" });
		hung.start();

		const summary = await suite.finish();

		expect(summary.total).toBe(0);
		expect(spanNamed(exporter, 'test("hung")').status).toEqual({
			code: 2,
			message: ORPHANED_AT_SUITE_END,
		});
		expect(console.warn).toHaveBeenCalledWith(
			`Closing 1 orphaned span(s) (${ORPHANED_AT_SUITE_END}): test("hung")`,
		);

		// A late finish changes neither the span nor the totals
		expect(await hung.finish()).toBe("passed");
		expect(suite.passed).toBe(0);
		expect(exporter.getFinishedSpans()).toHaveLength(2);
	});

	it("rejects overlapping test cases", async () => {
		const { suite } = createTestSuite();
		await suite.start();
		const first = suite.testCase({ name: "first" });
		const second = suite.testCase({ name: "second" });

		first.start();
		expect(() => second.start()).toThrow(
			'Cannot start test case "second" while "first" is running',
		);

		await first.finish();
		second.start();
		await second.finish();
		expect(suite.passed).toBe(2);
	});

	it("enforces its own lifecycle", async () => {
		const { suite } = createTestSuite();

		expect(() => suite.testCase({ name: "early" })).toThrow(
			'Suite "smoke" is created, not running',
		);
		await expect(suite.finish()).rejects.toThrow(SpanStateError);

		await suite.start();
		await expect(suite.start()).rejects.toThrow(
			'Suite "smoke" was already started',
		);

		const summary = await suite.finish();
		expect(await suite.finish()).toBe(summary);
		expect(suite.state).toBe("finalized");
		expect(() => suite.testCase({ name: "late" })).toThrow(
			'Suite "smoke" is finalized, not running',
		);
	});

	it("launches a browser when no driver is given and closes it", async () => {
		const driver = new FakeDriver();
		const close = vi.fn(async () => {});
		const launcher = vi.fn<BrowserLauncher>(async () => ({ driver, close }));
		const suite = new SuiteController({
			suiteName: "smoke",
			browser: "firefox",
			exporter: new InMemorySpanExporter(),
			launcher,
			vcs: false,
			env: {},
		});

		await suite.start();
		await suite.runTest({ name: "home" }, async (t) => {
			await t.navigate("http://localhost:8080/");
		});
		await suite.finish();

		expect(launcher).toHaveBeenCalledTimes(1);
		expect(launcher.mock.calls[0][0].browser).toBe("firefox");
		expect(driver.calls).toEqual(["navigate http://localhost:8080/"]);
		expect(close).toHaveBeenCalledTimes(1);
	});

	it("records a failed browser launch on the root span", async () => {
		const exporter = new InMemorySpanExporter();
		const suite = new SuiteController({
			suiteName: "smoke",
			exporter,
			launcher: async () => {
				throw new Error("browser not installed");
			},
			vcs: false,
			env: {},
		});

		await expect(suite.start()).rejects.toThrow("browser not installed");

		expect(spanNamed(exporter, 'suite("smoke")').status).toEqual({
			code: 2,
			message: "Browser launch failed: browser not installed",
		});
		expect(exporter.isShutdown).toBe(true);
		expect(suite.state).toBe("created");
	});

	it("needs a driver per test case when launching is off", async () => {
		const exporter = new InMemorySpanExporter();
		const suite = new SuiteController({
			suiteName: "smoke",
			exporter,
			launch: false,
			vcs: false,
			env: {},
		});
		await suite.start();

		expect(() => suite.testCase({ name: "login" })).toThrow(
			'Test case "login" has no driver: pass one to the suite or the test case',
		);

		const driver = new FakeDriver();
		await suite.runTest(
			{ name: "login" },
			async (t) => {
				await t.click("#login");
			},
			{ driver },
		);
		expect(driver.calls).toEqual(["wait #login visible", "click #login"]);
		await suite.finish();
	});

	it("warns about malformed environment values and keeps going", () => {
		const suite = new SuiteController({
			env: { PLAYWRIGHT_OTEL_BROWSER: "netscape" },
			vcs: false,
		});

		expect(suite.config.browser).toBe("chromium");
		expect(console.warn).toHaveBeenCalledWith(
			expect.stringMatching(
				/^Ignoring PLAYWRIGHT_OTEL_BROWSER="netscape" \(.+\), using the default$/,
			),
		);
	});

	it("sends spans over OTLP/HTTP by default", async () => {
		const mockFetch = vi.fn();
		mockFetch.mockResolvedValue({ ok: true, status: 200 });
		global.fetch = mockFetch;
		const suite = new SuiteController({
			driver: new FakeDriver(),
			vcs: false,
			env: {
				OTEL_EXPORTER_OTLP_ENDPOINT: "http://collector:4318",
				OTEL_EXPORTER_OTLP_HEADERS: "x-api-key=test-secret",
				OTEL_SERVICE_NAME: "checkout-e2e",
			},
		});

		await suite.start();
		await suite.runTest({ name: "home" }, async () => {});
		await suite.finish();

		expect(mockFetch).toHaveBeenCalledTimes(1);
		const [url, init] = mockFetch.mock.calls[0];
		expect(url).toBe("http://collector:4318/v1/traces");
		expect(init.headers).toEqual({
			"content-type": "application/json",
			"x-api-key": "test-secret",
		});
		const body = JSON.parse(init.body);
		expect(body.resourceSpans[0].resource.attributes[0]).toEqual({
			key: "service.name",
			value: { stringValue: "checkout-e2e" },
		});
		expect(
			body.resourceSpans[0].scopeSpans[0].spans.map(
				(span: { name: string }) => span.name,
			),
		).toEqual(['test("home")', 'suite("default")']);
	});

	it("completes the run while the collector never answers", async () => {
		const mockFetch = vi.fn();
		mockFetch.mockImplementation(
			(_url: string, init: RequestInit) =>
				new Promise((_resolve, reject) => {
					init.signal?.addEventListener("abort", () =>
						reject(init.signal?.reason),
					);
				}),
		);
		global.fetch = mockFetch;
		const suite = new SuiteController({
			driver: new FakeDriver(),
			vcs: false,
			env: {
				OTEL_EXPORTER_OTLP_ENDPOINT: "http://collector:4318",
				OTEL_EXPORTER_OTLP_TIMEOUT: "20",
			},
		});

		await suite.start();
		await suite.runTest({ name: "many clicks" }, async (t) => {
			for (let i = 0; i < 70; i++) {
				await t.click("#next");
			}
		});
		const summary = await suite.finish();

		expect(summary.result).toBe("passed");
		// 72 spans: one full batch of 64 sent mid-test, the rest at shutdown
		expect(mockFetch).toHaveBeenCalledTimes(2);
		expect(console.warn).toHaveBeenCalledWith(
			expect.stringMatching(
				/^Failed to shut down the exporter: 2 batch\(es\) failed to send: /,
			),
		);
	});
});

describe("runSuite", () => {
	it("finishes the suite when the body throws", async () => {
		const exporter = new InMemorySpanExporter();

		await expect(
			runSuite(
				{
					suiteName: "smoke",
					exporter,
					driver: new FakeDriver(),
					vcs: false,
					env: {},
				},
				async () => {
					throw new Error("setup broke");
				},
			),
		).rejects.toThrow("setup broke");

		expect(exporter.isShutdown).toBe(true);
		expect(exporter.findSpan('suite("smoke")')?.attributes).toMatchObject({
			"test.suite.result": "partial",
		});
	});

	it("returns the body's value", async () => {
		const exporter = new InMemorySpanExporter();

		const summary = await runSuite(
			{
				suiteName: "smoke",
				exporter,
				driver: new FakeDriver(),
				vcs: false,
				env: {},
			},
			async (suite) => {
				await suite.runTest({ name: "login" }, async () => {});
				return { passed: suite.passed };
			},
		);

		expect(summary).toEqual({ passed: 1 });
	});
});
