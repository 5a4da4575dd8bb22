import { test as base } from "@playwright/test";
import { createPageDriver } from "./driver";
import { SuiteController } from "./suite";
import type { TestCaseController } from "./test-case";
import { endTestCase, startTestCase } from "./test-info";

/**
 * Playwright Test integration: one suite trace per worker, one test case
 * span per test. Use `traced` for instrumented actions:
 *
 * ```ts
 * import { test } from "tracewright/fixture";
 *
 * test("login", async ({ traced }) => {
 *   await traced.navigate("/login");
 *   await traced.fill("#password", "hunter2");
 * });
 * ```
 */
export const test = base.extend<
	{ traced: TestCaseController },
	{ tracedSuite: SuiteController }
>({
	tracedSuite: [
		// biome-ignore lint/correctness/noUnusedFunctionParameters: playwright fails if object not used
		async ({ playwright }, use, workerInfo) => {
			const suite = new SuiteController({
				suiteName: workerInfo.project.name || undefined,
				// Each test brings its own page
				launch: false,
			});
			await suite.start();
			try {
				await use(suite);
			} finally {
				await suite.finish();
			}
		},
		{ scope: "worker" },
	],
	traced: async ({ tracedSuite, page }, use, testInfo) => {
		const testCase = startTestCase(
			tracedSuite,
			testInfo,
			createPageDriver(page),
		);
		try {
			await use(testCase);
		} finally {
			await endTestCase(testCase, testInfo);
		}
	},
});

export { expect } from "@playwright/test";
