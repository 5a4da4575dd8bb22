import type { TestInfo } from "@playwright/test";
import type { Driver } from "./driver";
import { TestSkipped } from "./errors";
import { ATTR_TEST_CASE_RETRY } from "./otel-attributes";
import type { SuiteController } from "./suite";
import type {
	TestCaseController,
	TestCaseInfo,
	TestCaseOutcome,
} from "./test-case";

/** The parts of Playwright's `TestInfo` a test case span is built from. */
export type TracedTestInfo = Pick<
	TestInfo,
	| "title"
	| "testId"
	| "tags"
	| "titlePath"
	| "retry"
	| "status"
	| "expectedStatus"
	| "annotations"
	| "error"
>;

export function testCaseInfoFrom(testInfo: TracedTestInfo): TestCaseInfo {
	return {
		name: testInfo.title,
		id: testInfo.testId,
		tags: testInfo.tags,
		// titlePath is [file, ...describe blocks, title]
		description: testInfo.titlePath.slice(0, -1).join(" > "),
	};
}

/** Create and start the test case for a Playwright test. */
export function startTestCase(
	suite: Pick<SuiteController, "testCase">,
	testInfo: TracedTestInfo,
	driver: Driver,
): TestCaseController {
	const testCase = suite.testCase(testCaseInfoFrom(testInfo), { driver });
	testCase.start();
	testCase.setAttribute(ATTR_TEST_CASE_RETRY, testInfo.retry);
	return testCase;
}

/**
 * End the test case the way Playwright saw the test end. Playwright reports
 * the test's own error through `testInfo`, not through the fixture.
 */
export async function endTestCase(
	testCase: TestCaseController,
	testInfo: TracedTestInfo,
): Promise<TestCaseOutcome> {
	if (testInfo.status === "skipped") {
		const reason = testInfo.annotations.find(
			(annotation) => annotation.type === "skip",
		)?.description;
		return testCase.fail(new TestSkipped(reason || "skipped"));
	}
	if (testInfo.status !== testInfo.expectedStatus) {
		return testCase.fail(
			new Error(testInfo.error?.message ?? `Test ended as ${testInfo.status}`),
		);
	}
	return testCase.finish();
}
