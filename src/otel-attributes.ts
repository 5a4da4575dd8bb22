// Resource attributes
// https://github.com/open-telemetry/opentelemetry-js/blob/52d82f0daf07f345ef32b6588913db6efed55875/semantic-conventions/src/stable_attributes.ts
export const ATTR_SERVICE_NAME = "service.name" as const;
export const ATTR_DEPLOYMENT_ENVIRONMENT = "deployment.environment" as const;
export const ATTR_TELEMETRY_SDK_NAME = "telemetry.sdk.name" as const;

// Suite (root span)
export const ATTR_TEST_SUITE_NAME = "test.suite.name" as const;
export const ATTR_TEST_SUITE_ID = "test.suite.id" as const;
export const ATTR_TEST_SUITE_TOTAL_TESTS = "test.suite.total_tests" as const;
export const ATTR_TEST_SUITE_PASSED = "test.suite.passed" as const;
export const ATTR_TEST_SUITE_FAILED = "test.suite.failed" as const;
export const ATTR_TEST_SUITE_SKIPPED = "test.suite.skipped" as const;
export const ATTR_TEST_SUITE_RESULT = "test.suite.result" as const;
export const ATTR_TEST_RUN_TRIGGER = "test.run.trigger" as const;
export const ATTR_TEST_RUN_TIMESTAMP = "test.run.timestamp" as const;
export const ATTR_TEST_TARGET_BASE_URL = "test.target.base_url" as const;
export const ATTR_TEST_TARGET_ENVIRONMENT = "test.target.environment" as const;
export const ATTR_TEST_BROWSER_NAME = "test.browser.name" as const;
export const ATTR_TEST_BROWSER_HEADLESS = "test.browser.headless" as const;
export const ATTR_TEST_VIEWPORT_WIDTH = "test.viewport.width" as const;
export const ATTR_TEST_VIEWPORT_HEIGHT = "test.viewport.height" as const;
export const ATTR_VCS_COMMIT_SHA = "vcs.commit.sha" as const;
export const ATTR_VCS_BRANCH = "vcs.branch" as const;

// Test case
// https://github.com/open-telemetry/opentelemetry-js/blob/52d82f0daf07f345ef32b6588913db6efed55875/semantic-conventions/src/experimental_attributes.ts#L13509
export const ATTR_TEST_CASE_NAME = "test.case.name" as const;
export const ATTR_TEST_CASE_ID = "test.case.id" as const;
export const ATTR_TEST_CASE_TAGS = "test.case.tags" as const;
export const ATTR_TEST_CASE_DESCRIPTION = "test.case.description" as const;
export const ATTR_TEST_CASE_RESULT = "test.case.result" as const;
export const ATTR_TEST_CASE_FAILURE_REASON = "test.case.failure_reason" as const;
export const ATTR_TEST_CASE_FAILURE_URL = "test.case.failure_url" as const;
export const ATTR_TEST_CASE_RETRY = "test.case.retry" as const;
export const ATTR_TEST_CASE_SKIP_REASON = "test.case.skip_reason" as const;
export const ATTR_TEST_CASE_SCREENSHOT_PATH =
	"test.case.screenshot_path" as const;

// Action
export const ATTR_TEST_ACTION_TYPE = "test.action.type" as const;
export const ATTR_TEST_ACTION_SELECTOR = "test.action.selector" as const;
export const ATTR_TEST_ACTION_TARGET_URL = "test.action.target_url" as const;
export const ATTR_TEST_ACTION_PAGE_URL = "test.action.page_url" as const;
export const ATTR_TEST_ACTION_INPUT_VALUE = "test.action.input_value" as const;
export const ATTR_TEST_ACTION_EXPECTED = "test.action.expected" as const;
export const ATTR_TEST_ACTION_ACTUAL = "test.action.actual" as const;
export const ATTR_TEST_ACTION_RESULT = "test.action.result" as const;
export const ATTR_TEST_ACTION_ERROR = "test.action.error" as const;
export const ATTR_TEST_ACTION_WAIT_MS = "test.action.wait_ms" as const;
export const ATTR_TEST_ACTION_DURATION_MS = "test.action.duration_ms" as const;

// Navigation timing
export const ATTR_TEST_NAVIGATION_RESPONSE_STATUS =
	"test.navigation.response_status" as const;
export const ATTR_TEST_NAVIGATION_DOM_CONTENT_LOADED_MS =
	"test.navigation.dom_content_loaded_ms" as const;
export const ATTR_TEST_NAVIGATION_DOM_INTERACTIVE_MS =
	"test.navigation.dom_interactive_ms" as const;
export const ATTR_TEST_NAVIGATION_LOAD_EVENT_MS =
	"test.navigation.load_event_ms" as const;
export const ATTR_TEST_NAVIGATION_TRANSFER_SIZE_BYTES =
	"test.navigation.transfer_size_bytes" as const;

export function suiteSpanName(name: string): string {
	return `suite("${name}")`;
}

export function testSpanName(name: string): string {
	return `test("${name}")`;
}

/**
 * `{type}({selector})`, or the bare type when the action has no selector
 * (e.g. `navigate`, `assert_url`).
 */
export function actionSpanName(type: string, selector?: string): string {
	return selector ? `${type}(${selector})` : type;
}
