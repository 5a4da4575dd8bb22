export type ActionFailureResult = "failed" | "timeout";

/**
 * Raised when the span lifecycle is used out of order: writing to a closed
 * span, running an action outside a running test case, or overlapping test
 * cases within one suite.
 */
export class SpanStateError extends Error {
	override name = "SpanStateError";
}

/**
 * An instrumented action failed with something that isn't an `Error` and
 * whose text had to be rewritten to keep a redacted `fill` value out of it.
 * Driver errors are otherwise rethrown as they are.
 */
export class ActionFailure extends Error {
	override name = "ActionFailure";

	constructor(
		readonly actionType: string,
		readonly result: ActionFailureResult,
		message: string,
	) {
		super(message);
	}
}

/** An `assert*` action observed something other than what was expected. */
export class AssertionFailure extends Error {
	override name = "AssertionFailure";
}

/** Thrown by `test.skip()` to end a test case early without failing it. */
export class TestSkipped extends Error {
	override name = "TestSkipped";
}

export function errorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}

export function isTimeoutError(error: unknown): boolean {
	return error instanceof Error && error.name === "TimeoutError";
}
