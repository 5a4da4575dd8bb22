import { type Driver, type ElementState, safeCurrentUrl } from "./driver";
import {
	ActionFailure,
	type ActionFailureResult,
	errorMessage,
	isTimeoutError,
} from "./errors";
import {
	ATTR_TEST_ACTION_DURATION_MS,
	ATTR_TEST_ACTION_ERROR,
	ATTR_TEST_ACTION_PAGE_URL,
	ATTR_TEST_ACTION_RESULT,
	ATTR_TEST_ACTION_SELECTOR,
	ATTR_TEST_ACTION_TARGET_URL,
	ATTR_TEST_ACTION_TYPE,
	ATTR_TEST_ACTION_WAIT_MS,
	actionSpanName,
} from "./otel-attributes";
import { scrubValue } from "./redaction";
import type {
	AttributeValue,
	Attributes,
	SpanRecorder,
} from "./span-recorder";

export type ActionType =
	| "navigate"
	| "click"
	| "fill"
	| "assert_visible"
	| "assert_text"
	| "assert_count"
	| "assert_url"
	// custom instrumented blocks
	| (string & {});

export type ActionOutcome = "success" | ActionFailureResult;

export interface ActionTarget {
	selector?: string;
	targetUrl?: string;
}

export interface ActionRunOptions {
	/** Written when the span opens. Must already be redacted. */
	attributes?: Attributes;
	/**
	 * A value that must never be recorded. Any occurrence in an error
	 * message is replaced before it reaches the span.
	 */
	secret?: string;
}

/** Handed to an action's operation while its span is open. */
export interface ActionStep {
	/** The driver the action runs against. */
	readonly driver: Driver;
	/** Wait for a precondition; the time spent counts towards `wait_ms`. */
	waitFor(selector: string, state?: ElementState): Promise<void>;
	set(key: string, value: AttributeValue): void;
	setAttributes(attributes: Attributes): void;
}

export interface ActionResult<T> {
	value: T;
	spanId: string;
	durationMs: number;
	waitMs?: number;
}

export type ActionOperation<T> = (step: ActionStep) => Promise<T>;

/**
 * Runs driver operations inside action spans parented to one test case.
 * Action failures are recorded and rethrown, never swallowed.
 */
export class ActionController {
	constructor(
		private recorder: SpanRecorder,
		private parentSpanId: string,
		private driver: Driver,
		private timeoutMs: number,
	) {}

	async run<T>(
		type: ActionType,
		target: ActionTarget,
		operation: ActionOperation<T>,
		options: ActionRunOptions = {},
	): Promise<ActionResult<T>> {
		const attributes: Attributes = { [ATTR_TEST_ACTION_TYPE]: type };
		if (target.selector) {
			attributes[ATTR_TEST_ACTION_SELECTOR] = target.selector;
		}
		if (target.targetUrl) {
			attributes[ATTR_TEST_ACTION_TARGET_URL] = target.targetUrl;
		}
		const pageUrl = safeCurrentUrl(this.driver);
		if (pageUrl) {
			attributes[ATTR_TEST_ACTION_PAGE_URL] = pageUrl;
		}
		Object.assign(attributes, options.attributes);

		const spanId = this.recorder.open(
			this.parentSpanId,
			actionSpanName(type, target.selector),
			attributes,
		);

		let waitMs: number | undefined;
		const step: ActionStep = {
			driver: this.driver,
			waitFor: async (selector, state = "visible") => {
				const waitStart = performance.now();
				try {
					await this.driver.waitForState(selector, state, this.timeoutMs);
				} finally {
					waitMs = (waitMs ?? 0) + (performance.now() - waitStart);
				}
			},
			set: (key, value) => this.recorder.setAttribute(spanId, key, value),
			setAttributes: (extra) => this.recorder.setAttributes(spanId, extra),
		};

		const start = performance.now();
		let value: T;
		try {
			value = await operation(step);
		} catch (error) {
			const result: ActionFailureResult = isTimeoutError(error)
				? "timeout"
				: "failed";
			const original = errorMessage(error);
			const message = options.secret
				? scrubValue(original, options.secret)
				: original;

			await this.finish(spanId, {
				result,
				message,
				durationMs: performance.now() - start,
				waitMs,
			});

			if (message === original) {
				throw error;
			}
			// Redact in place so callers still see the driver's own error class
			if (error instanceof Error && options.secret) {
				error.message = message;
				if (error.stack) {
					error.stack = scrubValue(error.stack, options.secret);
				}
				throw error;
			}
			throw new ActionFailure(type, result, message);
		}

		const durationMs = performance.now() - start;
		await this.finish(spanId, { result: "success", durationMs, waitMs });
		return {
			value,
			spanId,
			durationMs: Math.round(durationMs),
			waitMs: waitMs === undefined ? undefined : Math.round(waitMs),
		};
	}

	private async finish(
		spanId: string,
		outcome: {
			result: ActionOutcome;
			message?: string;
			durationMs: number;
			waitMs?: number;
		},
	) {
		// Already closed as an orphan
		if (!this.recorder.isOpen(spanId)) {
			return;
		}
		const attributes: Attributes = {
			[ATTR_TEST_ACTION_RESULT]: outcome.result,
			[ATTR_TEST_ACTION_DURATION_MS]: Math.round(outcome.durationMs),
		};
		if (outcome.waitMs !== undefined) {
			attributes[ATTR_TEST_ACTION_WAIT_MS] = Math.round(outcome.waitMs);
		}
		if (outcome.result === "success") {
			this.recorder.setAttributes(spanId, attributes);
			this.recorder.setStatus(spanId, "ok");
		} else {
			attributes[ATTR_TEST_ACTION_ERROR] = outcome.message ?? "";
			this.recorder.setAttributes(spanId, attributes);
			this.recorder.setStatus(spanId, "error", outcome.message);
		}
		await this.recorder.close(spanId);
	}
}
