import type { Page } from "@playwright/test";
import * as v from "valibot";

export type ElementState = "attached" | "detached" | "visible" | "hidden";

export interface NavigationTiming {
	domContentLoadedMs: number;
	domInteractiveMs: number;
	loadEventMs: number;
	transferSizeBytes: number;
}

export interface NavigationResult {
	/** HTTP status of the main document, when there was a response. */
	status?: number;
	timing?: NavigationTiming;
}

/**
 * The browser operations the instrumentation wraps. Anything that can
 * drive a page (Playwright, a fake in tests) can sit behind it.
 */
export interface Driver {
	navigate(url: string): Promise<NavigationResult>;
	click(selector: string, timeoutMs: number): Promise<void>;
	fill(selector: string, value: string, timeoutMs: number): Promise<void>;
	waitForState(
		selector: string,
		state: ElementState,
		timeoutMs: number,
	): Promise<void>;
	getText(selector: string): Promise<string>;
	countMatches(selector: string): Promise<number>;
	currentUrl(): string;
	screenshot?(path: string): Promise<void>;
}

/** A {@link Driver} over a Playwright page, with the page itself exposed. */
export interface PageDriver extends Driver {
	readonly page: Page;
}

const NavigationTimingSchema = v.object({
	domContentLoadedMs: v.number(),
	domInteractiveMs: v.number(),
	loadEventMs: v.number(),
	transferSizeBytes: v.number(),
});

// Evaluated in the page, so it is shipped as source text
const NAVIGATION_TIMING_SCRIPT = `(() => {
	const entries = performance.getEntriesByType("navigation");
	if (entries.length === 0) return null;
	const nav = entries[0];
	return {
		domContentLoadedMs: nav.domContentLoadedEventEnd - nav.startTime,
		domInteractiveMs: nav.domInteractive - nav.startTime,
		loadEventMs: nav.loadEventEnd - nav.startTime,
		transferSizeBytes: nav.transferSize || 0,
	};
})()`;

/**
 * Adapt a Playwright {@link Page} to the {@link Driver} interface.
 */
export function createPageDriver(page: Page): PageDriver {
	return {
		page,
		async navigate(url) {
			const response = await page.goto(url, { waitUntil: "domcontentloaded" });
			return {
				status: response?.status(),
				timing: await readNavigationTiming(page),
			};
		},
		async click(selector, timeoutMs) {
			await page.click(selector, { timeout: timeoutMs });
		},
		async fill(selector, value, timeoutMs) {
			await page.fill(selector, value, { timeout: timeoutMs });
		},
		async waitForState(selector, state, timeoutMs) {
			await page.waitForSelector(selector, { state, timeout: timeoutMs });
		},
		async getText(selector) {
			return (await page.textContent(selector)) ?? "";
		},
		async countMatches(selector) {
			return page.locator(selector).count();
		},
		currentUrl() {
			return page.url();
		},
		async screenshot(path) {
			await page.screenshot({ path, fullPage: true });
		},
	};
}

async function readNavigationTiming(
	page: Page,
): Promise<NavigationTiming | undefined> {
	let raw: unknown;
	try {
		raw = await page.evaluate(NAVIGATION_TIMING_SCRIPT);
	} catch (_err) {
		// Navigation timing isn't exposed on every page (about:blank, downloads)
		return undefined;
	}
	const parsed = v.safeParse(NavigationTimingSchema, raw);
	return parsed.success ? parsed.output : undefined;
}

/**
 * Read the current URL without letting a broken driver surface an error.
 */
export function safeCurrentUrl(driver: Driver): string | undefined {
	try {
		return driver.currentUrl();
	} catch (_err) {
		return undefined;
	}
}
