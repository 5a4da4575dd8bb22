import {
	type BrowserType,
	chromium,
	firefox,
	type Page,
	webkit,
} from "@playwright/test";
import type { BrowserName, ResolvedConfig } from "./config";
import { createPageDriver, type Driver } from "./driver";

export interface BrowserSession {
	driver: Driver;
	/** The launched page, when the session drives a real browser. */
	page?: Page;
	close(): Promise<void>;
}

export type BrowserLauncher = (
	config: Readonly<ResolvedConfig>,
) => Promise<BrowserSession>;

const browserTypes: Record<BrowserName, BrowserType> = {
	chromium,
	firefox,
	webkit,
};

/**
 * Launch the configured browser with one context and one page, and wrap
 * the page as a {@link Driver}.
 */
export const launchBrowser: BrowserLauncher = async (config) => {
	const browser = await browserTypes[config.browser].launch({
		headless: config.headless,
	});
	try {
		const context = await browser.newContext({
			viewport: { width: config.viewportWidth, height: config.viewportHeight },
			baseURL: config.baseUrl || undefined,
		});
		const page = await context.newPage();
		return {
			driver: createPageDriver(page),
			page,
			close: () => browser.close(),
		};
	} catch (error) {
		await browser.close();
		throw error;
	}
};
