import fs from "node:fs";
import { defineConfig, devices } from "@playwright/test";

loadEnv();

/**
 * See https://playwright.dev/docs/test-configuration.
 *
 * Spans go wherever OTEL_EXPORTER_OTLP_ENDPOINT points; put it in `.env` to
 * send the e2e run to a local collector.
 */
export default defineConfig({
	testDir: "./test-e2e",
	/* Fail the build on CI if you accidentally left test.only in the source code. */
	forbidOnly: !!process.env.CI,
	/* Retry on CI only */
	retries: process.env.CI ? 2 : 0,
	reporter: "list",
	use: {
		trace: "on-first-retry",
	},
	projects: [
		{
			name: "chromium",
			use: { ...devices["Desktop Chrome"] },
		},
	],
});

function loadEnv() {
	const envFile = ".env";
	if (fs.existsSync(envFile)) {
		const lines = fs.readFileSync(envFile, "utf-8").split("\n");
		for (const line of lines) {
			if (!line || line.startsWith("#")) continue;
			const [key, ...valueParts] = line.split("=");
			const value = valueParts.join("=");
			if (key && value && !process.env[key.trim()]) {
				process.env[key.trim()] = value.trim();
			}
		}
	}
}
