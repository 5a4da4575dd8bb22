import * as v from "valibot";

export type BrowserName = "chromium" | "firefox" | "webkit";

/** Mirrors Playwright's own `screenshot` option values. */
export type ScreenshotPolicy = "off" | "only-on-failure" | "on";

export interface ResolvedConfig {
	serviceName: string;
	suiteName: string;
	baseUrl: string;
	otlpEndpoint: string;
	otlpHeaders: Readonly<Record<string, string>>;
	otlpTimeoutMs: number;
	environment: string;
	trigger: string;
	browser: BrowserName;
	headless: boolean;
	viewportWidth: number;
	viewportHeight: number;
	screenshots: ScreenshotPolicy;
	screenshotDir: string;
	actionTimeoutMs: number;
	debug: boolean;
}

/**
 * Explicit options. A key that is missing, `undefined` or `null` falls
 * through to the environment and then to the default.
 */
export type ConfigOptions = {
	[K in keyof ResolvedConfig]?: ResolvedConfig[K] | null;
};

export interface ConfigIssue {
	variable: string;
	value: string;
	message: string;
}

export interface ResolveConfigOptions {
	env?: NodeJS.ProcessEnv;
	/** Called for every environment value that was set but malformed. */
	onInvalid?: (issue: ConfigIssue) => void;
}

export const DEFAULT_CONFIG: Readonly<ResolvedConfig> = Object.freeze({
	serviceName: "playwright-otel",
	suiteName: "default",
	baseUrl: "",
	otlpEndpoint: "http://localhost:4317",
	otlpHeaders: {},
	otlpTimeoutMs: 10000,
	environment: "development",
	trigger: "manual",
	browser: "chromium",
	headless: true,
	viewportWidth: 1280,
	viewportHeight: 720,
	screenshots: "off",
	screenshotDir: "test-results/screenshots",
	actionTimeoutMs: 5000,
	debug: false,
});

const NonEmptyStringSchema = v.pipe(v.string(), v.trim(), v.nonEmpty());

const EndpointSchema = v.pipe(v.string(), v.trim(), v.url());

const BrowserNameSchema = v.pipe(
	v.string(),
	v.trim(),
	v.toLowerCase(),
	v.picklist(["chromium", "firefox", "webkit"]),
);

const ScreenshotPolicySchema = v.pipe(
	v.string(),
	v.trim(),
	v.toLowerCase(),
	v.picklist(["off", "only-on-failure", "on"]),
);

const PositiveIntegerSchema = v.pipe(
	v.string(),
	v.trim(),
	v.regex(/^\d+$/, "Expected a whole number"),
	v.transform(Number),
	v.minValue(1),
);

// Anything other than an explicit "off" keeps the browser headless
const HeadlessSchema = v.pipe(
	v.string(),
	v.trim(),
	v.toLowerCase(),
	v.transform((value) => !["false", "0", "no"].includes(value)),
);

const FlagSchema = v.pipe(
	v.string(),
	v.trim(),
	v.toLowerCase(),
	v.transform((value) => ["true", "1", "yes"].includes(value)),
);

/**
 * Resolve the configuration snapshot for one suite run.
 *
 * Precedence per key: explicit option, then environment variable, then
 * {@link DEFAULT_CONFIG}. Only `env` is read; nothing else is touched.
 */
export function resolveConfig(
	overrides: ConfigOptions = {},
	{ env = process.env, onInvalid }: ResolveConfigOptions = {},
): Readonly<ResolvedConfig> {
	function fromEnv<TSchema extends v.GenericSchema<string, unknown>>(
		variable: string,
		schema: TSchema,
	): v.InferOutput<TSchema> | undefined {
		const raw = env[variable];
		if (raw === undefined || raw === "") {
			return undefined;
		}
		const result = v.safeParse(schema, raw);
		if (result.success) {
			return result.output;
		}
		onInvalid?.({
			variable,
			value: raw,
			message: result.issues[0].message,
		});
		return undefined;
	}

	function pick<K extends keyof ResolvedConfig>(
		key: K,
		envValue: ResolvedConfig[K] | undefined,
	): ResolvedConfig[K] {
		const explicit: ResolvedConfig[K] | null | undefined = overrides[key];
		if (explicit !== undefined && explicit !== null) {
			return explicit;
		}
		return envValue ?? DEFAULT_CONFIG[key];
	}

	const envHeaders = env.OTEL_EXPORTER_OTLP_HEADERS
		? parseOtlpHeaders(env.OTEL_EXPORTER_OTLP_HEADERS)
		: {};

	return Object.freeze({
		serviceName: pick(
			"serviceName",
			fromEnv("OTEL_SERVICE_NAME", NonEmptyStringSchema),
		),
		suiteName: pick(
			"suiteName",
			fromEnv("PLAYWRIGHT_OTEL_SUITE", NonEmptyStringSchema),
		),
		baseUrl: pick(
			"baseUrl",
			fromEnv("PLAYWRIGHT_OTEL_BASE_URL", EndpointSchema),
		),
		otlpEndpoint: pick(
			"otlpEndpoint",
			fromEnv("OTEL_EXPORTER_OTLP_ENDPOINT", EndpointSchema),
		),
		otlpHeaders: Object.freeze({
			...envHeaders,
			...(overrides.otlpHeaders ?? {}), // explicit headers win per key
		}),
		otlpTimeoutMs: pick(
			"otlpTimeoutMs",
			fromEnv("OTEL_EXPORTER_OTLP_TIMEOUT", PositiveIntegerSchema),
		),
		environment: pick(
			"environment",
			fromEnv("PLAYWRIGHT_OTEL_ENVIRONMENT", NonEmptyStringSchema),
		),
		trigger: pick(
			"trigger",
			fromEnv("PLAYWRIGHT_OTEL_TRIGGER", NonEmptyStringSchema),
		),
		browser: pick(
			"browser",
			fromEnv("PLAYWRIGHT_OTEL_BROWSER", BrowserNameSchema),
		),
		headless: pick(
			"headless",
			fromEnv("PLAYWRIGHT_OTEL_HEADLESS", HeadlessSchema),
		),
		viewportWidth: pick(
			"viewportWidth",
			fromEnv("PLAYWRIGHT_OTEL_VIEWPORT_WIDTH", PositiveIntegerSchema),
		),
		viewportHeight: pick(
			"viewportHeight",
			fromEnv("PLAYWRIGHT_OTEL_VIEWPORT_HEIGHT", PositiveIntegerSchema),
		),
		screenshots: pick(
			"screenshots",
			fromEnv("PLAYWRIGHT_OTEL_SCREENSHOTS", ScreenshotPolicySchema),
		),
		screenshotDir: pick(
			"screenshotDir",
			fromEnv("PLAYWRIGHT_OTEL_SCREENSHOT_DIR", NonEmptyStringSchema),
		),
		actionTimeoutMs: pick(
			"actionTimeoutMs",
			fromEnv("PLAYWRIGHT_OTEL_ACTION_TIMEOUT", PositiveIntegerSchema),
		),
		debug: pick("debug", fromEnv("PLAYWRIGHT_OTEL_DEBUG", FlagSchema)),
	});
}

/** Parses `OTEL_EXPORTER_OTLP_HEADERS`: comma-separated `key=value` pairs. */
export function parseOtlpHeaders(headersString: string): Record<string, string> {
	const headers: Record<string, string> = {};
	const pairs = headersString.split(",");
	for (const pair of pairs) {
		const [key, ...valueParts] = pair.split("=");
		if (key && valueParts.length > 0) {
			headers[key.trim()] = valueParts.join("=").trim();
		}
	}
	return headers;
}
