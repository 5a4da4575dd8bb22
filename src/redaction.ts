export const REDACTED = "[REDACTED]";

/** Selector fragments that mark a form field as sensitive. */
export const SENSITIVE_SELECTOR_KEYWORDS: readonly string[] = [
	"password",
	"card",
	"cvv",
	"ssn",
	"credit",
	"secret",
	"token",
];

const SENSITIVE_SELECTOR_PATTERN = new RegExp(
	`(${SENSITIVE_SELECTOR_KEYWORDS.join("|")})`,
	"i",
);

/**
 * Whether a value typed into `selector` must be redacted before it is
 * recorded. Only the selector is inspected, never the value itself.
 */
export function shouldRedact(selector: string, sensitive = false): boolean {
	return sensitive || SENSITIVE_SELECTOR_PATTERN.test(selector);
}

export function redactValue(_value: string): typeof REDACTED {
	return REDACTED;
}

export function redactIfNeeded(
	value: string,
	selector: string,
	sensitive = false,
): string {
	return shouldRedact(selector, sensitive) ? redactValue(value) : value;
}

/** Secrets shorter than this are only scrubbed where they stand alone. */
export const MIN_SUBSTRING_SCRUB_LENGTH = 4;

/**
 * Replaces occurrences of `secret` in `text` with {@link REDACTED}. Short
 * secrets only match as whole tokens, so `"a"` doesn't rewrite every `a` in
 * the message.
 */
export function scrubValue(text: string, secret: string): string {
	if (!secret) {
		return text;
	}
	if (secret.length >= MIN_SUBSTRING_SCRUB_LENGTH) {
		return text.split(secret).join(REDACTED);
	}
	const escaped = secret.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
	return text.replace(
		new RegExp(`(?<![\\p{L}\\p{N}_])${escaped}(?![\\p{L}\\p{N}_])`, "gu"),
		REDACTED,
	);
}
