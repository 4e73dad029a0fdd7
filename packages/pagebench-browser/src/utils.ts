/**
 * Redaction for raw BiDi traffic printed in debug mode.
 */

const SENSITIVE_KEY = /(?:cookie|password|token|secret|session|auth)/i;
export const REDACTED = '[REDACTED]';

/**
 * Return a copy of `value` with every sensitive field replaced by `[REDACTED]`.
 * Arrays and nested objects are walked; primitives come back untouched.
 * Objects without sensitive content are returned as-is (same reference).
 */
export function redact(value: unknown): unknown {
	if (value === null || typeof value !== 'object') {
		return value;
	}

	if (Array.isArray(value)) {
		const mapped = value.map(redact);
		return mapped.some((item, i) => item !== value[i]) ? mapped : value;
	}

	let changed = false;
	const out: Record<string, unknown> = {};

	for (const [key, field] of Object.entries(value)) {
		let next: unknown;
		if (!Array.isArray(field) && SENSITIVE_KEY.test(key)) {
			next = REDACTED;
		} else {
			next = redact(field);
		}
		if (next !== field) changed = true;
		out[key] = next;
	}

	return changed ? out : value;
}

/**
 * Redact a raw JSON message for logging, falling back to the raw text when
 * it does not parse. Output is capped at `max` characters.
 */
export function redactMessage(raw: string, max = 500): string {
	let text: string;
	try {
		text = JSON.stringify(redact(JSON.parse(raw)));
	} catch {
		text = raw;
	}
	return text.length > max ? `${text.slice(0, max)}...` : text;
}
