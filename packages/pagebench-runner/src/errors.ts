// ============================================================================
// pagebench runner - Errors
// Every error carries an optional hint telling the user what to check.
// ============================================================================

/**
 * Base class for all pagebench errors.
 */
export class PagebenchError extends Error {
	override readonly name: string = 'PagebenchError';

	/** Hint for how to fix the issue */
	readonly hint?: string;

	constructor(message: string, options: { hint?: string; cause?: unknown } = {}) {
		super(options.hint ? `${message}\nHint: ${options.hint}` : message);
		this.hint = options.hint;
		if (options.cause !== undefined) {
			this.cause = options.cause;
		}
	}
}

/**
 * A runner could not bring the browser up: spawn failure, port forward
 * failure, session or navigation failure. Fatal for the trial it belongs to.
 */
export class RunnerStartError extends PagebenchError {
	override readonly name = 'RunnerStartError';

	constructor(
		readonly runner: 'local' | 'remote',
		message: string,
		options: { hint?: string; cause?: unknown } = {},
	) {
		super(message, options);
	}
}

/**
 * A postback whose payload is not a non-empty JSON array of records.
 */
export class PostbackError extends PagebenchError {
	override readonly name = 'PostbackError';

	constructor(
		readonly reason: string,
		options: { cause?: unknown } = {},
	) {
		super(`Malformed postback: ${reason}`, {
			hint: 'The page must POST a form field "results" holding a JSON array of objects.',
			cause: options.cause,
		});
	}
}

/** Normalize anything thrown into an Error */
export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err));
}
