// ============================================================================
// pagebench - Errors
// Setup problems abort the run; everything else is recorded per trial.
// ============================================================================

import { PagebenchError } from 'pagebench-runner';

/**
 * The run cannot start: bad flags, a missing browser binary, a static root
 * that does not exist, a port already in use.
 */
export class SetupError extends PagebenchError {
	override readonly name = 'SetupError';
}

/**
 * benchmarks.json is missing, is not JSON, or has an entry that does not
 * validate.
 */
export class BenchmarkConfigError extends PagebenchError {
	override readonly name = 'BenchmarkConfigError';

	constructor(
		message: string,
		readonly file: string,
		options: { cause?: unknown; hint?: string } = {},
	) {
		super(`${file}: ${message}`, {
			hint: options.hint ?? 'Each entry needs suite, url, number_of_runs, timeout, name, value and enabled.',
			cause: options.cause,
		});
	}
}

/**
 * A publisher could not hand a run over. Logged; never fails the plan.
 */
export class PublishError extends PagebenchError {
	override readonly name = 'PublishError';

	constructor(
		readonly publisher: string,
		message: string,
		options: { cause?: unknown; hint?: string } = {},
	) {
		super(`[${publisher}] ${message}`, options);
	}
}
