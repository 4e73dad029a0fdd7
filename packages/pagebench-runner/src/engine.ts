// ============================================================================
// pagebench runner - Run-and-Collect Engine
// One trial: start a browser, wait (bounded) for its page to post results,
// stop the browser, and hand back a private copy of what was posted.
// ============================================================================

import type { PostbackSignal, ResultChannel } from './result-channel.js';
import type { BrowserRunner } from './runners.js';
import type { TrialOutcome } from './types.js';
import { extractBrowserVersion, userAgentOf } from './version.js';

/**
 * Run one trial.
 *
 * The runner is always stopped and waited on before this returns, including
 * after a timeout or a failed start. A timeout or a malformed postback is an
 * outcome, not an exception; only a runner that fails to start (or to shut
 * down) throws.
 *
 * ```ts
 * const outcome = await runTrial(runner, channel, 30_000);
 * if (outcome.status === 'ok') fold(outcome.results);
 * ```
 */
export async function runTrial(
	runner: BrowserRunner,
	channel: ResultChannel,
	timeoutMs: number,
): Promise<TrialOutcome> {
	channel.reset();

	try {
		await runner.start();
		return toOutcome(await channel.waitForPostback(timeoutMs));
	} finally {
		await runner.stop();
		await runner.wait();
	}
}

function toOutcome(signal: PostbackSignal): TrialOutcome {
	switch (signal.kind) {
		case 'postback':
			return {
				status: 'ok',
				version: extractBrowserVersion(userAgentOf(signal.postback.metadata)),
				// The channel is reused by the next trial
				results: structuredClone(signal.postback.results),
			};
		case 'malformed':
			return { status: 'malformed', reason: signal.reason };
		case 'timeout':
			return { status: 'timeout', waited: signal.waited };
	}
}
