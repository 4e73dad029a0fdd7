// ============================================================================
// pagebench runner - Result Channel
// The inbox a benchmark page posts its results into.
//
// One writer (the result server) and one reader (the engine) per trial.
// A postback is correlated with its trial only by time, so callers must
// reset() before every trial and never run two trials against one channel.
// ============================================================================

import * as v from 'valibot';
import { PostbackError } from './errors.js';
import type { ClientMetadata, Postback, RawResultSet } from './types.js';

const ResultSetSchema = v.pipe(
	v.array(v.record(v.string(), v.unknown())),
	v.minLength(1, 'postback contained no result records'),
);

/** What waitForPostback() woke up for */
export type PostbackSignal =
	| { kind: 'postback'; postback: Postback }
	| { kind: 'malformed'; reason: string }
	| { kind: 'timeout'; waited: number };

type Waiter = (signal: PostbackSignal) => void;

/** Largest delay setTimeout honours */
const MAX_TIMER_MS = 2_147_483_647;

/**
 * Parse a postback payload (JSON text, or an already decoded value) into a
 * result set. Throws PostbackError when it is not a non-empty array of
 * objects.
 */
export function parseResultSet(payload: unknown): RawResultSet {
	let decoded: unknown = payload;
	if (typeof payload === 'string') {
		try {
			decoded = JSON.parse(payload);
		} catch (err) {
			throw new PostbackError('results field is not valid JSON', { cause: err });
		}
	}

	const parsed = v.safeParse(ResultSetSchema, decoded);
	if (!parsed.success) {
		const issue = parsed.issues[0];
		throw new PostbackError(issue?.message ?? 'results are not an array of objects');
	}
	return parsed.output;
}

export class ResultChannel {
	private current: Postback | null = null;
	private malformed: string | null = null;
	private waiters = new Set<Waiter>();

	/** Drop any pending postback */
	reset(): void {
		this.current = null;
		this.malformed = null;
	}

	/**
	 * Store a postback, replacing any unconsumed one, and wake the waiting
	 * reader. A payload that does not parse wakes the reader with a
	 * `malformed` signal and throws PostbackError.
	 */
	deliver(metadata: ClientMetadata, payload: unknown): Postback {
		let results: RawResultSet;
		try {
			results = parseResultSet(payload);
		} catch (err) {
			const reason = err instanceof PostbackError ? err.reason : String(err);
			this.current = null;
			this.malformed = reason;
			this.notify({ kind: 'malformed', reason });
			throw err;
		}

		const postback: Postback = { metadata: { ...metadata }, results };
		this.current = postback;
		this.malformed = null;
		this.notify({ kind: 'postback', postback });
		return postback;
	}

	/** The stored postback, or null */
	peek(): Postback | null {
		return this.current;
	}

	/**
	 * Suspend until a postback (or a malformed one) arrives, or `timeoutMs`
	 * elapses. Settles immediately when the channel already holds something.
	 */
	waitForPostback(timeoutMs: number): Promise<PostbackSignal> {
		if (this.current) {
			return Promise.resolve({ kind: 'postback', postback: this.current });
		}
		if (this.malformed !== null) {
			return Promise.resolve({ kind: 'malformed', reason: this.malformed });
		}

		return new Promise<PostbackSignal>((resolve) => {
			let timer: ReturnType<typeof setTimeout> | undefined;

			const waiter: Waiter = (signal) => {
				clearTimeout(timer);
				this.waiters.delete(waiter);
				resolve(signal);
			};

			// setTimeout fires at once past MAX_TIMER_MS, so long waits re-arm
			const arm = (remaining: number) => {
				timer = setTimeout(() => {
					if (remaining > MAX_TIMER_MS) arm(remaining - MAX_TIMER_MS);
					else waiter({ kind: 'timeout', waited: timeoutMs });
				}, Math.min(remaining, MAX_TIMER_MS));
			};

			arm(timeoutMs);
			this.waiters.add(waiter);
		});
	}

	/** Number of readers currently suspended in waitForPostback() */
	get pendingWaiters(): number {
		return this.waiters.size;
	}

	private notify(signal: PostbackSignal): void {
		for (const waiter of [...this.waiters]) {
			waiter(signal);
		}
	}
}
