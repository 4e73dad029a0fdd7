// ============================================================================
// pagebench runner - EventBus
// Type-safe event system for the plan driver. The console reporter, tests
// and anything else that wants to watch a run plug in here.
// ============================================================================

import type { BenchmarkRun, RawResultRecord, TrialOutcome } from './types.js';

/** Identifies one trial within a run */
export interface TrialRef {
	suite: string;
	/** Browser target label */
	target: string;
	/** 0-based trial index */
	index: number;
	/** Trials in this run */
	total: number;
}

// ---------------------------------------------------------------------------
// Event Map
// ---------------------------------------------------------------------------

export interface PlanEvents {
	// Plan lifecycle
	'plan:start': { benchmarks: number; targets: string[] };
	'plan:end': { ok: boolean; duration: number; runs: BenchmarkRun[] };

	// One benchmark on one target
	'benchmark:skip': { suite: string };
	'benchmark:start': { suite: string; target: string; trials: number };
	'benchmark:end': BenchmarkRun;

	// Trials
	'trial:start': TrialRef & { url: string };
	'trial:timeout': TrialRef & { timeout: number };
	'trial:malformed': TrialRef & { reason: string };
	'trial:error': TrialRef & { error: Error };
	'trial:end': TrialRef & { outcome: TrialOutcome | null; duration: number };
	'record:invalid': TrialRef & { record: RawResultRecord; reason: string };

	// Publishing
	'publish:start': { suite: string; target: string; version: string | undefined };
	'publish:end': { suite: string; target: string };
	'publish:error': { suite: string; target: string; error: Error };
}

export type EventListener<K extends keyof PlanEvents> = (payload: PlanEvents[K]) => void;

type AnyListener = (payload: never) => void;

// ---------------------------------------------------------------------------
// EventBus
// ---------------------------------------------------------------------------

/**
 * Synchronous event bus: listeners always see events in emission order.
 *
 * ```ts
 * const bus = new EventBus();
 * bus.on('trial:timeout', ({ suite, index }) => { ... });
 * bus.on('plan:end', ({ ok }) => { ... });
 * ```
 */
export class EventBus {
	private listeners = new Map<keyof PlanEvents, Set<AnyListener>>();
	private history: Array<{ event: keyof PlanEvents; payload: unknown; timestamp: number }> = [];
	private recordHistory = false;

	/**
	 * Register a listener. Returns an unsubscribe function.
	 */
	on<K extends keyof PlanEvents>(event: K, listener: EventListener<K>): () => void {
		let set = this.listeners.get(event);
		if (!set) {
			set = new Set();
			this.listeners.set(event, set);
		}
		const listeners = set;
		listeners.add(listener);

		return () => {
			listeners.delete(listener);
			if (listeners.size === 0) this.listeners.delete(event);
		};
	}

	/**
	 * Register a listener that is removed after its first call.
	 */
	once<K extends keyof PlanEvents>(event: K, listener: EventListener<K>): () => void {
		const unsubscribe = this.on(event, (payload) => {
			unsubscribe();
			listener(payload);
		});
		return unsubscribe;
	}

	/**
	 * Remove all listeners for one event, or for all events.
	 */
	off(event?: keyof PlanEvents): void {
		if (event) {
			this.listeners.delete(event);
		} else {
			this.listeners.clear();
		}
	}

	/**
	 * Emit an event to all registered listeners. A throwing listener is
	 * reported on stderr and does not stop the run.
	 */
	emit<K extends keyof PlanEvents>(event: K, payload: PlanEvents[K]): void {
		if (this.recordHistory) {
			this.history.push({ event, payload, timestamp: Date.now() });
		}

		const set = this.listeners.get(event);
		if (!set) return;

		for (const listener of [...set]) {
			try {
				(listener as EventListener<K>)(payload);
			} catch (err) {
				console.error(`  listener for "${event}" failed: ${err instanceof Error ? err.message : String(err)}`);
			}
		}
	}

	/** Number of listeners for one event, or for all events */
	listenerCount(event?: keyof PlanEvents): number {
		if (event) {
			return this.listeners.get(event)?.size ?? 0;
		}
		let total = 0;
		for (const set of this.listeners.values()) {
			total += set.size;
		}
		return total;
	}

	// -----------------------------------------------------------------------
	// History (for tests and debugging)
	// -----------------------------------------------------------------------

	enableHistory(): void {
		this.recordHistory = true;
	}

	/** Recorded payloads of one event type, in order */
	getEventsOfType<K extends keyof PlanEvents>(event: K): Array<PlanEvents[K]> {
		return this.history
			.filter((h) => h.event === event)
			.map((h) => h.payload as PlanEvents[K]);
	}

	/** Names of every recorded event, in order */
	getEventNames(): Array<keyof PlanEvents> {
		return this.history.map((h) => h.event);
	}
}
