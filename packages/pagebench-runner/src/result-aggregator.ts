// ============================================================================
// pagebench runner - Result Aggregator
// Accumulates measurements per suite and grouping key, in trial order.
//
// fold() never reduces: publishers and downstream analysis get every value.
// computeStats() exists for console reporting only.
// ============================================================================

import type { AggregateResult } from './types.js';

/** Summary statistics over one key's measurements */
export interface ValueStats {
	count: number;
	min: number;
	max: number;
	mean: number;
	median: number;
	p95: number;
}

/**
 * Per-suite result collection for one browser target.
 *
 * ```ts
 * const aggregator = new ResultAggregator();
 * aggregator.addSuite('pageload');
 * aggregator.fold('pageload', 'a', 120);
 * aggregator.fold('pageload', 'a', 131);
 * aggregator.get('pageload'); // Map { 'a' => [120, 131] }
 * ```
 */
export class ResultAggregator {
	private readonly bySuite = new Map<string, AggregateResult>();

	/** Register a suite so it shows up even before anything is folded into it */
	addSuite(suite: string): AggregateResult {
		let results = this.bySuite.get(suite);
		if (!results) {
			results = new Map();
			this.bySuite.set(suite, results);
		}
		return results;
	}

	/** Append `value` to the measurements of `key` within `suite` */
	fold(suite: string, key: string, value: number): void {
		const results = this.addSuite(suite);
		const values = results.get(key);
		if (values) {
			values.push(value);
		} else {
			results.set(key, [value]);
		}
	}

	/** The collection for a suite, if it was ever registered */
	get(suite: string): AggregateResult | undefined {
		return this.bySuite.get(suite);
	}

	/** Suite names in registration order */
	suites(): string[] {
		return [...this.bySuite.keys()];
	}

	/** Total number of values folded into a suite */
	count(suite: string): number {
		let total = 0;
		for (const values of this.bySuite.get(suite)?.values() ?? []) {
			total += values.length;
		}
		return total;
	}

	/** Plain-object form, suitable for JSON */
	toJSON(): Record<string, Record<string, number[]>> {
		const out: Record<string, Record<string, number[]>> = {};
		for (const [suite, results] of this.bySuite) {
			out[suite] = toPlainResults(results);
		}
		return out;
	}

	// -----------------------------------------------------------------------
	// Statistics
	// -----------------------------------------------------------------------

	/**
	 * Statistics over a list of measurements. Empty input gives all zeros.
	 */
	static computeStats(values: readonly number[]): ValueStats {
		const sorted = [...values].sort((a, b) => a - b);
		const first = sorted[0];
		const last = sorted[sorted.length - 1];
		if (first === undefined || last === undefined) {
			return { count: 0, min: 0, max: 0, mean: 0, median: 0, p95: 0 };
		}

		const total = sorted.reduce((sum, d) => sum + d, 0);
		const at = (q: number) => sorted[Math.min(sorted.length - 1, Math.floor(sorted.length * q))] ?? last;

		return {
			count: sorted.length,
			min: first,
			max: last,
			mean: total / sorted.length,
			median: at(0.5),
			p95: at(0.95),
		};
	}
}

/** A suite's results as `{ key: values }` */
export function toPlainResults(results: AggregateResult): Record<string, number[]> {
	return Object.fromEntries([...results].map(([key, values]) => [key, [...values]]));
}
