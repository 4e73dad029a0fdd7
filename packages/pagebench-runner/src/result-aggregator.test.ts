import { describe, expect, it } from 'vitest';
import { ResultAggregator, toPlainResults } from './result-aggregator.js';

describe('ResultAggregator', () => {
	it('keeps values of one key in fold order', () => {
		const aggregator = new ResultAggregator();
		aggregator.fold('pageload', 'k', 5);
		aggregator.fold('pageload', 'k', 3);
		expect(aggregator.get('pageload')?.get('k')).toEqual([5, 3]);
	});

	it('keeps different keys independent', () => {
		const aggregator = new ResultAggregator();
		aggregator.fold('pageload', 'k1', 7);
		aggregator.fold('pageload', 'k2', 7);
		expect(aggregator.toJSON()).toEqual({ pageload: { k1: [7], k2: [7] } });
	});

	it('does not deduplicate', () => {
		const aggregator = new ResultAggregator();
		aggregator.fold('s', 'k', 1);
		aggregator.fold('s', 'k', 1);
		expect(aggregator.count('s')).toBe(2);
	});

	it('registers empty suites', () => {
		const aggregator = new ResultAggregator();
		aggregator.addSuite('empty');
		expect(aggregator.suites()).toEqual(['empty']);
		expect(aggregator.count('empty')).toBe(0);
		expect(aggregator.get('missing')).toBeUndefined();
	});

	it('copies values into plain results', () => {
		const results = new Map([['a', [1, 2]]]);
		const plain = toPlainResults(results);
		results.get('a')?.push(3);
		expect(plain).toEqual({ a: [1, 2] });
	});
});

describe('ResultAggregator.computeStats', () => {
	it('summarizes a list of values', () => {
		expect(ResultAggregator.computeStats([131, 120, 125, 140])).toEqual({
			count: 4,
			min: 120,
			max: 140,
			mean: 129,
			median: 131,
			p95: 140,
		});
	});

	it('is all zeros for no values', () => {
		expect(ResultAggregator.computeStats([])).toEqual({
			count: 0,
			min: 0,
			max: 0,
			mean: 0,
			median: 0,
			p95: 0,
		});
	});
});
