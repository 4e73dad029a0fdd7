import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadBenchmarks, parseBenchmarks } from './benchmarks.js';
import { DEFAULTS } from './config.js';
import { BenchmarkConfigError } from './errors.js';

const valid = {
	suite: 'pageload',
	url: 'test.html',
	number_of_runs: 2,
	timeout: 30,
	name: 'page',
	value: 'time_ms',
	enabled: true,
};

describe('parseBenchmarks', () => {
	it('returns the entries in file order', () => {
		const benchmarks = parseBenchmarks([valid, { ...valid, suite: 'second', enabled: false }]);
		expect(benchmarks.map((b) => [b.suite, b.enabled])).toEqual([
			['pageload', true],
			['second', false],
		]);
	});

	it('freezes the list and every entry', () => {
		const benchmarks = parseBenchmarks([valid]);
		expect(Object.isFrozen(benchmarks)).toBe(true);
		expect(Object.isFrozen(benchmarks[0])).toBe(true);
	});

	it('rejects timeouts longer than a timer can hold', () => {
		expect(parseBenchmarks([{ ...valid, timeout: 2_147_483 }])[0]?.timeout).toBe(2_147_483);
		expect(() => parseBenchmarks([{ ...valid, timeout: 2_147_484 }])).toThrow(
			'entry 0: "timeout" must be at most 2147483 seconds',
		);
	});

	it('accepts fractional timeouts in seconds', () => {
		expect(parseBenchmarks([{ ...valid, timeout: 0.5 }])[0]?.timeout).toBe(0.5);
	});

	it('names the entry and field that failed', () => {
		expect(() => parseBenchmarks([valid, { ...valid, number_of_runs: 0 }])).toThrow(
			'benchmarks.json: entry 1: "number_of_runs" must be at least 1',
		);
		expect(() => parseBenchmarks([{ ...valid, timeout: -1 }])).toThrow(
			'entry 0: "timeout" must be a positive number of seconds',
		);
		expect(() => parseBenchmarks([{ ...valid, suite: '' }])).toThrow('entry 0: "suite" must not be empty');
		expect(() => parseBenchmarks([{ ...valid, number_of_runs: 1.5 }])).toThrow(
			'entry 0: "number_of_runs" must be an integer',
		);
	});

	it('rejects entries with missing fields', () => {
		const { enabled: _enabled, ...withoutEnabled } = valid;
		expect(() => parseBenchmarks([withoutEnabled])).toThrow(/entry 0: "enabled"/);
	});

	it('rejects anything but an array', () => {
		expect(() => parseBenchmarks({ benchmarks: [valid] })).toThrow(BenchmarkConfigError);
		expect(() => parseBenchmarks({ benchmarks: [valid] })).toThrow(/expected an array of benchmarks/);
	});
});

describe('loadBenchmarks', () => {
	let dir: string;

	beforeEach(async () => {
		dir = await mkdtemp(join(tmpdir(), 'pagebench-benchmarks-'));
	});

	afterEach(async () => {
		await rm(dir, { recursive: true, force: true });
	});

	it('reads and validates a file', async () => {
		const file = join(dir, 'benchmarks.json');
		await writeFile(file, JSON.stringify([valid]));
		const benchmarks = await loadBenchmarks(file);
		expect(benchmarks).toEqual([valid]);
	});

	it('reports files that are missing or not JSON', async () => {
		await expect(loadBenchmarks(join(dir, 'missing.json'))).rejects.toBeInstanceOf(BenchmarkConfigError);

		const file = join(dir, 'broken.json');
		await writeFile(file, '[{');
		await expect(loadBenchmarks(file)).rejects.toThrow(`${file}: is not valid JSON`);
	});

	it('loads the bundled benchmarks', async () => {
		const benchmarks = await loadBenchmarks(DEFAULTS.benchmarks);
		expect(benchmarks.map((b) => b.suite)).toEqual(['pageload', 'timers']);
	});
});
