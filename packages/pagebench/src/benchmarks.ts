// ============================================================================
// pagebench - Benchmark Definitions
// benchmarks.json is a JSON array; list order is execution order.
// ============================================================================

import { readFile } from 'node:fs/promises';
import type { BenchmarkSpec } from 'pagebench-runner';
import * as v from 'valibot';
import { BenchmarkConfigError } from './errors.js';

const NonEmptyString = v.pipe(v.string(), v.nonEmpty('must not be empty'));

/** Longest trial timeout a single timer can hold */
const MAX_TIMEOUT_SECONDS = 2_147_483;

const BenchmarkSchema = v.object({
	suite: NonEmptyString,
	url: NonEmptyString,
	number_of_runs: v.pipe(v.number(), v.integer('must be an integer'), v.minValue(1, 'must be at least 1')),
	timeout: v.pipe(
		v.number(),
		v.check((n) => n > 0 && Number.isFinite(n), 'must be a positive number of seconds'),
		v.maxValue(MAX_TIMEOUT_SECONDS, `must be at most ${MAX_TIMEOUT_SECONDS} seconds`),
	),
	name: NonEmptyString,
	value: NonEmptyString,
	enabled: v.boolean(),
});

const BenchmarkListSchema = v.array(BenchmarkSchema);

/**
 * Validate already-decoded benchmark definitions. `source` names the file
 * in error messages.
 */
export function parseBenchmarks(data: unknown, source = 'benchmarks.json'): readonly BenchmarkSpec[] {
	const parsed = v.safeParse(BenchmarkListSchema, data);
	if (!parsed.success) {
		const issue = parsed.issues[0];
		throw new BenchmarkConfigError(issue ? describeIssue(issue) : 'invalid benchmark list', source);
	}

	return Object.freeze(parsed.output.map((entry) => Object.freeze({ ...entry })));
}

/**
 * Read and validate a benchmarks file.
 *
 * ```ts
 * const benchmarks = await loadBenchmarks('benchmarks.json');
 * benchmarks[0].suite; // 'pageload'
 * ```
 */
export async function loadBenchmarks(path: string): Promise<readonly BenchmarkSpec[]> {
	let text: string;
	try {
		text = await readFile(path, 'utf-8');
	} catch (err) {
		throw new BenchmarkConfigError('cannot be read', path, {
			hint: 'Pass --benchmarks <file> or run from a directory that has a benchmarks.json.',
			cause: err,
		});
	}

	let data: unknown;
	try {
		data = JSON.parse(text);
	} catch (err) {
		throw new BenchmarkConfigError('is not valid JSON', path, { cause: err });
	}

	return parseBenchmarks(data, path);
}

type Issue = v.BaseIssue<unknown>;

function describeIssue(issue: Issue): string {
	const keys = (issue.path ?? []).map((item) => item.key);
	const [index, ...field] = keys;

	if (index === undefined) {
		return `expected an array of benchmarks (${issue.message})`;
	}
	if (field.length === 0) {
		return `entry ${String(index)}: ${issue.message}`;
	}
	return `entry ${String(index)}: "${field.map(String).join('.')}" ${issue.message}`;
}
