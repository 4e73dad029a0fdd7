// ============================================================================
// pagebench runner - Benchmark Plan
// Drives every enabled benchmark on every browser target, one trial at a
// time, and folds what comes back into one aggregate per (benchmark, target).
//
// Per-trial failures are recorded and the plan moves on; the plan only
// reports success when every trial produced results.
// ============================================================================

import { runTrial } from './engine.js';
import { toError } from './errors.js';
import { EventBus, type TrialRef } from './event-bus.js';
import { ResultAggregator } from './result-aggregator.js';
import type { ResultChannel } from './result-channel.js';
import { type RunnerFactory, createRunner } from './runners.js';
import type {
	BenchmarkRun,
	BenchmarkSpec,
	BrowserTarget,
	PlanResult,
	Publisher,
	RawResultRecord,
	TrialOutcome,
	TrialRecord,
} from './types.js';
import { formatVersionLabel } from './version.js';

export interface PlanOptions {
	/** Benchmarks in execution order */
	benchmarks: readonly BenchmarkSpec[];
	/** Browser targets, each run separately for every benchmark */
	targets: readonly BrowserTarget[];
	/** Inbox the result server delivers postbacks into */
	channel: ResultChannel;
	/** Base URL benchmark paths are resolved against, e.g. http://10.0.0.2:8000/ */
	urlPrefix: string;
	/** When set, every finished run is handed to it */
	publisher?: Publisher;
	/** Events for reporters (default: a private bus) */
	bus?: EventBus;
	/** Runner construction (default: createRunner) */
	createRunner?: RunnerFactory;
}

export class BenchmarkPlan {
	readonly bus: EventBus;
	private readonly createRunner: RunnerFactory;

	constructor(private readonly options: PlanOptions) {
		this.bus = options.bus ?? new EventBus();
		this.createRunner = options.createRunner ?? ((target, url) => createRunner(target, url));
	}

	/**
	 * Run the whole plan. Never throws for per-trial or publishing failures.
	 */
	async run(): Promise<PlanResult> {
		const { benchmarks, targets } = this.options;
		const startTime = Date.now();
		const runs: BenchmarkRun[] = [];

		this.bus.emit('plan:start', {
			benchmarks: benchmarks.length,
			targets: targets.map((t) => t.label),
		});

		for (const benchmark of benchmarks) {
			if (!benchmark.enabled) {
				this.bus.emit('benchmark:skip', { suite: benchmark.suite });
				continue;
			}

			for (const target of targets) {
				const run = await this.runBenchmark(benchmark, target);
				runs.push(run);

				if (this.options.publisher) {
					await this.publish(this.options.publisher, run, benchmark, target);
				}
			}
		}

		const result: PlanResult = {
			ok: runs.every((r) => r.failedTrials === 0),
			runs,
			duration: Date.now() - startTime,
		};
		this.bus.emit('plan:end', result);
		return result;
	}

	/**
	 * All trials of one benchmark on one target.
	 */
	async runBenchmark(benchmark: BenchmarkSpec, target: BrowserTarget): Promise<BenchmarkRun> {
		const { suite } = benchmark;
		const url = new URL(benchmark.url, this.options.urlPrefix).href;
		const timeoutMs = benchmark.timeout * 1000;

		const aggregator = new ResultAggregator();
		const results = aggregator.addSuite(suite);
		const trials: TrialRecord[] = [];
		let version: string | undefined;

		this.bus.emit('benchmark:start', { suite, target: target.label, trials: benchmark.number_of_runs });

		for (let index = 0; index < benchmark.number_of_runs; index++) {
			const ref: TrialRef = { suite, target: target.label, index, total: benchmark.number_of_runs };
			this.bus.emit('trial:start', { ...ref, url });

			const started = Date.now();
			let outcome: TrialOutcome | null = null;
			let error: Error | undefined;

			try {
				outcome = await runTrial(this.createRunner(target, url), this.options.channel, timeoutMs);
			} catch (err) {
				error = toError(err);
				this.bus.emit('trial:error', { ...ref, error });
			}

			const duration = Date.now() - started;
			trials.push(this.recordTrial(ref, outcome, error, duration));

			if (outcome?.status === 'ok') {
				version = outcome.version ?? version;
				for (const record of outcome.results) {
					this.foldRecord(aggregator, benchmark, ref, record);
				}
			}

			this.bus.emit('trial:end', { ...ref, outcome, duration });
		}

		const run: BenchmarkRun = {
			suite,
			target: target.label,
			branch: target.branch,
			version,
			trials,
			results,
			failedTrials: trials.filter((t) => t.status !== 'ok').length,
		};
		this.bus.emit('benchmark:end', run);
		return run;
	}

	// -----------------------------------------------------------------------
	// Private
	// -----------------------------------------------------------------------

	private recordTrial(
		ref: TrialRef,
		outcome: TrialOutcome | null,
		error: Error | undefined,
		duration: number,
	): TrialRecord {
		if (!outcome) {
			return { index: ref.index, status: 'error', duration, error };
		}

		switch (outcome.status) {
			case 'ok':
				return { index: ref.index, status: 'ok', duration, version: outcome.version };
			case 'timeout':
				this.bus.emit('trial:timeout', { ...ref, timeout: outcome.waited });
				return { index: ref.index, status: 'timeout', duration };
			case 'malformed':
				this.bus.emit('trial:malformed', { ...ref, reason: outcome.reason });
				return { index: ref.index, status: 'malformed', duration };
		}
	}

	private foldRecord(
		aggregator: ResultAggregator,
		benchmark: BenchmarkSpec,
		ref: TrialRef,
		record: RawResultRecord,
	): void {
		const key = record[benchmark.name];
		const value = record[benchmark.value];

		if (typeof key !== 'string' && typeof key !== 'number') {
			this.bus.emit('record:invalid', { ...ref, record, reason: `missing "${benchmark.name}"` });
			return;
		}
		if (typeof value !== 'number' || !Number.isFinite(value)) {
			this.bus.emit('record:invalid', { ...ref, record, reason: `"${benchmark.value}" is not a number` });
			return;
		}

		aggregator.fold(benchmark.suite, String(key), value);
	}

	private async publish(
		publisher: Publisher,
		run: BenchmarkRun,
		benchmark: BenchmarkSpec,
		target: BrowserTarget,
	): Promise<void> {
		const { suite } = benchmark;
		this.bus.emit('publish:start', { suite, target: target.label, version: run.version });

		try {
			await publisher.publish({
				label: target.label,
				branch: target.branch,
				version: run.version,
				versionLabel: formatVersionLabel(run.version, target.versionLabel),
				benchmark,
				results: new Map([...run.results].map(([name, values]): [string, number[]] => [name, [...values]])),
			});
			this.bus.emit('publish:end', { suite, target: target.label });
		} catch (err) {
			this.bus.emit('publish:error', { suite, target: target.label, error: toError(err) });
		}
	}
}
