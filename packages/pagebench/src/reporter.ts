// ============================================================================
// pagebench - Console Reporter
// Prints plan progress from the EventBus.
//
// quiet   failures only
// normal  one block per benchmark and target, with per-key statistics
// debug   everything, including each trial and each dropped record
// ============================================================================

import { type BenchmarkRun, type EventBus, ResultAggregator, type TrialRef } from 'pagebench-runner';
import type { Verbosity } from './config.js';

export interface ReporterOptions {
	verbosity?: Verbosity;
	/** ANSI colours (default: true) */
	color?: boolean;
	/** Progress output (default: console.log) */
	out?: (line: string) => void;
	/** Failure output (default: console.error) */
	err?: (line: string) => void;
}

type Paint = 'red' | 'green' | 'yellow' | 'cyan' | 'dim';

const ANSI: Record<Paint, string> = {
	red: '\x1b[31m',
	green: '\x1b[32m',
	yellow: '\x1b[33m',
	cyan: '\x1b[36m',
	dim: '\x1b[2m',
};

export class ConsoleReporter {
	private readonly verbosity: Verbosity;
	private readonly color: boolean;
	private readonly out: (line: string) => void;
	private readonly err: (line: string) => void;
	private unsubscribers: Array<() => void> = [];

	constructor(options: ReporterOptions = {}) {
		this.verbosity = options.verbosity ?? 'normal';
		this.color = options.color ?? true;
		this.out = options.out ?? ((line) => console.log(line));
		this.err = options.err ?? ((line) => console.error(line));
	}

	/** Start printing events from `bus` */
	attach(bus: EventBus): this {
		const normal = this.verbosity !== 'quiet';
		const debug = this.verbosity === 'debug';

		if (normal) {
			this.unsubscribers.push(
				bus.on('plan:start', ({ benchmarks, targets }) => {
					this.out('');
					this.out(`  pagebench: ${benchmarks} benchmark(s) on ${targets.join(', ')}`);
					this.out('');
				}),
				bus.on('benchmark:start', ({ suite, target, trials }) => {
					this.out(`  ${this.paint('cyan', suite)} on ${target} (${trials} run${trials === 1 ? '' : 's'})`);
				}),
				bus.on('benchmark:end', (run) => this.printRun(run)),
				bus.on('plan:end', ({ ok, runs, duration }) => this.printSummary(ok, runs, duration)),
			);
		}

		if (debug) {
			this.unsubscribers.push(
				bus.on('benchmark:skip', ({ suite }) => {
					this.out(`  ${this.paint('yellow', '-')} skipping disabled benchmark: ${suite}`);
				}),
				bus.on('trial:start', (ref) => {
					this.out(`    ${this.paint('dim', `${this.runLabel(ref)} ${ref.url}`)}`);
				}),
				bus.on('trial:end', (ref) => {
					const { outcome } = ref;
					if (outcome?.status !== 'ok') return;
					const version = outcome.version ? ` ${ref.target} ${outcome.version}` : '';
					this.out(
						`    ${this.paint('green', '+')} ${this.runLabel(ref)}: ${outcome.results.length} record(s)${version} ${this.paint('dim', `(${formatDuration(ref.duration)})`)}`,
					);
				}),
				bus.on('record:invalid', (ref) => {
					this.out(`    ${this.paint('yellow', '!')} ${this.runLabel(ref)}: dropped record: ${ref.reason}`);
				}),
				bus.on('publish:start', ({ suite, target, version }) => {
					this.out(`  publishing ${suite} ${target} ${version ?? '(unknown version)'}`);
				}),
				bus.on('publish:end', ({ suite, target }) => {
					this.out(`  ${this.paint('green', '+')} published ${suite} ${target}`);
				}),
			);
		}

		this.unsubscribers.push(
			bus.on('trial:timeout', (ref) => {
				this.fail(ref, `no results after ${formatDuration(ref.timeout)}`);
			}),
			bus.on('trial:malformed', (ref) => {
				this.fail(ref, `malformed results: ${ref.reason}`);
			}),
			bus.on('trial:error', (ref) => {
				this.fail(ref, firstLine(ref.error.message));
			}),
			bus.on('publish:error', ({ suite, target, error }) => {
				this.err(`  ${this.paint('yellow', '!')} could not publish ${suite} ${target}: ${firstLine(error.message)}`);
			}),
		);

		return this;
	}

	/** Stop printing */
	detach(): void {
		for (const unsubscribe of this.unsubscribers) unsubscribe();
		this.unsubscribers = [];
	}

	// -----------------------------------------------------------------------
	// Private
	// -----------------------------------------------------------------------

	private fail(ref: TrialRef, message: string): void {
		this.err(`    ${this.paint('red', 'x')} ${ref.suite} ${ref.target} ${this.runLabel(ref)}: ${message}`);
	}

	private printRun(run: BenchmarkRun): void {
		if (run.results.size === 0) {
			this.out(`    ${this.paint('yellow', 'no results')}`);
		}

		for (const [key, values] of run.results) {
			const stats = ResultAggregator.computeStats(values);
			this.out(
				`    ${key}: median ${formatNumber(stats.median)}  mean ${formatNumber(stats.mean)}  min ${formatNumber(stats.min)}  max ${formatNumber(stats.max)}  (n=${stats.count})`,
			);
		}

		const version = run.version ? ` ${run.target} ${run.version}` : '';
		const failed = run.failedTrials > 0 ? `, ${this.paint('red', `${run.failedTrials} failed`)}` : '';
		this.out(`    ${run.trials.length} run(s)${failed}${version}`);
		this.out('');
	}

	private printSummary(ok: boolean, runs: BenchmarkRun[], duration: number): void {
		const failed = runs.filter((r) => r.failedTrials > 0).length;
		const clean = runs.length - failed;

		this.out('  ─────────────────────────────────────');
		const parts: string[] = [];
		if (clean > 0) parts.push(this.paint('green', `${clean} complete`));
		if (failed > 0) parts.push(this.paint('red', `${failed} with failed runs`));
		this.out(`  Benchmarks: ${parts.length > 0 ? parts.join(', ') : 'none run'} (${runs.length} total)`);
		this.out(`  Time:       ${formatDuration(duration)}`);
		this.out('');
		this.out(ok ? `  ${this.paint('green', 'All runs reported results.')}` : `  ${this.paint('red', 'Some runs failed.')}`);
		this.out('');
	}

	private runLabel(ref: TrialRef): string {
		return `run ${ref.index + 1}/${ref.total}`;
	}

	private paint(color: Paint, text: string): string {
		return this.color ? `${ANSI[color]}${text}\x1b[0m` : text;
	}
}

export function formatDuration(ms: number): string {
	if (ms < 1000) return `${ms}ms`;
	if (ms < 60_000) return `${(ms / 1000).toFixed(1)}s`;
	const minutes = Math.floor(ms / 60_000);
	const seconds = ((ms % 60_000) / 1000).toFixed(1);
	return `${minutes}m ${seconds}s`;
}

function formatNumber(n: number): string {
	return Number.isInteger(n) ? String(n) : n.toFixed(2);
}

function firstLine(text: string): string {
	return text.split('\n')[0] ?? text;
}
