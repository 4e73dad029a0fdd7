// ============================================================================
// pagebench - Programmatic entry point
// Load the benchmarks, bring the result server up, run the plan, tear down.
// ============================================================================

import { existsSync, statSync } from 'node:fs';
import {
	BenchmarkPlan,
	type BrowserTarget,
	type EventBus,
	type PlanResult,
	type Publisher,
	ResultChannel,
	type RunnerFactory,
	createRunner,
} from 'pagebench-runner';
import { loadBenchmarks } from './benchmarks.js';
import type { PagebenchConfig } from './config.js';
import { SetupError } from './errors.js';
import { JsonFilePublisher, MultiPublisher, ResultsServicePublisher } from './publisher.js';
import { startResultServer } from './server.js';

export interface RunPagebenchOptions {
	config: PagebenchConfig;
	targets: readonly BrowserTarget[];
	/** Events for reporters */
	bus?: EventBus;
	/** Runner construction (default: createRunner) */
	createRunner?: RunnerFactory;
	/** Publisher override (default: built from config) */
	publisher?: Publisher;
}

/**
 * Run every benchmark on every target and return the plan result.
 * Throws only for setup problems.
 *
 * ```ts
 * const result = await runPagebench({ config: resolveConfig(), targets });
 * process.exitCode = result.ok ? 0 : 1;
 * ```
 */
export async function runPagebench(options: RunPagebenchOptions): Promise<PlanResult> {
	const { config, targets } = options;
	if (targets.length === 0) {
		throw new SetupError('No browser targets to run');
	}

	const benchmarks = await loadBenchmarks(config.benchmarks);

	if (!existsSync(config.staticDir) || !statSync(config.staticDir).isDirectory()) {
		throw new SetupError(`Static directory not found: ${config.staticDir}`, {
			hint: 'Pass --static <dir> pointing at the benchmark pages.',
		});
	}

	const debug = config.verbosity === 'debug';
	const channel = new ResultChannel();
	const server = await startResultServer({
		channel,
		staticDir: config.staticDir,
		host: config.host,
		port: config.port,
		logLevel: debug ? 'debug' : 'error',
	});

	try {
		const plan = new BenchmarkPlan({
			benchmarks,
			targets,
			channel,
			urlPrefix: server.url,
			publisher: options.publisher ?? createPublisher(config),
			bus: options.bus,
			createRunner: options.createRunner ?? ((target, url) => createRunner(target, url, { debug })),
		});
		return await plan.run();
	} finally {
		await server.stop();
	}
}

/**
 * Publishers for a config: none unless publishing is on; JSON files always
 * when it is; the results service too when a URL is configured.
 */
export function createPublisher(config: PagebenchConfig): Publisher | undefined {
	if (!config.publish) return undefined;

	const publishers: Publisher[] = [new JsonFilePublisher(config.outputDir)];
	if (config.resultsUrl) {
		publishers.push(new ResultsServicePublisher({ url: config.resultsUrl, secretsFile: config.secretsFile }));
	}

	return publishers.length === 1 ? publishers[0] : new MultiPublisher(publishers);
}
