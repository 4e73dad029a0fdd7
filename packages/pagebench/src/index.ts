// ============================================================================
// pagebench - Public API
// ============================================================================

export { runPagebench, createPublisher, type RunPagebenchOptions } from './pagebench.js';
export {
	defineConfig,
	resolveConfig,
	loadConfigFile,
	parseUserConfig,
	DEFAULTS,
	CONFIG_FILE,
	type PagebenchConfig,
	type UserConfig,
	type Verbosity,
} from './config.js';
export { loadBenchmarks, parseBenchmarks } from './benchmarks.js';
export {
	buildResultServer,
	startResultServer,
	resolveStaticPath,
	type ResultServerOptions,
	type RunningResultServer,
	type ServerLogLevel,
	type StartServerOptions,
} from './server.js';
export {
	JsonFilePublisher,
	MultiPublisher,
	ResultsServicePublisher,
	machineInfo,
	type MachineInfo,
	type PublishedRun,
	type ResultsServiceBody,
	type ResultsServiceOptions,
} from './publisher.js';
export { ConsoleReporter, formatDuration, type ReporterOptions } from './reporter.js';
export { applyFlags, buildTargets, parseFlags, type CLIFlags } from './flags.js';
export { getLocalIp } from './network.js';
export { BenchmarkConfigError, PublishError, SetupError } from './errors.js';
