#!/usr/bin/env node
// ============================================================================
// pagebench - CLI
// Run the benchmark pages in Firefox (and optionally Chrome), collect and
// publish the results.
//
// pagebench --firefox-path /opt/firefox/firefox
// pagebench --remote ws://127.0.0.1:9222/session --forward-port 9222
// pagebench --firefox-path ./firefox --chrome-path ./chrome --publish
// ============================================================================

import { EventBus, PagebenchError } from 'pagebench-runner';
import { loadConfigFile, resolveConfig } from './config.js';
import { applyFlags, buildTargets, parseFlags } from './flags.js';
import { runPagebench } from './pagebench.js';
import { ConsoleReporter } from './reporter.js';

const VERSION = '0.1.0';

async function main(): Promise<number> {
	try {
		const flags = parseFlags(process.argv.slice(2));

		if (flags.help) {
			printHelp();
			return 0;
		}
		if (flags.version) {
			console.log(`pagebench v${VERSION}`);
			return 0;
		}

		const config = applyFlags(resolveConfig(loadConfigFile()), flags);
		const targets = buildTargets(flags, config);

		const bus = new EventBus();
		new ConsoleReporter({ verbosity: config.verbosity }).attach(bus);

		const result = await runPagebench({ config, targets, bus });
		return result.ok ? 0 : 1;
	} catch (err) {
		if (err instanceof PagebenchError) {
			console.error(`\n  \x1b[31mError:\x1b[0m ${err.message}\n`);
			return 1;
		}
		throw err;
	}
}

function printHelp() {
	console.log(`
  pagebench v${VERSION} -- browser benchmark runner

  Usage:
    pagebench --firefox-path <path> [options]
    pagebench --remote <ws-endpoint> [options]

  Browsers (one of --firefox-path / --remote is required):
    --firefox-path <path>   Firefox binary to start for every run
    --remote <ws-endpoint>  WebDriver BiDi endpoint of a Firefox on a device
    --forward-port <port>   Run "adb forward tcp:<port> tcp:<port>" before each run
    --chrome-path <path>    Also run every benchmark in this Chrome binary

  Options:
    --benchmarks <file>     Benchmark definitions (default: bundled benchmarks.json)
    --static <dir>          Directory the benchmark pages are served from
    --host <ip>             Result server address (default: this machine's LAN IPv4)
    --port <n>              Result server port (default: 8000)
    --publish               Publish results (JSON files, plus the results service if set)
    --output <dir>          Where published JSON files go (default: .pagebench)
    --results-url <url>     Results service endpoint
    --version-length <n>    Publish only the first n characters of the browser version
    --verbose, --debug      Print every run, dropped records and server logs
    --quiet                 Print failures only
    -h, --help              Show this help message
    -v, --version           Show version

  Environment:
    PAGEBENCH_PORT, PAGEBENCH_HOST, PAGEBENCH_RESULTS_URL

  Exit status is 0 when every run reported results, 1 otherwise.
`);
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

main().then(
	(code) => {
		process.exitCode = code;
	},
	(err: unknown) => {
		console.error('Fatal error:', err instanceof Error ? err.message : String(err));
		process.exitCode = 1;
	},
);
