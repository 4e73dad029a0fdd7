// ============================================================================
// pagebench - Command-line flags
// Parsing, config overrides and browser targets for the CLI.
// ============================================================================

import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import type { BrowserTarget, VersionLabelPolicy } from 'pagebench-runner';
import type { PagebenchConfig } from './config.js';
import { SetupError } from './errors.js';

export interface CLIFlags {
	/** Local Firefox binary */
	firefoxPath?: string;
	/** BiDi endpoint of a Firefox on a device */
	remote?: string;
	/** Port to `adb forward` before connecting to the device */
	forwardPort?: number;
	/** Local Chrome binary; adds a Chrome target */
	chromePath?: string;
	publish?: boolean;
	resultsUrl?: string;
	output?: string;
	benchmarks?: string;
	static?: string;
	host?: string;
	port?: number;
	versionLength?: number;
	verbose?: boolean;
	quiet?: boolean;
	debug?: boolean;
	help?: boolean;
	version?: boolean;
}

/**
 * Parse argv (without node and the script). Unknown flags and missing
 * values are setup errors.
 */
export function parseFlags(args: readonly string[]): CLIFlags {
	const flags: CLIFlags = {};

	const value = (i: number, flag: string): string => {
		const next = args[i];
		if (next === undefined || next.startsWith('--')) {
			throw new SetupError(`${flag} needs a value`, { hint: 'Run "pagebench --help" for usage information.' });
		}
		return next;
	};

	for (let i = 0; i < args.length; i++) {
		const arg = args[i];
		switch (arg) {
			case '--firefox-path':
				flags.firefoxPath = value(++i, arg);
				break;
			case '--remote':
				flags.remote = value(++i, arg);
				break;
			case '--forward-port':
				flags.forwardPort = parsePort(value(++i, arg), arg);
				break;
			case '--chrome-path':
				flags.chromePath = value(++i, arg);
				break;
			case '--publish':
				flags.publish = true;
				break;
			case '--results-url':
				flags.resultsUrl = value(++i, arg);
				break;
			case '--output':
				flags.output = value(++i, arg);
				break;
			case '--benchmarks':
				flags.benchmarks = value(++i, arg);
				break;
			case '--static':
				flags.static = value(++i, arg);
				break;
			case '--host':
				flags.host = value(++i, arg);
				break;
			case '--port':
				flags.port = parsePort(value(++i, arg), arg);
				break;
			case '--version-length':
				flags.versionLength = parsePositiveInt(value(++i, arg), arg);
				break;
			case '--verbose':
				flags.verbose = true;
				break;
			case '--quiet':
				flags.quiet = true;
				break;
			case '--debug':
				flags.debug = true;
				break;
			case '--help':
			case '-h':
				flags.help = true;
				break;
			case '--version':
			case '-v':
				flags.version = true;
				break;
			default:
				throw new SetupError(`Unknown option: ${arg}`, { hint: 'Run "pagebench --help" for usage information.' });
		}
	}

	return flags;
}

function parsePort(text: string, flag: string): number {
	const port = Number(text);
	if (!Number.isInteger(port) || port < 0 || port > 65535) {
		throw new SetupError(`${flag} expects a port number, got "${text}"`);
	}
	return port;
}

function parsePositiveInt(text: string, flag: string): number {
	const n = Number(text);
	if (!Number.isInteger(n) || n < 1) {
		throw new SetupError(`${flag} expects a positive integer, got "${text}"`);
	}
	return n;
}

/**
 * Layer command-line flags over a resolved config. Paths are taken
 * relative to the working directory.
 */
export function applyFlags(config: PagebenchConfig, flags: CLIFlags, cwd: string = process.cwd()): PagebenchConfig {
	const out: PagebenchConfig = { ...config };

	if (flags.host !== undefined) out.host = flags.host;
	if (flags.port !== undefined) out.port = flags.port;
	if (flags.benchmarks !== undefined) out.benchmarks = resolve(cwd, flags.benchmarks);
	if (flags.static !== undefined) out.staticDir = resolve(cwd, flags.static);
	if (flags.output !== undefined) out.outputDir = resolve(cwd, flags.output);
	if (flags.publish) out.publish = true;
	if (flags.resultsUrl !== undefined) out.resultsUrl = flags.resultsUrl;
	if (flags.versionLength !== undefined) out.versionLength = flags.versionLength;

	if (flags.debug || flags.verbose) {
		out.verbosity = 'debug';
	} else if (flags.quiet) {
		out.verbosity = 'quiet';
	}

	return out;
}

/**
 * Browser targets for the flags: Firefox (local or remote, exactly one),
 * plus Chrome when a Chrome binary is given.
 */
export function buildTargets(
	flags: CLIFlags,
	config: PagebenchConfig,
	fileExists: (path: string) => boolean = existsSync,
): BrowserTarget[] {
	if (flags.firefoxPath === undefined && flags.remote === undefined) {
		throw new SetupError('You must specify one of --firefox-path or --remote', {
			hint: 'Run "pagebench --help" for usage information.',
		});
	}
	if (flags.firefoxPath !== undefined && flags.remote !== undefined) {
		throw new SetupError('--firefox-path and --remote cannot be used together');
	}

	const versionLabel: VersionLabelPolicy =
		config.versionLength === undefined ? { mode: 'full' } : { mode: 'truncate', length: config.versionLength };
	const targets: BrowserTarget[] = [];

	if (flags.firefoxPath !== undefined) {
		targets.push({
			kind: 'local',
			browser: 'firefox',
			label: 'firefox',
			branch: 'nightly',
			binary: requireBinary('Firefox', flags.firefoxPath, fileExists),
			versionLabel,
		});
	} else if (flags.remote !== undefined) {
		targets.push({
			kind: 'remote',
			label: 'firefox',
			branch: 'nightly',
			endpoint: flags.remote,
			forwardPort: flags.forwardPort,
			versionLabel,
		});
	}

	if (flags.chromePath !== undefined) {
		targets.push({
			kind: 'local',
			browser: 'chrome',
			label: 'chrome',
			branch: 'canary',
			binary: requireBinary('Chrome', flags.chromePath, fileExists),
			versionLabel,
		});
	}

	return targets;
}

function requireBinary(name: string, path: string, fileExists: (path: string) => boolean): string {
	const binary = resolve(path);
	if (!fileExists(binary)) {
		throw new SetupError(`${name} binary not found: ${binary}`, {
			hint: `Pass the path of an installed ${name} executable.`,
		});
	}
	return binary;
}
