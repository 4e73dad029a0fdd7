// ============================================================================
// pagebench - Configuration
// Works with zero config. Override through pagebench.config.json,
// PAGEBENCH_* environment variables, then command-line flags.
// ============================================================================

import { existsSync, readFileSync } from 'node:fs';
import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import * as v from 'valibot';

/** How much the console reporter prints */
export type Verbosity = 'quiet' | 'normal' | 'debug';

/** Full configuration with all options */
export interface PagebenchConfig {
	/** Address the result server binds to (default: first non-internal IPv4 address) */
	host?: string;
	/** Result server port (default: 8000) */
	port: number;
	/** Benchmark definitions file (default: the bundled benchmarks.json) */
	benchmarks: string;
	/** Directory the result server serves pages from (default: the bundled static/) */
	staticDir: string;
	/** Where JsonFilePublisher writes run results (default: '.pagebench') */
	outputDir: string;
	/** Hand finished runs to the publishers (default: false) */
	publish: boolean;
	/** Results service endpoint; runs are posted there when publishing */
	resultsUrl?: string;
	/** `key,secret` file for the results service (default: ~/.pagebench-secret.txt) */
	secretsFile: string;
	/**
	 * Publish only the first `n` characters of the browser version as its
	 * label (default: the full version).
	 */
	versionLength?: number;
	/** Console output level (default: 'normal') */
	verbosity: Verbosity;
}

/** Users provide a partial config -- everything has defaults */
export type UserConfig = Partial<PagebenchConfig>;

export const CONFIG_FILE = 'pagebench.config.json';

const packageRoot = fileURLToPath(new URL('..', import.meta.url));

export const DEFAULTS: PagebenchConfig = {
	port: 8000,
	benchmarks: join(packageRoot, 'benchmarks.json'),
	staticDir: join(packageRoot, 'static'),
	outputDir: '.pagebench',
	publish: false,
	secretsFile: join(homedir(), '.pagebench-secret.txt'),
	verbosity: 'normal',
};

/**
 * Type helper for configs written in code.
 *
 * ```ts
 * import { defineConfig, runPagebench } from 'pagebench';
 *
 * const config = defineConfig({ port: 8080, publish: true });
 * ```
 */
export function defineConfig(config: UserConfig): UserConfig {
	return config;
}

/**
 * Merge defaults, the user config and PAGEBENCH_* environment overrides,
 * in that order. Unset fields fall through to the next layer down.
 */
export function resolveConfig(userConfig: UserConfig = {}, env: NodeJS.ProcessEnv = process.env): PagebenchConfig {
	const user: UserConfig = { ...userConfig, ...envOverrides(env) };

	return {
		host: user.host ?? DEFAULTS.host,
		port: user.port ?? DEFAULTS.port,
		benchmarks: user.benchmarks ?? DEFAULTS.benchmarks,
		staticDir: user.staticDir ?? DEFAULTS.staticDir,
		outputDir: user.outputDir ?? DEFAULTS.outputDir,
		publish: user.publish ?? DEFAULTS.publish,
		resultsUrl: user.resultsUrl ?? DEFAULTS.resultsUrl,
		secretsFile: user.secretsFile ?? DEFAULTS.secretsFile,
		versionLength: user.versionLength ?? DEFAULTS.versionLength,
		verbosity: user.verbosity ?? DEFAULTS.verbosity,
	};
}

function envOverrides(env: NodeJS.ProcessEnv): UserConfig {
	const overrides: UserConfig = {};

	if (env.PAGEBENCH_PORT) {
		const port = Number.parseInt(env.PAGEBENCH_PORT, 10);
		if (Number.isInteger(port) && port >= 0 && port <= 65535) {
			overrides.port = port;
		} else {
			console.warn(`Warning: ignoring PAGEBENCH_PORT="${env.PAGEBENCH_PORT}" (not a port number).`);
		}
	}
	if (env.PAGEBENCH_HOST) {
		overrides.host = env.PAGEBENCH_HOST;
	}
	if (env.PAGEBENCH_RESULTS_URL) {
		overrides.resultsUrl = env.PAGEBENCH_RESULTS_URL;
	}

	return overrides;
}

// ---------------------------------------------------------------------------
// Config file
// ---------------------------------------------------------------------------

const UserConfigSchema = v.strictObject({
	host: v.optional(v.string()),
	port: v.optional(v.pipe(v.number(), v.integer(), v.minValue(0), v.maxValue(65535))),
	benchmarks: v.optional(v.string()),
	staticDir: v.optional(v.string()),
	outputDir: v.optional(v.string()),
	publish: v.optional(v.boolean()),
	resultsUrl: v.optional(v.pipe(v.string(), v.url())),
	secretsFile: v.optional(v.string()),
	versionLength: v.optional(v.pipe(v.number(), v.integer(), v.minValue(1))),
	verbosity: v.optional(v.picklist(['quiet', 'normal', 'debug'])),
});

/**
 * Validate a decoded config object. Relative paths are resolved against
 * `baseDir`, the directory the config file lives in.
 */
export function parseUserConfig(data: unknown, baseDir: string): UserConfig {
	const config = v.parse(UserConfigSchema, data);
	const inBase = (path: string | undefined) => (path === undefined ? undefined : resolve(baseDir, path));

	return {
		...config,
		benchmarks: inBase(config.benchmarks),
		staticDir: inBase(config.staticDir),
		outputDir: inBase(config.outputDir),
		secretsFile: inBase(config.secretsFile),
	};
}

/**
 * Load pagebench.config.json from `cwd` when there is one. A file that
 * cannot be parsed or validated is reported and ignored.
 */
export function loadConfigFile(cwd: string = process.cwd()): UserConfig | undefined {
	const configPath = resolve(cwd, CONFIG_FILE);
	if (!existsSync(configPath)) return undefined;

	try {
		return parseUserConfig(JSON.parse(readFileSync(configPath, 'utf-8')), cwd);
	} catch (err) {
		const reason = v.isValiError<typeof UserConfigSchema>(err) ? formatValiError(err) : err instanceof Error ? err.message : String(err);
		console.warn(`Warning: Could not load ${CONFIG_FILE} (${reason}). Using defaults.`);
		return undefined;
	}
}

function formatValiError(err: v.ValiError<typeof UserConfigSchema>): string {
	return err.issues
		.map((issue) => {
			const path = v.getDotPath(issue);
			return path ? `${path}: ${issue.message}` : issue.message;
		})
		.join('; ');
}
