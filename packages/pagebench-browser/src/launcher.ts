// ============================================================================
// pagebench browser - Browser Launcher
// Spawns a browser binary on a benchmark URL with a clean,
// throw-away profile.
// ============================================================================

import { type ChildProcess, spawn } from 'node:child_process';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

/** Browsers pagebench knows how to launch locally */
export type BrowserName = 'firefox' | 'chrome';

/** Options for launching a browser on a page */
export interface LaunchOptions {
	/** Which browser family the binary belongs to */
	browser: BrowserName;
	/** Browser executable */
	executablePath: string;
	/** Page to open */
	url: string;
	/** Extra args appended before the URL */
	args?: string[];
	/** Grace period between SIGTERM and SIGKILL in ms (default: 3000) */
	killTimeout?: number;
}

/** A running browser process */
export interface BrowserProcess {
	/** The child process */
	process: ChildProcess;
	/** Temporary profile directory, removed by `close()` */
	profileDir: string;
	/** Resolves once the process has exited */
	exited: Promise<void>;
	/** Ask the process (and its children) to terminate */
	terminate: () => void;
	/** Wait for exit (force-killing after the grace period) and remove the profile */
	close: () => Promise<void>;
}

/**
 * Spawn a browser on `url`. Resolves once the OS has started the process;
 * rejects when the executable cannot be spawned.
 *
 * ```ts
 * const browser = await launchBrowser({ browser: 'firefox', executablePath: '/usr/bin/firefox', url });
 * // ... wait for the page to post its results ...
 * browser.terminate();
 * await browser.close();
 * ```
 */
export async function launchBrowser(options: LaunchOptions): Promise<BrowserProcess> {
	const { browser, executablePath, killTimeout = 3000 } = options;

	const profileDir = await mkdtemp(join(tmpdir(), `pagebench-${browser}-`));
	const args = buildArgs(browser, { profileDir, url: options.url, extraArgs: options.args });

	// Detached: the browser leads its own process group so terminate() reaches
	// content/GPU helpers too.
	const proc = spawn(executablePath, args, { stdio: 'ignore', detached: true });

	const exited = new Promise<void>((resolve) => {
		proc.once('exit', () => resolve());
		proc.once('error', () => resolve());
	});

	try {
		await new Promise<void>((resolve, reject) => {
			proc.once('spawn', resolve);
			proc.once('error', (err) => reject(new Error(`Failed to launch ${browser}: ${err.message}`)));
		});
	} catch (err) {
		await rm(profileDir, { recursive: true, force: true });
		throw err;
	}

	const signal = (sig: NodeJS.Signals) => {
		if (proc.exitCode !== null || proc.signalCode !== null || proc.pid === undefined) return;
		try {
			process.kill(-proc.pid, sig);
		} catch {
			proc.kill(sig);
		}
	};

	const close = async () => {
		const forceTimer = setTimeout(() => signal('SIGKILL'), killTimeout);
		try {
			await exited;
		} finally {
			clearTimeout(forceTimer);
		}
		await rm(profileDir, { recursive: true, force: true });
	};

	return { process: proc, profileDir, exited, terminate: () => signal('SIGTERM'), close };
}

// ---------------------------------------------------------------------------
// Browser args
// ---------------------------------------------------------------------------

export interface BuildArgsOptions {
	profileDir: string;
	url: string;
	extraArgs?: string[];
}

/**
 * Command line for opening `url` in a fresh profile. The URL is always last.
 */
export function buildArgs(browser: BrowserName, options: BuildArgsOptions): string[] {
	const base = browser === 'firefox' ? firefoxArgs(options.profileDir) : chromeArgs(options.profileDir);
	return [...base, ...(options.extraArgs ?? []), options.url];
}

function chromeArgs(profileDir: string): string[] {
	return [
		`--user-data-dir=${profileDir}`,
		'--no-first-run',
		'--no-default-browser-check',
		'--disable-background-networking',
		'--disable-component-update',
		'--disable-default-apps',
		'--disable-extensions',
		'--disable-sync',
		'--disable-translate',
		'--metrics-recording-only',
		'--password-store=basic',
		'--use-mock-keychain',
	];
}

function firefoxArgs(profileDir: string): string[] {
	return ['-profile', profileDir, '-no-remote', '-new-instance'];
}
