// ============================================================================
// pagebench runner - Browser Runners
// The three things the engine needs from a browser: start, stop, wait.
//
// LocalProcessRunner   one browser process per trial on this machine
// RemoteSessionRunner  navigate an already running browser on a device;
//                      the page keeps running after the session ends
// ============================================================================

import { spawn } from 'node:child_process';
import {
	BiDiSession,
	type BrowserName,
	type BrowserProcess,
	type LaunchOptions,
	type SessionOptions,
	launchBrowser,
} from 'pagebench-browser';
import { RunnerStartError } from './errors.js';
import type { BrowserTarget } from './types.js';

export interface BrowserRunner {
	/** Bring the browser up on the benchmark URL */
	start(): Promise<void>;
	/** Ask the browser to go away */
	stop(): Promise<void>;
	/** Block until the browser is gone (no-op when nothing runs) */
	wait(): Promise<void>;
}

/** Builds a fresh runner for one trial */
export type RunnerFactory = (target: BrowserTarget, url: string) => BrowserRunner;

// ---------------------------------------------------------------------------
// Local process
// ---------------------------------------------------------------------------

export interface LocalRunnerOptions {
	browser: BrowserName;
	binary: string;
	url: string;
	args?: string[];
	/** Grace period between SIGTERM and SIGKILL in ms */
	killTimeout?: number;
	/** Process launcher (tests swap this out) */
	launch?: (options: LaunchOptions) => Promise<BrowserProcess>;
}

export class LocalProcessRunner implements BrowserRunner {
	private browser: BrowserProcess | null = null;

	constructor(private readonly options: LocalRunnerOptions) {}

	async start(): Promise<void> {
		if (this.browser) {
			throw new RunnerStartError('local', `${this.options.browser} is already running`);
		}

		const launch = this.options.launch ?? launchBrowser;
		try {
			this.browser = await launch({
				browser: this.options.browser,
				executablePath: this.options.binary,
				url: this.options.url,
				args: this.options.args,
				killTimeout: this.options.killTimeout,
			});
		} catch (err) {
			throw new RunnerStartError(
				'local',
				`Could not start ${this.options.browser} (${this.options.binary}): ${err instanceof Error ? err.message : String(err)}`,
				{ hint: 'Check that the binary path points at an executable browser.', cause: err },
			);
		}
	}

	async stop(): Promise<void> {
		this.browser?.terminate();
	}

	async wait(): Promise<void> {
		const browser = this.browser;
		if (!browser) return;
		this.browser = null;
		await browser.close();
	}

	/** Whether a browser process is currently owned by this runner */
	get running(): boolean {
		return this.browser !== null;
	}
}

// ---------------------------------------------------------------------------
// Remote session
// ---------------------------------------------------------------------------

/** What the remote runner needs from a BiDi session */
export interface RemoteSession {
	browsingContext: {
		topLevel(): Promise<string>;
		navigate(params: { context: string; url: string; wait?: 'none' | 'interactive' | 'complete' }): Promise<unknown>;
	};
	end(): Promise<void>;
}

export interface RemoteRunnerOptions {
	endpoint: string;
	url: string;
	/** Port to forward from this machine to the device before connecting */
	forwardPort?: number;
	/** Session options (timeouts, debug tracing) */
	session?: SessionOptions;
	/** Session factory (tests swap this out) */
	connect?: (endpoint: string, options: SessionOptions) => Promise<RemoteSession>;
	/** Port forwarder (tests swap this out) */
	forward?: (port: number) => Promise<void>;
}

export class RemoteSessionRunner implements BrowserRunner {
	constructor(private readonly options: RemoteRunnerOptions) {}

	async start(): Promise<void> {
		const { endpoint, url, forwardPort } = this.options;

		if (forwardPort !== undefined) {
			const forward = this.options.forward ?? adbForward;
			try {
				await forward(forwardPort);
			} catch (err) {
				throw new RunnerStartError('remote', `Port forward tcp:${forwardPort} failed: ${messageOf(err)}`, {
					hint: 'Is the device connected and visible to `adb devices`?',
					cause: err,
				});
			}
		}

		const connect = this.options.connect ?? BiDiSession.connect;
		let session: RemoteSession;
		try {
			session = await connect(endpoint, this.options.session ?? {});
		} catch (err) {
			throw new RunnerStartError('remote', `Could not open a session on ${endpoint}: ${messageOf(err)}`, {
				hint: 'Make sure the browser on the device has remote debugging enabled.',
				cause: err,
			});
		}

		// Fire and forget: the page posts its results long after the session is gone
		try {
			const context = await session.browsingContext.topLevel();
			console.log(`  navigating to: ${url}`);
			await session.browsingContext.navigate({ context, url, wait: 'none' });
		} catch (err) {
			throw new RunnerStartError('remote', `Navigation to ${url} failed: ${messageOf(err)}`, { cause: err });
		} finally {
			await session.end();
		}
	}

	async stop(): Promise<void> {}

	async wait(): Promise<void> {}
}

/**
 * `adb forward tcp:<port> tcp:<port>`; rejects unless adb exits with 0.
 */
export function adbForward(port: number, command = 'adb'): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		const proc = spawn(command, ['forward', `tcp:${port}`, `tcp:${port}`], { stdio: 'ignore' });
		proc.once('error', reject);
		proc.once('exit', (code) => {
			if (code === 0) resolve();
			else reject(new Error(`${command} exited with code ${code}`));
		});
	});
}

function messageOf(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * The runner variant matching a target, opened on `url`.
 */
export function createRunner(target: BrowserTarget, url: string, options: { debug?: boolean } = {}): BrowserRunner {
	switch (target.kind) {
		case 'local':
			return new LocalProcessRunner({
				browser: target.browser,
				binary: target.binary,
				url,
				args: target.args,
			});
		case 'remote':
			return new RemoteSessionRunner({
				endpoint: target.endpoint,
				url,
				forwardPort: target.forwardPort,
				session: { debug: options.debug },
			});
	}
}
