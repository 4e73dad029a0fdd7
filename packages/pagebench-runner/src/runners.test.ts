import { ChildProcess } from 'node:child_process';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { BrowserProcess, LaunchOptions } from 'pagebench-browser';
import { RunnerStartError } from './errors.js';
import { LocalProcessRunner, type RemoteSession, RemoteSessionRunner, createRunner } from './runners.js';

function fakeProcess(calls: string[]): BrowserProcess {
	return {
		process: new ChildProcess(),
		profileDir: '/tmp/pagebench-test',
		exited: Promise.resolve(),
		terminate: () => calls.push('terminate'),
		close: async () => {
			calls.push('close');
		},
	};
}

describe('LocalProcessRunner', () => {
	it('launches the binary on the URL and cleans up on wait', async () => {
		const calls: string[] = [];
		const launched: LaunchOptions[] = [];
		const runner = new LocalProcessRunner({
			browser: 'firefox',
			binary: '/opt/firefox/firefox',
			url: 'http://127.0.0.1:8000/test.html',
			launch: async (options) => {
				launched.push(options);
				return fakeProcess(calls);
			},
		});

		await runner.start();
		expect(runner.running).toBe(true);
		expect(launched).toEqual([
			{
				browser: 'firefox',
				executablePath: '/opt/firefox/firefox',
				url: 'http://127.0.0.1:8000/test.html',
				args: undefined,
				killTimeout: undefined,
			},
		]);

		await runner.stop();
		await runner.wait();
		expect(calls).toEqual(['terminate', 'close']);
		expect(runner.running).toBe(false);
	});

	it('treats stop and wait without a running browser as no-ops', async () => {
		const runner = new LocalProcessRunner({
			browser: 'chrome',
			binary: '/opt/chrome/chrome',
			url: 'http://127.0.0.1:8000/',
			launch: async () => {
				throw new Error('unused');
			},
		});

		await expect(runner.stop()).resolves.toBeUndefined();
		await expect(runner.wait()).resolves.toBeUndefined();
	});

	it('wraps launch failures in RunnerStartError', async () => {
		const runner = new LocalProcessRunner({
			browser: 'firefox',
			binary: '/missing/firefox',
			url: 'http://127.0.0.1:8000/',
			launch: async () => {
				throw new Error('spawn /missing/firefox ENOENT');
			},
		});

		const err = await runner.start().catch((e: unknown) => e);
		expect(err).toBeInstanceOf(RunnerStartError);
		expect(err).toMatchObject({ runner: 'local' });
		expect(err instanceof Error && err.message.split('\n')[0]).toBe(
			'Could not start firefox (/missing/firefox): spawn /missing/firefox ENOENT',
		);
		expect(runner.running).toBe(false);
	});
});

describe('RemoteSessionRunner', () => {
	beforeEach(() => {
		vi.spyOn(console, 'log').mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	function fakeSession(calls: string[], failNavigate = false): RemoteSession {
		return {
			browsingContext: {
				topLevel: async () => {
					calls.push('topLevel');
					return 'ctx-1';
				},
				navigate: async (params) => {
					calls.push(`navigate ${params.context} ${params.url} ${params.wait}`);
					if (failNavigate) throw new Error('no such frame');
					return {};
				},
			},
			end: async () => {
				calls.push('end');
			},
		};
	}

	it('forwards, connects, navigates without waiting and ends the session', async () => {
		const calls: string[] = [];
		const runner = new RemoteSessionRunner({
			endpoint: 'ws://127.0.0.1:9222/session',
			url: 'http://10.0.0.2:8000/test.html',
			forwardPort: 9222,
			forward: async (port) => {
				calls.push(`forward ${port}`);
			},
			connect: async (endpoint) => {
				calls.push(`connect ${endpoint}`);
				return fakeSession(calls);
			},
		});

		await runner.start();
		await runner.stop();
		await runner.wait();

		expect(calls).toEqual([
			'forward 9222',
			'connect ws://127.0.0.1:9222/session',
			'topLevel',
			'navigate ctx-1 http://10.0.0.2:8000/test.html none',
			'end',
		]);
	});

	it('skips the port forward when no port is configured', async () => {
		const calls: string[] = [];
		const runner = new RemoteSessionRunner({
			endpoint: 'ws://127.0.0.1:9222/session',
			url: 'http://10.0.0.2:8000/test.html',
			forward: async () => {
				calls.push('forward');
			},
			connect: async () => fakeSession(calls),
		});

		await runner.start();
		expect(calls[0]).toBe('topLevel');
	});

	it('fails to start when the port forward fails', async () => {
		let connected = false;
		const runner = new RemoteSessionRunner({
			endpoint: 'ws://127.0.0.1:9222/session',
			url: 'http://10.0.0.2:8000/',
			forwardPort: 9222,
			forward: async () => {
				throw new Error('adb exited with code 1');
			},
			connect: async () => {
				connected = true;
				return fakeSession([]);
			},
		});

		await expect(runner.start()).rejects.toMatchObject({
			name: 'RunnerStartError',
			runner: 'remote',
		});
		expect(connected).toBe(false);
	});

	it('fails to start when no session can be opened', async () => {
		const runner = new RemoteSessionRunner({
			endpoint: 'ws://127.0.0.1:9222/session',
			url: 'http://10.0.0.2:8000/',
			connect: async () => {
				throw new Error('ECONNREFUSED');
			},
		});

		const err = await runner.start().catch((e: unknown) => e);
		expect(err).toBeInstanceOf(RunnerStartError);
		expect(err instanceof Error && err.message.split('\n')[0]).toBe(
			'Could not open a session on ws://127.0.0.1:9222/session: ECONNREFUSED',
		);
	});

	it('still ends the session when navigation fails', async () => {
		const calls: string[] = [];
		const runner = new RemoteSessionRunner({
			endpoint: 'ws://127.0.0.1:9222/session',
			url: 'http://10.0.0.2:8000/test.html',
			connect: async () => fakeSession(calls, true),
		});

		await expect(runner.start()).rejects.toBeInstanceOf(RunnerStartError);
		expect(calls).toEqual(['topLevel', 'navigate ctx-1 http://10.0.0.2:8000/test.html none', 'end']);
	});
});

describe('createRunner', () => {
	it('builds a process runner for local targets', () => {
		const runner = createRunner(
			{
				kind: 'local',
				browser: 'firefox',
				label: 'firefox',
				branch: 'nightly',
				binary: '/opt/firefox/firefox',
				versionLabel: { mode: 'full' },
			},
			'http://127.0.0.1:8000/test.html',
		);
		expect(runner).toBeInstanceOf(LocalProcessRunner);
	});

	it('builds a session runner for remote targets', () => {
		const runner = createRunner(
			{
				kind: 'remote',
				label: 'firefox',
				branch: 'nightly',
				endpoint: 'ws://127.0.0.1:9222/session',
				forwardPort: 9222,
				versionLabel: { mode: 'full' },
			},
			'http://10.0.0.2:8000/test.html',
		);
		expect(runner).toBeInstanceOf(RemoteSessionRunner);
	});
});
