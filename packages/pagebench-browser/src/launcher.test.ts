import { existsSync } from 'node:fs';
import { describe, expect, it } from 'vitest';
import { buildArgs, launchBrowser } from './launcher.js';

describe('buildArgs', () => {
	it('opens Firefox on a fresh profile with the URL last', () => {
		expect(
			buildArgs('firefox', { profileDir: '/tmp/p', url: 'http://10.0.0.2:8000/test.html' }),
		).toEqual(['-profile', '/tmp/p', '-no-remote', '-new-instance', 'http://10.0.0.2:8000/test.html']);
	});

	it('gives Chrome its own user data dir', () => {
		const args = buildArgs('chrome', { profileDir: '/tmp/c', url: 'http://h/x.html' });
		expect(args[0]).toBe('--user-data-dir=/tmp/c');
		expect(args).toContain('--no-first-run');
		expect(args[args.length - 1]).toBe('http://h/x.html');
	});

	it('places extra args before the URL', () => {
		const args = buildArgs('firefox', {
			profileDir: '/tmp/p',
			url: 'http://h/x.html',
			extraArgs: ['-headless'],
		});
		expect(args.slice(-2)).toEqual(['-headless', 'http://h/x.html']);
	});
});

describe('launchBrowser', () => {
	it('rejects when the executable cannot be spawned', async () => {
		await expect(
			launchBrowser({ browser: 'firefox', executablePath: '/nonexistent/firefox', url: 'http://h/x.html' }),
		).rejects.toThrow('Failed to launch firefox');
	});

	it('removes the profile directory once the process is gone', async () => {
		// Node rejects the Firefox flags and exits straight away
		const browser = await launchBrowser({
			browser: 'firefox',
			executablePath: process.execPath,
			url: 'http://h/x.html',
		});

		expect(existsSync(browser.profileDir)).toBe(true);
		browser.terminate();
		await browser.close();
		expect(existsSync(browser.profileDir)).toBe(false);
	});
});
