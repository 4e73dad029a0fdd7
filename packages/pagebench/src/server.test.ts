import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { FastifyInstance } from 'fastify';
import { ResultChannel } from 'pagebench-runner';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { SetupError } from './errors.js';
import { buildResultServer, resolveStaticPath, startResultServer } from './server.js';

const FIREFOX_UA = 'Mozilla/5.0 (X11; Linux x86_64; rv:102.0) Gecko/20100101 Firefox/102.0';

function form(results: string): string {
	return new URLSearchParams({ results }).toString();
}

describe('result server', () => {
	let root: string;
	let channel: ResultChannel;
	let app: FastifyInstance;

	beforeEach(async () => {
		root = await mkdtemp(join(tmpdir(), 'pagebench-static-'));
		await writeFile(join(root, 'index.html'), '<h1>home</h1>');
		await mkdir(join(root, 'suite'));
		await writeFile(join(root, 'suite', 'test.html'), '<p>test</p>');
		await writeFile(join(root, 'suite', 'bench.js'), 'run();');
		await mkdir(join(root, 'empty'));

		channel = new ResultChannel();
		app = buildResultServer({ channel, staticDir: root });
	});

	afterEach(async () => {
		await app.close();
		await rm(root, { recursive: true, force: true });
	});

	describe('POST /results', () => {
		it('delivers the form field and request headers to the channel', async () => {
			const response = await app.inject({
				method: 'POST',
				url: '/results',
				headers: {
					'content-type': 'application/x-www-form-urlencoded',
					'user-agent': FIREFOX_UA,
				},
				payload: form('[{"page":"a","time_ms":120}]'),
			});

			expect(response.statusCode).toBe(204);
			const postback = channel.peek();
			expect(postback?.results).toEqual([{ page: 'a', time_ms: 120 }]);
			expect(postback?.metadata['user-agent']).toBe(FIREFOX_UA);
		});

		it('accepts a JSON body as well', async () => {
			const response = await app.inject({
				method: 'POST',
				url: '/results',
				payload: { results: [{ page: 'b', time_ms: 7 }] },
			});

			expect(response.statusCode).toBe(204);
			expect(channel.peek()?.results).toEqual([{ page: 'b', time_ms: 7 }]);
		});

		it('answers 400 without a results field', async () => {
			const response = await app.inject({
				method: 'POST',
				url: '/results',
				headers: { 'content-type': 'application/x-www-form-urlencoded' },
				payload: 'other=1',
			});

			expect(response.statusCode).toBe(400);
			expect(response.json()).toEqual({ error: 'missing "results" field' });
			expect(channel.peek()).toBeNull();
		});

		it('answers 400 for results that are not JSON and wakes the waiting trial', async () => {
			const response = await app.inject({
				method: 'POST',
				url: '/results',
				headers: { 'content-type': 'application/x-www-form-urlencoded' },
				payload: form('not json'),
			});

			expect(response.statusCode).toBe(400);
			expect(response.json()).toEqual({ error: 'results field is not valid JSON' });
			await expect(channel.waitForPostback(1000)).resolves.toEqual({
				kind: 'malformed',
				reason: 'results field is not valid JSON',
			});
		});

		it('answers 400 for an empty result list', async () => {
			const response = await app.inject({
				method: 'POST',
				url: '/results',
				headers: { 'content-type': 'application/x-www-form-urlencoded' },
				payload: form('[]'),
			});

			expect(response.statusCode).toBe(400);
			expect(response.json()).toEqual({ error: 'postback contained no result records' });
		});
	});

	describe('GET', () => {
		it('serves files with a content type by extension', async () => {
			const page = await app.inject({ method: 'GET', url: '/suite/test.html' });
			expect(page.statusCode).toBe(200);
			expect(page.headers['content-type']).toBe('text/html; charset=utf-8');
			expect(page.body).toBe('<p>test</p>');

			const script = await app.inject({ method: 'GET', url: '/suite/bench.js?run=1' });
			expect(script.headers['content-type']).toBe('text/javascript; charset=utf-8');
			expect(script.body).toBe('run();');
		});

		it('serves index.html for directories', async () => {
			const response = await app.inject({ method: 'GET', url: '/' });
			expect(response.statusCode).toBe(200);
			expect(response.body).toBe('<h1>home</h1>');
		});

		it('answers 404 for missing files and directories without an index', async () => {
			expect((await app.inject({ method: 'GET', url: '/suite/missing.html' })).statusCode).toBe(404);
			expect((await app.inject({ method: 'GET', url: '/empty' })).statusCode).toBe(404);
			expect((await app.inject({ method: 'GET', url: '/suite/test.html/x' })).statusCode).toBe(404);
		});
	});
});

describe('resolveStaticPath', () => {
	it('maps URLs under the root', () => {
		expect(resolveStaticPath('/srv/www', '/suite/test.html')).toBe('/srv/www/suite/test.html');
		expect(resolveStaticPath('/srv/www', '/')).toBe('/srv/www');
		expect(resolveStaticPath('/srv/www', '/a%20b.html')).toBe('/srv/www/a b.html');
	});

	it('rejects paths that leave the root', () => {
		expect(resolveStaticPath('/srv/www', '/..%2f..%2fetc/passwd')).toBeNull();
		expect(resolveStaticPath('/srv/www', '/..%2fwww-private/key')).toBeNull();
	});

	it('rejects URLs that do not decode', () => {
		expect(resolveStaticPath('/srv/www', '/%E0%A4%A')).toBeNull();
	});
});

describe('startResultServer', () => {
	it('listens and reports the URL prefix', async () => {
		const root = await mkdtemp(join(tmpdir(), 'pagebench-static-'));
		await writeFile(join(root, 'index.html'), 'ok');

		const server = await startResultServer({
			channel: new ResultChannel(),
			staticDir: root,
			host: '127.0.0.1',
			port: 0,
		});

		try {
			expect(server.url).toBe(`http://127.0.0.1:${server.port}/`);
			expect(server.port).toBeGreaterThan(0);
			const response = await fetch(server.url);
			expect(response.status).toBe(200);
			expect(await response.text()).toBe('ok');
		} finally {
			await server.stop();
			await rm(root, { recursive: true, force: true });
		}
	});

	it('turns a busy port into a setup error', async () => {
		const channel = new ResultChannel();
		const first = await startResultServer({ channel, staticDir: tmpdir(), host: '127.0.0.1', port: 0 });

		try {
			await expect(
				startResultServer({ channel, staticDir: tmpdir(), host: '127.0.0.1', port: first.port }),
			).rejects.toBeInstanceOf(SetupError);
		} finally {
			await first.stop();
		}
	});
});
