// ============================================================================
// pagebench - Result Server
// Serves the benchmark pages and receives their results.
//
// GET  /*        static files from the benchmark root
// POST /results  form field "results": a JSON array of result records
// ============================================================================

import type { Stats } from 'node:fs';
import { readFile, stat } from 'node:fs/promises';
import { extname, join, resolve, sep } from 'node:path';
import Fastify, { type FastifyInstance } from 'fastify';
import { PostbackError, type ResultChannel } from 'pagebench-runner';
import * as v from 'valibot';
import { SetupError } from './errors.js';
import { getLocalIp } from './network.js';

export type ServerLogLevel = 'silent' | 'error' | 'info' | 'debug';

export interface ResultServerOptions {
	/** Where postbacks are delivered */
	channel: ResultChannel;
	/** Directory the benchmark pages are served from */
	staticDir: string;
	/** Fastify log level (default: logging off) */
	logLevel?: ServerLogLevel;
}

export interface StartServerOptions extends ResultServerOptions {
	/** Bind address (default: first non-internal IPv4 address) */
	host?: string;
	/** Port, 0 for any free one */
	port: number;
}

/** A listening result server */
export interface RunningResultServer {
	/** URL prefix benchmark paths are resolved against, e.g. http://10.0.0.2:8000/ */
	url: string;
	host: string;
	port: number;
	app: FastifyInstance;
	stop: () => Promise<void>;
}

const CONTENT_TYPES: Record<string, string> = {
	'.html': 'text/html; charset=utf-8',
	'.htm': 'text/html; charset=utf-8',
	'.js': 'text/javascript; charset=utf-8',
	'.mjs': 'text/javascript; charset=utf-8',
	'.css': 'text/css; charset=utf-8',
	'.json': 'application/json; charset=utf-8',
	'.txt': 'text/plain; charset=utf-8',
	'.svg': 'image/svg+xml',
	'.png': 'image/png',
	'.jpg': 'image/jpeg',
	'.jpeg': 'image/jpeg',
	'.gif': 'image/gif',
	'.webp': 'image/webp',
	'.ico': 'image/x-icon',
	'.wasm': 'application/wasm',
	'.woff2': 'font/woff2',
};

const PostbackBodySchema = v.object({
	results: v.union([v.string(), v.array(v.unknown())]),
});

/**
 * Build (but do not start) the result server.
 */
export function buildResultServer(options: ResultServerOptions): FastifyInstance {
	const { channel } = options;
	const root = resolve(options.staticDir);

	const app = Fastify({
		logger: options.logLevel ? { level: options.logLevel } : false,
	});

	// Benchmark pages submit a plain HTML form
	app.addContentTypeParser(
		'application/x-www-form-urlencoded',
		{ parseAs: 'string' },
		(_req, body, done) => {
			const result: Record<string, string> = {};
			for (const [key, value] of new URLSearchParams(String(body))) {
				result[key] = value;
			}
			done(null, result);
		},
	);

	app.post('/results', async (request, reply) => {
		const body = v.safeParse(PostbackBodySchema, request.body);
		if (!body.success) {
			return reply.code(400).send({ error: 'missing "results" field' });
		}

		try {
			channel.deliver(request.headers, body.output.results);
		} catch (err) {
			if (err instanceof PostbackError) {
				request.log.warn({ reason: err.reason }, 'malformed postback');
				return reply.code(400).send({ error: err.reason });
			}
			throw err;
		}

		request.log.debug({ userAgent: request.headers['user-agent'] }, 'postback delivered');
		return reply.code(204).send();
	});

	app.get('/*', async (request, reply) => {
		const file = resolveStaticPath(root, request.url);
		if (file === null) {
			return reply.code(403).send({ error: 'forbidden' });
		}

		const found = await findStaticFile(file);
		if (found === null) {
			return reply.code(404).send({ error: 'not found' });
		}

		const content = await readFile(found);
		return reply
			.header('content-type', CONTENT_TYPES[extname(found).toLowerCase()] ?? 'application/octet-stream')
			.header('cache-control', 'no-store')
			.send(content);
	});

	return app;
}

/**
 * Map a request URL onto a path under `root`. Returns null for anything
 * that would escape the root or cannot be decoded.
 */
export function resolveStaticPath(root: string, requestUrl: string): string | null {
	let pathname: string;
	try {
		pathname = decodeURIComponent(new URL(requestUrl, 'http://localhost').pathname);
	} catch {
		return null;
	}

	if (pathname.includes('\0')) return null;

	const file = resolve(root, `.${pathname}`);
	if (file !== root && !file.startsWith(root + sep)) return null;
	return file;
}

async function findStaticFile(file: string): Promise<string | null> {
	const info = await statOrNull(file);
	if (info?.isFile()) return file;
	if (info?.isDirectory()) {
		const index = join(file, 'index.html');
		const indexInfo = await statOrNull(index);
		return indexInfo?.isFile() ? index : null;
	}
	return null;
}

async function statOrNull(path: string): Promise<Stats | null> {
	try {
		return await stat(path);
	} catch (err) {
		if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
			return null;
		}
		throw err;
	}
}

/**
 * Start the result server and return the URL prefix the plan should use.
 *
 * ```ts
 * const server = await startResultServer({ channel, staticDir, port: 8000 });
 * // ... run the plan against server.url ...
 * await server.stop();
 * ```
 */
export async function startResultServer(options: StartServerOptions): Promise<RunningResultServer> {
	const host = options.host ?? getLocalIp();
	const app = buildResultServer(options);

	try {
		await app.listen({ host, port: options.port });
	} catch (err) {
		await app.close();
		throw new SetupError(`Result server could not listen on ${host}:${options.port}`, {
			hint: 'Pick another --port, or pass --host with an address of this machine.',
			cause: err,
		});
	}

	const address = app.server.address();
	const port = address !== null && typeof address === 'object' ? address.port : options.port;
	const url = `http://${host.includes(':') ? `[${host}]` : host}:${port}/`;

	return {
		url,
		host,
		port,
		app,
		stop: () => app.close(),
	};
}
