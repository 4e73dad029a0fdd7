// ============================================================================
// pagebench browser - BiDi Session
// Thin client over Transport: open a session on a running browser, drive a
// browsing context, end the session without touching the browser process.
// ============================================================================

import { Transport, type TransportOptions } from './transport.js';
import {
	BiDiError,
	type BrowsingContextCreateParams,
	type BrowsingContextCreateResult,
	type BrowsingContextGetTreeResult,
	type BrowsingContextInfo,
	type BrowsingContextNavigateParams,
	type BrowsingContextNavigateResult,
	type SessionNewResult,
} from './types.js';
import { redactMessage } from './utils.js';

/** Options for connecting a BiDi session */
export interface SessionOptions extends TransportOptions {
	/** Print every raw message (redacted) to the console */
	debug?: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(result: Record<string, unknown>, key: string, method: string): string {
	const value = result[key];
	if (typeof value !== 'string') {
		throw new BiDiError('unknown error', `${method}: expected string "${key}" in result`);
	}
	return value;
}

function toContextInfo(value: unknown): BrowsingContextInfo | null {
	if (!isRecord(value) || typeof value.context !== 'string') return null;
	const children = Array.isArray(value.children)
		? value.children.map(toContextInfo).filter((c): c is BrowsingContextInfo => c !== null)
		: null;
	return {
		context: value.context,
		url: typeof value.url === 'string' ? value.url : '',
		children,
		parent: typeof value.parent === 'string' ? value.parent : null,
	};
}

/**
 * BiDiSession talks to a browser that is already running, typically on a
 * device reached through a forwarded port.
 *
 * ```ts
 * const session = await BiDiSession.connect('ws://127.0.0.1:9222/session');
 * const context = await session.browsingContext.topLevel();
 * await session.browsingContext.navigate({ context, url, wait: 'none' });
 * await session.end();
 * ```
 */
export class BiDiSession {
	private sessionId: string | null = null;
	readonly browsingContext: BrowsingContextModule;

	private constructor(private readonly transport: Transport) {
		this.browsingContext = new BrowsingContextModule(transport);
	}

	/**
	 * Connect to a BiDi endpoint and create a session.
	 */
	static async connect(wsEndpoint: string, options: SessionOptions = {}): Promise<BiDiSession> {
		const transportOptions: TransportOptions = { ...options };
		if (options.debug) {
			transportOptions.onRawMessage = (dir, data) => {
				const prefix = dir === 'send' ? '>>> SEND' : '<<< RECV';
				console.log(`${prefix}: ${redactMessage(data)}`);
			};
		}

		const transport = new Transport(transportOptions);
		await transport.connect(wsEndpoint);

		const session = new BiDiSession(transport);
		try {
			const result = await transport.send('session.new', { capabilities: {} });
			const created: SessionNewResult = {
				sessionId: requireString(result, 'sessionId', 'session.new'),
				capabilities: isRecord(result.capabilities) ? result.capabilities : {},
			};
			session.sessionId = created.sessionId;
		} catch (err) {
			await transport.close();
			throw err;
		}

		return session;
	}

	/** The id the browser assigned to this session */
	get id(): string | null {
		return this.sessionId;
	}

	/** Whether the underlying transport is still open */
	get isConnected(): boolean {
		return this.transport.isConnected;
	}

	/**
	 * End the session and close the socket. The browser keeps running, and so
	 * does whatever page it is showing.
	 */
	async end(): Promise<void> {
		try {
			if (this.transport.isConnected) {
				await this.transport.send('session.end', {});
			}
		} finally {
			this.sessionId = null;
			await this.transport.close();
		}
	}
}

// ---------------------------------------------------------------------------
// Module: browsingContext
// ---------------------------------------------------------------------------

class BrowsingContextModule {
	constructor(private transport: Transport) {}

	/** Get the tree of browsing contexts */
	async getTree(params: { maxDepth?: number } = {}): Promise<BrowsingContextGetTreeResult> {
		const result = await this.transport.send('browsingContext.getTree', { ...params });
		const contexts = Array.isArray(result.contexts) ? result.contexts : [];
		return {
			contexts: contexts.map(toContextInfo).filter((c): c is BrowsingContextInfo => c !== null),
		};
	}

	/** Create a new tab or window */
	async create(params: BrowsingContextCreateParams): Promise<BrowsingContextCreateResult> {
		const result = await this.transport.send('browsingContext.create', { ...params });
		return { context: requireString(result, 'context', 'browsingContext.create') };
	}

	/** Navigate a context to a URL */
	async navigate(params: BrowsingContextNavigateParams): Promise<BrowsingContextNavigateResult> {
		const result = await this.transport.send('browsingContext.navigate', { ...params });
		return {
			navigation: typeof result.navigation === 'string' ? result.navigation : null,
			url: typeof result.url === 'string' ? result.url : params.url,
		};
	}

	/**
	 * The first top-level context, or a fresh tab when the browser has none.
	 */
	async topLevel(): Promise<string> {
		const { contexts } = await this.getTree({ maxDepth: 0 });
		const first = contexts[0];
		if (first) return first.context;
		const { context } = await this.create({ type: 'tab' });
		return context;
	}
}
