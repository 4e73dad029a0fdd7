// ============================================================================
// pagebench browser - WebSocket Transport
// Low-level transport for WebDriver BiDi over a WebSocket: sends commands,
// correlates responses by id.
// ============================================================================

import { WebSocket } from 'ws';
import type { BiDiCommand, BiDiErrorResponse, BiDiSuccessResponse } from './types.js';
import { BiDiError } from './types.js';

/** Options for creating a transport connection */
export interface TransportOptions {
	/** Connection and per-command timeout in milliseconds (default: 30000) */
	timeout?: number;
	/** Called when the connection drops unexpectedly */
	onDisconnect?: (reason: string) => void;
	/** Called for every raw message (debug tracing) */
	onRawMessage?: (direction: 'send' | 'receive', data: string) => void;
}

/** Tracks a pending command waiting for its response */
interface PendingCommand {
	method: string;
	resolve: (result: Record<string, unknown>) => void;
	reject: (error: BiDiError) => void;
	timer: ReturnType<typeof setTimeout>;
}

/**
 * Transport owns one WebSocket to a BiDi endpoint.
 *
 * Commands get a monotonically increasing id; a response settles the pending
 * promise with the same id. Events and frames that are not command
 * responses are dropped.
 */
export class Transport {
	private ws: WebSocket | null = null;
	private nextId = 0;
	private pending = new Map<number, PendingCommand>();
	private connected = false;
	private readonly timeout: number;
	private readonly onDisconnect?: (reason: string) => void;
	private readonly onRawMessage?: (direction: 'send' | 'receive', data: string) => void;

	constructor(options: TransportOptions = {}) {
		this.timeout = options.timeout ?? 30_000;
		this.onDisconnect = options.onDisconnect;
		this.onRawMessage = options.onRawMessage;
	}

	/**
	 * Connect to a BiDi WebSocket endpoint (e.g. "ws://127.0.0.1:9222/session").
	 */
	async connect(url: string): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			const ws = new WebSocket(url);
			this.ws = ws;

			const timer = setTimeout(() => {
				reject(
					new BiDiError('session not created', `Connection to ${url} timed out after ${this.timeout}ms`),
				);
				ws.terminate();
			}, this.timeout);

			ws.on('open', () => {
				clearTimeout(timer);
				this.connected = true;
				resolve();
			});

			ws.on('message', (data: Buffer) => {
				const raw = data.toString('utf-8');
				this.onRawMessage?.('receive', raw);
				this.handleMessage(raw);
			});

			ws.on('error', (err: Error) => {
				clearTimeout(timer);
				if (!this.connected) {
					reject(new BiDiError('session not created', `WebSocket error: ${err.message}`));
				}
			});

			ws.on('close', (code: number, reason: Buffer) => {
				clearTimeout(timer);
				const wasConnected = this.connected;
				this.connected = false;
				this.rejectAll(`Connection closed (code ${code})`);

				if (wasConnected) {
					this.onDisconnect?.(reason.toString('utf-8') || `code ${code}`);
				} else {
					reject(
						new BiDiError('session not created', `WebSocket closed before connection established (code: ${code})`),
					);
				}
			});
		});
	}

	/**
	 * Send a BiDi command and wait for its result.
	 */
	async send(method: string, params: Record<string, unknown> = {}): Promise<Record<string, unknown>> {
		const ws = this.ws;
		if (!this.connected || !ws) {
			throw new BiDiError('session not created', 'Not connected to browser');
		}

		const id = this.nextId++;
		const command: BiDiCommand = { id, method, params };
		const raw = JSON.stringify(command);

		return new Promise<Record<string, unknown>>((resolve, reject) => {
			const timer = setTimeout(() => {
				this.pending.delete(id);
				reject(new BiDiError('unknown error', `Command "${method}" timed out after ${this.timeout}ms`));
			}, this.timeout);

			this.pending.set(id, { method, resolve, reject, timer });
			this.onRawMessage?.('send', raw);
			ws.send(raw);
		});
	}

	/** Whether the transport is currently connected */
	get isConnected(): boolean {
		return this.connected;
	}

	/**
	 * Close the connection. Pending commands are rejected.
	 */
	async close(): Promise<void> {
		this.rejectAll('Transport closed');
		this.connected = false;

		const ws = this.ws;
		if (!ws || ws.readyState === WebSocket.CLOSED) return;

		return new Promise<void>((resolve) => {
			ws.once('close', () => resolve());
			ws.close();
		});
	}

	// -----------------------------------------------------------------------
	// Private
	// -----------------------------------------------------------------------

	private rejectAll(reason: string): void {
		for (const [id, cmd] of this.pending) {
			clearTimeout(cmd.timer);
			cmd.reject(new BiDiError('unknown error', `${reason} while waiting for command ${id} (${cmd.method})`));
		}
		this.pending.clear();
	}

	private handleMessage(raw: string): void {
		let msg: unknown;
		try {
			msg = JSON.parse(raw);
		} catch {
			// Malformed JSON from browser: nothing to correlate it with
			return;
		}
		if (!isResponse(msg)) return;

		const pending = this.pending.get(msg.id);
		if (!pending) return;

		this.pending.delete(msg.id);
		clearTimeout(pending.timer);

		if (msg.type === 'success') {
			pending.resolve(msg.result);
		} else {
			pending.reject(new BiDiError(msg.error, msg.message, msg.stacktrace));
		}
	}
}

/** A command response: an object with a numeric id and a success or error type */
function isResponse(value: unknown): value is BiDiSuccessResponse | BiDiErrorResponse {
	if (typeof value !== 'object' || value === null) return false;
	if (!('id' in value) || typeof value.id !== 'number') return false;
	return 'type' in value && (value.type === 'success' || value.type === 'error');
}
