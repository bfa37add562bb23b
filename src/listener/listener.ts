import type { Logger } from 'pino';
import WebSocket from 'ws';

import { ListenerRejectedError } from '../errors.js';
import type { Worker } from '../supervisor/types.js';
import { type FetchLike, Forwarder } from './forwarder.js';
import type { ListenerMessage, ServerMessage, ServerRequest } from './types.js';
import { ServerMessageSchema } from './types.js';

const SERVER_TIMEOUT_MS = 90_000;
const RECONNECT_BASE_MS = 100;
const RECONNECT_MAX_MS = 30_000;
const RECONNECT_JITTER_MS = 500;

// WS readyState constants
const WS_OPEN = 1;

export type SocketLike = {
	send: (data: string) => void;
	close: () => void;
	on: (event: string, listener: (...args: Array<unknown>) => void) => void;
	readyState: number;
};

export type SocketFactory = (url: string) => SocketLike;

export type ListenerOptions = {
	endpointId: string;
	forwardAddr: string;
	serverUrl: string;
	logger: Logger;
	reconnectMaxMs?: number;
	createSocket?: SocketFactory;
	fetch?: FetchLike;
};

function defaultSocketFactory(url: string): SocketLike {
	const ws = new WebSocket(url);
	return {
		send: (data) => ws.send(data),
		close: () => ws.close(),
		on: (event, listener) => {
			ws.on(event, listener);
		},
		get readyState() {
			return ws.readyState;
		},
	};
}

/**
 * Registers an endpoint with the server and forwards the requests it receives
 * to the local upstream at `forwardAddr`. Reconnects with backoff until the
 * run is cancelled or the server rejects the endpoint.
 */
export class Listener implements Worker {
	readonly endpointId: string;
	readonly forwardAddr: string;

	private readonly serverUrl: string;
	private readonly logger: Logger;
	private readonly reconnectMaxMs: number;
	private readonly createSocket: SocketFactory;
	private readonly forwarder: Forwarder;

	private ws: SocketLike | null = null;
	private reconnectAttempts = 0;
	private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
	private livenessTimer: ReturnType<typeof setTimeout> | null = null;
	private inflight: AbortController | null = null;
	private fail: ((err: Error) => void) | null = null;
	private stopped = true;

	constructor(options: ListenerOptions) {
		this.endpointId = options.endpointId;
		this.forwardAddr = options.forwardAddr;
		this.serverUrl = options.serverUrl;
		this.logger = options.logger;
		this.reconnectMaxMs = options.reconnectMaxMs ?? RECONNECT_MAX_MS;
		this.createSocket = options.createSocket ?? defaultSocketFactory;
		this.forwarder = new Forwarder({ forwardAddr: options.forwardAddr, logger: options.logger, fetch: options.fetch });
	}

	run(signal: AbortSignal): Promise<void> {
		if (!this.stopped) {
			return Promise.reject(new Error(`listener ${this.endpointId} is already running`));
		}
		if (signal.aborted) {
			return Promise.resolve();
		}

		return new Promise<void>((resolve, reject) => {
			const onAbort = (): void => {
				this.logger.info('Listener shutting down');
				this.shutdown();
				resolve();
			};

			this.fail = (err) => {
				signal.removeEventListener('abort', onAbort);
				this.shutdown();
				reject(err);
			};

			signal.addEventListener('abort', onAbort, { once: true });
			this.stopped = false;
			this.inflight = new AbortController();
			this.connect();
		});
	}

	isConnected(): boolean {
		return this.ws !== null && this.ws.readyState === WS_OPEN;
	}

	private shutdown(): void {
		this.stopped = true;
		this.fail = null;
		this.clearReconnectTimer();
		this.clearLivenessTimer();
		this.inflight?.abort();
		this.inflight = null;
		if (this.ws) {
			try {
				this.ws.close();
			} catch (err) {
				this.logger.debug({ err }, 'Error closing server connection');
			}
			this.ws = null;
		}
	}

	private connect(): void {
		if (this.stopped) return;

		this.logger.info({ url: this.serverUrl, attempt: this.reconnectAttempts }, 'Connecting to server');

		let socket: SocketLike;
		try {
			socket = this.createSocket(this.serverUrl);
		} catch (err) {
			this.logger.error({ err }, 'Failed to create WebSocket');
			this.scheduleReconnect();
			return;
		}

		this.ws = socket;
		this.attachSocketListeners(socket);
	}

	private attachSocketListeners(socket: SocketLike): void {
		socket.on('open', () => {
			if (this.ws !== socket) return;
			this.logger.info({ url: this.serverUrl }, 'Connected to server, registering endpoint');
			this.sendMessage({ type: 'register', endpointId: this.endpointId });
			this.armLivenessTimer();
		});

		socket.on('message', (rawData: unknown) => {
			if (this.ws !== socket) return;
			const raw = typeof rawData === 'string' ? rawData : String(rawData);
			this.armLivenessTimer();
			this.handleRawMessage(raw);
		});

		socket.on('close', () => {
			if (this.ws !== socket) return;
			this.logger.warn('Server connection closed');
			this.clearLivenessTimer();
			this.ws = null;
			this.scheduleReconnect();
		});

		socket.on('error', (err: unknown) => {
			this.logger.error({ err }, 'Server WebSocket error');
		});
	}

	private handleRawMessage(raw: string): void {
		let parsed: unknown;
		try {
			parsed = JSON.parse(raw);
		} catch {
			this.logger.warn({ raw }, 'Received invalid JSON from server');
			return;
		}

		const result = ServerMessageSchema.safeParse(parsed);
		if (!result.success) {
			this.logger.warn({ error: result.error.flatten(), parsed }, 'Received unknown server message');
			return;
		}

		this.handleServerMessage(result.data);
	}

	private handleServerMessage(msg: ServerMessage): void {
		switch (msg.type) {
			case 'registered':
				this.reconnectAttempts = 0;
				this.logger.info('Endpoint registered');
				return;
			case 'heartbeat':
				this.logger.debug({ timestamp: msg.timestamp }, 'Heartbeat received from server');
				this.sendMessage({ type: 'heartbeat_ack', timestamp: msg.timestamp });
				return;
			case 'request':
				this.handleRequest(msg);
				return;
			case 'error':
				if (msg.fatal) {
					this.logger.error({ code: msg.code, message: msg.message }, 'Server rejected endpoint');
					this.fail?.(new ListenerRejectedError(this.endpointId, msg.code, msg.message));
					return;
				}
				this.logger.error({ code: msg.code, message: msg.message }, 'Server error received');
				return;
		}
	}

	private handleRequest(request: ServerRequest): void {
		const inflight = this.inflight;
		if (!inflight) return;

		this.logger.debug({ id: request.id, method: request.method, path: request.path }, 'Request received');
		this.forwarder
			.forward(request, inflight.signal)
			.then((response) => {
				this.sendMessage(response);
			})
			.catch((err: unknown) => {
				if (inflight.signal.aborted) {
					this.logger.debug({ id: request.id }, 'Request cancelled by shutdown');
					return;
				}
				this.logger.error({ err, id: request.id }, 'Error forwarding request');
			});
	}

	private sendMessage(msg: ListenerMessage): void {
		if (!this.ws) {
			this.logger.warn({ type: msg.type }, 'Cannot send message: no WebSocket connection');
			return;
		}
		try {
			this.ws.send(JSON.stringify(msg));
		} catch (err) {
			this.logger.error({ err, type: msg.type }, 'Failed to send message to server');
		}
	}

	private armLivenessTimer(): void {
		this.clearLivenessTimer();
		this.livenessTimer = setTimeout(() => {
			this.livenessTimer = null;
			this.logger.warn({ timeoutMs: SERVER_TIMEOUT_MS }, 'Server connection idle, reconnecting');
			const socket = this.ws;
			this.ws = null;
			socket?.close();
			this.scheduleReconnect();
		}, SERVER_TIMEOUT_MS);
	}

	private clearLivenessTimer(): void {
		if (this.livenessTimer) {
			clearTimeout(this.livenessTimer);
			this.livenessTimer = null;
		}
	}

	private scheduleReconnect(): void {
		if (this.stopped) return;
		this.clearReconnectTimer();

		const jitter = Math.random() * RECONNECT_JITTER_MS;
		const backoff = Math.min(RECONNECT_BASE_MS * 2 ** this.reconnectAttempts, this.reconnectMaxMs);
		const delay = backoff + jitter;

		this.reconnectAttempts++;
		this.logger.info({ attempt: this.reconnectAttempts, delayMs: Math.round(delay) }, 'Scheduling reconnect');

		this.reconnectTimer = setTimeout(() => {
			this.reconnectTimer = null;
			this.connect();
		}, delay);
	}

	private clearReconnectTimer(): void {
		if (this.reconnectTimer) {
			clearTimeout(this.reconnectTimer);
			this.reconnectTimer = null;
		}
	}
}
