import type { Logger } from 'pino';

import type { ListenerResponse, ServerRequest } from './types.js';

const BAD_GATEWAY = 502;

// Hop-by-hop headers are never forwarded in either direction.
const HOP_BY_HOP_HEADERS = new Set([
	'connection',
	'keep-alive',
	'proxy-authenticate',
	'proxy-authorization',
	'te',
	'trailer',
	'transfer-encoding',
	'upgrade',
]);

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export type ForwarderOptions = {
	forwardAddr: string;
	logger: Logger;
	fetch?: FetchLike;
};

function filterHeaders(entries: Iterable<[string, string]>): Record<string, string> {
	const headers: Record<string, string> = {};
	for (const [name, value] of entries) {
		const key = name.toLowerCase();
		if (HOP_BY_HOP_HEADERS.has(key) || key === 'host' || key === 'content-length') continue;
		// Repeated fields such as set-cookie are folded into one value.
		const previous = headers[key];
		headers[key] = previous === undefined ? value : `${previous}, ${value}`;
	}
	return headers;
}

function badGateway(id: string, reason: string): ListenerResponse {
	return {
		type: 'response',
		id,
		status: BAD_GATEWAY,
		headers: { 'content-type': 'text/plain' },
		body: Buffer.from(reason).toString('base64'),
	};
}

export class Forwarder {
	private readonly forwardAddr: string;
	private readonly logger: Logger;
	private readonly fetch: FetchLike;

	constructor(options: ForwarderOptions) {
		this.forwardAddr = options.forwardAddr;
		this.logger = options.logger;
		this.fetch = options.fetch ?? ((url, init) => fetch(url, init));
	}

	/** Upstream failures become a 502 response; only cancellation rejects. */
	async forward(request: ServerRequest, signal: AbortSignal): Promise<ListenerResponse> {
		const url = `http://${this.forwardAddr}${request.path}`;
		const hasBody = request.body !== undefined && request.method !== 'GET' && request.method !== 'HEAD';

		let upstream: Response;
		try {
			upstream = await this.fetch(url, {
				method: request.method,
				headers: filterHeaders(Object.entries(request.headers)),
				body: hasBody ? Buffer.from(request.body ?? '', 'base64') : undefined,
				signal,
			});
		} catch (err) {
			if (signal.aborted) throw err;
			this.logger.warn({ err, id: request.id, url }, 'Failed to forward request to upstream');
			return badGateway(request.id, 'upstream unreachable');
		}

		let payload: Buffer;
		try {
			payload = Buffer.from(await upstream.arrayBuffer());
		} catch (err) {
			if (signal.aborted) throw err;
			this.logger.warn({ err, id: request.id, url }, 'Failed to read upstream response');
			return badGateway(request.id, 'upstream response interrupted');
		}
		this.logger.debug({ id: request.id, status: upstream.status, bytes: payload.length }, 'Forwarded request');

		return {
			type: 'response',
			id: request.id,
			status: upstream.status,
			headers: filterHeaders(upstream.headers.entries()),
			body: payload.length > 0 ? payload.toString('base64') : undefined,
		};
	}
}
