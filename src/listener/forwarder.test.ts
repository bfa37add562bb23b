import pino from 'pino';
import { describe, expect, it, vi } from 'vitest';

import { Forwarder } from './forwarder.js';
import type { ServerRequest } from './types.js';

const logger = pino({ enabled: false });

function makeRequest(overrides?: Partial<ServerRequest>): ServerRequest {
	return {
		type: 'request',
		id: 'req-1',
		method: 'GET',
		path: '/status?verbose=1',
		headers: {},
		...overrides,
	};
}

describe('Forwarder', () => {
	it('forwards to the upstream address and encodes the body', async () => {
		const fetch = vi.fn().mockResolvedValue(
			new Response('hello', { status: 200, headers: { 'content-type': 'text/plain' } }),
		);
		const forwarder = new Forwarder({ forwardAddr: 'localhost:3000', logger, fetch });

		const response = await forwarder.forward(makeRequest(), new AbortController().signal);

		expect(fetch).toHaveBeenCalledWith(
			'http://localhost:3000/status?verbose=1',
			expect.objectContaining({ method: 'GET', body: undefined }),
		);
		expect(response).toEqual({
			type: 'response',
			id: 'req-1',
			status: 200,
			headers: { 'content-type': 'text/plain' },
			body: 'aGVsbG8=',
		});
	});

	it('decodes the request body and drops hop-by-hop headers', async () => {
		const fetch = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));
		const forwarder = new Forwarder({ forwardAddr: '127.0.0.1:8080', logger, fetch });

		const response = await forwarder.forward(
			makeRequest({
				method: 'POST',
				path: '/items',
				headers: { 'Content-Type': 'application/json', Connection: 'keep-alive', Host: 'example.test' },
				body: Buffer.from('{"a":1}').toString('base64'),
			}),
			new AbortController().signal,
		);

		const init = fetch.mock.calls[0]?.[1];
		expect(init?.headers).toEqual({ 'content-type': 'application/json' });
		expect(Buffer.from(init?.body).toString()).toBe('{"a":1}');
		expect(response).toEqual({ type: 'response', id: 'req-1', status: 204, headers: {}, body: undefined });
	});

	it('answers 502 when the upstream is unreachable', async () => {
		const fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
		const forwarder = new Forwarder({ forwardAddr: 'localhost:3000', logger, fetch });

		const response = await forwarder.forward(makeRequest(), new AbortController().signal);

		expect(response.status).toBe(502);
		expect(Buffer.from(response.body ?? '', 'base64').toString()).toBe('upstream unreachable');
	});

	it('keeps every value of a repeated response header', async () => {
		const headers = new Headers();
		headers.append('set-cookie', 'a=1');
		headers.append('set-cookie', 'b=2');
		const fetch = vi.fn().mockResolvedValue(new Response('ok', { status: 200, headers }));
		const forwarder = new Forwarder({ forwardAddr: 'localhost:3000', logger, fetch });

		const response = await forwarder.forward(makeRequest(), new AbortController().signal);

		expect(response.headers['set-cookie']).toBe('a=1, b=2');
	});

	it('answers 502 when the upstream body fails mid-read', async () => {
		const body = new ReadableStream<Uint8Array>({
			start(controller) {
				controller.error(new Error('ECONNRESET'));
			},
		});
		const fetch = vi.fn().mockResolvedValue(new Response(body, { status: 200 }));
		const forwarder = new Forwarder({ forwardAddr: 'localhost:3000', logger, fetch });

		const response = await forwarder.forward(makeRequest(), new AbortController().signal);

		expect(response).toEqual({
			type: 'response',
			id: 'req-1',
			status: 502,
			headers: { 'content-type': 'text/plain' },
			body: Buffer.from('upstream response interrupted').toString('base64'),
		});
	});

	it('rejects when the request is cancelled while the body is read', async () => {
		const abort = new AbortController();
		const body = new ReadableStream<Uint8Array>({
			start(controller) {
				abort.abort();
				controller.error(new Error('body aborted'));
			},
		});
		const fetch = vi.fn().mockResolvedValue(new Response(body, { status: 200 }));
		const forwarder = new Forwarder({ forwardAddr: 'localhost:3000', logger, fetch });

		await expect(forwarder.forward(makeRequest(), abort.signal)).rejects.toThrow('body aborted');
	});

	it('rejects when the request is cancelled', async () => {
		const controller = new AbortController();
		const error = new Error('aborted');
		const fetch = vi.fn().mockImplementation(() => {
			controller.abort();
			return Promise.reject(error);
		});
		const forwarder = new Forwarder({ forwardAddr: 'localhost:3000', logger, fetch });

		await expect(forwarder.forward(makeRequest(), controller.signal)).rejects.toBe(error);
	});
});
