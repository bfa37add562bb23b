import { describe, expect, it } from 'vitest';

import { DEFAULT_SERVER_URL, loadConfig, parseListener, resolveAgentConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('loadConfig', () => {
	it('returns defaults when no env vars are set', () => {
		const config = loadConfig({});
		expect(config.NODE_ENV).toBe('development');
		expect(config.LOG_LEVEL).toBe('info');
		expect(config.LOG_SUBSYSTEMS).toEqual([]);
		expect(config.AGENT_LISTENERS).toEqual([]);
		expect(config.AGENT_SERVER_URL).toBe(DEFAULT_SERVER_URL);
		expect(config.AGENT_SHUTDOWN_TIMEOUT_MS).toBe(0);
		expect(config.AGENT_RECONNECT_MAX_MS).toBe(30_000);
	});

	it('reads the test environment set by the runner', () => {
		expect(loadConfig().NODE_ENV).toBe('test');
	});

	it('splits comma separated lists', () => {
		const config = loadConfig({ AGENT_LISTENERS: 'a/localhost:3000, b/localhost:4000,', LOG_SUBSYSTEMS: 'listener' });
		expect(config.AGENT_LISTENERS).toEqual(['a/localhost:3000', 'b/localhost:4000']);
		expect(config.LOG_SUBSYSTEMS).toEqual(['listener']);
	});

	it('throws ConfigError for invalid values', () => {
		expect(() => loadConfig({ AGENT_SERVER_URL: 'not a url' })).toThrow(ConfigError);
		expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow('Invalid environment configuration');
	});
});

describe('parseListener', () => {
	it('splits the endpoint ID from the forward address', () => {
		expect(parseListener('my-endpoint/localhost:3000')).toEqual({
			identifier: 'my-endpoint',
			target: 'localhost:3000',
		});
	});

	it.each(['my-endpoint', '/localhost:3000', 'my-endpoint/', 'a/b/c', ''])('rejects %j', (entry) => {
		expect(() => parseListener(entry)).toThrow(
			`invalid listener '${entry}': must be in format '<endpoint ID>/<forward addr>'`,
		);
	});
});

describe('resolveAgentConfig', () => {
	it('builds the config from flags', () => {
		const config = resolveAgentConfig(
			{
				listeners: ['a/localhost:3000,b/localhost:4000', 'a/localhost:5000'],
				serverUrl: 'wss://agent.example.com/agent/v1/listener',
				logLevel: 'debug',
				logSubsystems: ['listener,supervisor'],
				shutdownTimeout: '2500',
			},
			{},
		);

		expect(config).toEqual({
			listeners: [
				{ identifier: 'a', target: 'localhost:3000' },
				{ identifier: 'b', target: 'localhost:4000' },
				{ identifier: 'a', target: 'localhost:5000' },
			],
			server: { url: 'wss://agent.example.com/agent/v1/listener', reconnectMaxMs: 30_000 },
			log: { level: 'debug', subsystems: ['listener', 'supervisor'], pretty: true },
			shutdownTimeoutMs: 2500,
		});
	});

	it('falls back to the environment for unset flags', () => {
		const config = resolveAgentConfig(
			{},
			{
				NODE_ENV: 'production',
				AGENT_LISTENERS: 'a/localhost:3000',
				AGENT_SERVER_URL: 'ws://env.test/listener',
				AGENT_SHUTDOWN_TIMEOUT_MS: '1000',
				LOG_LEVEL: 'warn',
			},
		);

		expect(config.listeners).toEqual([{ identifier: 'a', target: 'localhost:3000' }]);
		expect(config.server.url).toBe('ws://env.test/listener');
		expect(config.shutdownTimeoutMs).toBe(1000);
		expect(config.log).toEqual({ level: 'warn', subsystems: [], pretty: false });
	});

	it('prefers flags over the environment', () => {
		const config = resolveAgentConfig(
			{ listeners: ['flag/localhost:3000'] },
			{ AGENT_LISTENERS: 'env/localhost:4000' },
		);
		expect(config.listeners).toEqual([{ identifier: 'flag', target: 'localhost:3000' }]);
	});

	it('requires at least one listener', () => {
		expect(() => resolveAgentConfig({}, {})).toThrow(new ConfigError('at least one listener is required'));
	});

	it('reports every problem at once', () => {
		expect(() =>
			resolveAgentConfig({ listeners: ['bad', 'a/localhost:3000'], logLevel: 'verbose', shutdownTimeout: '-5' }, {}),
		).toThrow(
			"invalid listener 'bad': must be in format '<endpoint ID>/<forward addr>'; log level must be one of: trace, debug, info, warn, error, fatal; shutdown timeout must not be negative",
		);
	});

	it('rejects an invalid server url flag', () => {
		expect(() => resolveAgentConfig({ listeners: ['a/localhost:3000'], serverUrl: 'localhost' }, {})).toThrow(
			'server url must be a valid URL',
		);
	});
});
