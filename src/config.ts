import { z } from 'zod';

import { ConfigError } from './errors.js';
import type { WorkerSpec } from './supervisor/types.js';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const DEFAULT_SERVER_URL = 'ws://localhost:8000/agent/v1/listener';

const commaList = z
	.string()
	.optional()
	.transform((value) =>
		(value ?? '')
			.split(',')
			.map((item) => item.trim())
			.filter((item) => item.length > 0),
	);

const envSchema = z.object({
	NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
	LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
	LOG_SUBSYSTEMS: commaList,
	AGENT_LISTENERS: commaList,
	AGENT_SERVER_URL: z.string().url().default(DEFAULT_SERVER_URL),
	AGENT_SHUTDOWN_TIMEOUT_MS: z.coerce.number().int().min(0).default(0),
	AGENT_RECONNECT_MAX_MS: z.coerce.number().int().positive().default(30_000),
});

export type EnvConfig = z.infer<typeof envSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
	const result = envSchema.safeParse(env);
	if (!result.success) {
		const formatted = result.error.flatten().fieldErrors;
		throw new ConfigError(`Invalid environment configuration: ${JSON.stringify(formatted)}`);
	}
	return result.data;
}

/**
 * Splits a `<endpoint ID>/<forward addr>` entry. Exactly one `/` is allowed,
 * so forward addresses carry no path.
 */
export function parseListener(entry: string): WorkerSpec {
	const elems = entry.split('/');
	const [identifier, target] = elems;
	if (elems.length !== 2 || !identifier || !target) {
		throw new ConfigError(`invalid listener '${entry}': must be in format '<endpoint ID>/<forward addr>'`);
	}
	return { identifier, target };
}

// Values supplied on the command line; anything left undefined falls back to the environment.
export type AgentFlags = {
	listeners?: ReadonlyArray<string> | undefined;
	serverUrl?: string | undefined;
	logLevel?: string | undefined;
	logSubsystems?: ReadonlyArray<string> | undefined;
	shutdownTimeout?: string | number | undefined;
};

const agentConfigSchema = z.object({
	listeners: z
		.array(z.string())
		.min(1, 'at least one listener is required')
		.transform((entries, ctx) => {
			const specs: Array<WorkerSpec> = [];
			for (const entry of entries) {
				try {
					specs.push(parseListener(entry));
				} catch (err) {
					ctx.addIssue({
						code: z.ZodIssueCode.custom,
						message: err instanceof Error ? err.message : String(err),
					});
				}
			}
			return specs;
		}),
	server: z.object({
		url: z.string().url('server url must be a valid URL'),
		reconnectMaxMs: z.number().int().positive(),
	}),
	log: z.object({
		level: z.enum(LOG_LEVELS, { errorMap: () => ({ message: `log level must be one of: ${LOG_LEVELS.join(', ')}` }) }),
		subsystems: z.array(z.string()),
		pretty: z.boolean(),
	}),
	shutdownTimeoutMs: z.coerce.number().int().min(0, 'shutdown timeout must not be negative'),
});

export type AgentConfig = z.infer<typeof agentConfigSchema>;

function splitEntries(values: ReadonlyArray<string>): Array<string> {
	return values
		.flatMap((value) => value.split(','))
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
}

export function resolveAgentConfig(flags: AgentFlags, env: NodeJS.ProcessEnv = process.env): AgentConfig {
	const base = loadConfig(env);

	const result = agentConfigSchema.safeParse({
		listeners: flags.listeners ? splitEntries(flags.listeners) : base.AGENT_LISTENERS,
		server: {
			url: flags.serverUrl ?? base.AGENT_SERVER_URL,
			reconnectMaxMs: base.AGENT_RECONNECT_MAX_MS,
		},
		log: {
			level: flags.logLevel ?? base.LOG_LEVEL,
			subsystems: flags.logSubsystems ? splitEntries(flags.logSubsystems) : base.LOG_SUBSYSTEMS,
			pretty: base.NODE_ENV !== 'production',
		},
		shutdownTimeoutMs: flags.shutdownTimeout ?? base.AGENT_SHUTDOWN_TIMEOUT_MS,
	});

	if (!result.success) {
		const messages = result.error.issues.map((issue) => issue.message);
		throw new ConfigError(messages.join('; '));
	}
	return result.data;
}
