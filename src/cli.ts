import { Command } from 'commander';
import type { Logger } from 'pino';

import { runAgent } from './agent.js';
import { type AgentConfig, type AgentFlags, resolveAgentConfig } from './config.js';
import { ConfigError } from './errors.js';
import { createLogger } from './logger.js';
import { type SignalTarget, createProcessSignalSource } from './supervisor/signal-source.js';
import type { WorkerFactory } from './supervisor/types.js';

const EXAMPLES = `
The agent runs alongside your upstream services and registers one or more
listeners with the server. It then forwards incoming requests for each
listener's endpoint to that listener's upstream address.

For example, with a service running at 'localhost:3000' you can register the
endpoint 'my-endpoint' to forward requests to it.

Examples:
  # Register a listener with endpoint ID 'my-endpoint-123' that forwards
  # requests to 'localhost:3000'.
  upstream-agent --listeners my-endpoint-123/localhost:3000

  # Register multiple listeners.
  upstream-agent --listeners my-endpoint-123/localhost:3000 \\
      --listeners my-endpoint-xyz/localhost:6000

  # Specify the server URL.
  upstream-agent --listeners my-endpoint-123/localhost:3000 \\
      --server-url wss://agent.example.com/agent/v1/listener
`;

type CliOptions = {
	listeners?: Array<string>;
	serverUrl?: string;
	logLevel?: string;
	logSubsystems?: Array<string>;
	shutdownTimeout?: string;
};

function collect(value: string, previous: Array<string> | undefined): Array<string> {
	return [...(previous ?? []), value];
}

export function createProgram(action: (flags: AgentFlags) => Promise<void> | void): Command {
	const program = new Command();

	program
		.name('upstream-agent')
		.description('Start the upstream agent.')
		.addHelpText('after', EXAMPLES)
		.option(
			'--listeners <entries>',
			"comma separated listeners to register, with format '<endpoint ID>/<forward addr>'",
			collect,
		)
		.option('--server-url <url>', 'URL of the server to register listeners with')
		.option('--log-level <level>', 'log level')
		.option('--log-subsystems <names>', 'enable debug logs for the given subsystems', collect)
		.option('--shutdown-timeout <ms>', 'time to wait for listeners to stop after shutdown starts, 0 waits forever')
		.action(async () => {
			const opts = program.opts<CliOptions>();
			await action({
				listeners: opts.listeners,
				serverUrl: opts.serverUrl,
				logLevel: opts.logLevel,
				logSubsystems: opts.logSubsystems,
				shutdownTimeout: opts.shutdownTimeout,
			});
		});

	return program;
}

export type CliDependencies = {
	env?: NodeJS.ProcessEnv;
	signalTarget?: SignalTarget;
	logger?: Logger;
	createWorker?: WorkerFactory;
	exit?: (code: number) => void;
	stderr?: (line: string) => void;
};

export async function runCli(argv: ReadonlyArray<string>, deps: CliDependencies = {}): Promise<void> {
	const exit = deps.exit ?? ((code: number) => process.exit(code));
	const stderr = deps.stderr ?? ((line: string) => console.error(line));

	const program = createProgram(async (flags) => {
		let config: AgentConfig;
		try {
			config = resolveAgentConfig(flags, deps.env ?? process.env);
		} catch (err) {
			if (!(err instanceof ConfigError)) throw err;
			stderr(`invalid config: ${err.message}`);
			exit(1);
			return;
		}

		const logger = deps.logger ?? createLogger('upstream-agent', { level: config.log.level, pretty: config.log.pretty });

		const signals = createProcessSignalSource({
			target: deps.signalTarget,
			onRepeat: (signal) => {
				logger.warn({ signal }, 'forcing shutdown');
				exit(1);
			},
		});

		const code = await runAgent(config, { logger, signals, createWorker: deps.createWorker });
		exit(code);
	});

	await program.parseAsync([...argv]);
}
