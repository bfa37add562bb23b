import type { Logger } from 'pino';

import type { AgentConfig } from './config.js';
import { Listener } from './listener/listener.js';
import { subsystemLogger } from './logger.js';
import type { SignalSource } from './supervisor/signal-source.js';
import { exitCodeFor, supervise } from './supervisor/supervisor.js';
import type { WorkerFactory } from './supervisor/types.js';

export type RunAgentOptions = {
	logger: Logger;
	signals: SignalSource;
	createWorker?: WorkerFactory;
};

export function buildListeners(config: AgentConfig, logger: Logger): WorkerFactory {
	const listenerLogger = subsystemLogger(logger, 'listener', config.log.subsystems);
	return (spec) =>
		new Listener({
			endpointId: spec.identifier,
			forwardAddr: spec.target,
			serverUrl: config.server.url,
			reconnectMaxMs: config.server.reconnectMaxMs,
			logger: listenerLogger.child({ endpointId: spec.identifier, forwardAddr: spec.target }),
		});
}

/** Runs every configured listener until shutdown and returns the process exit code. */
export async function runAgent(config: AgentConfig, options: RunAgentOptions): Promise<number> {
	const { logger } = options;
	logger.info({ conf: config }, 'starting agent');

	const outcome = await supervise(config.listeners, {
		createWorker: options.createWorker ?? buildListeners(config, logger),
		signals: options.signals,
		logger: subsystemLogger(logger, 'supervisor', config.log.subsystems),
		shutdownTimeoutMs: config.shutdownTimeoutMs,
	});

	if (outcome.status === 'failed') {
		logger.error({ err: outcome.error, endpointId: outcome.identifier }, 'failed to run agent');
	}

	logger.info('shutdown complete');
	return exitCodeFor(outcome);
}
