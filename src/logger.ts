import pino from 'pino';
import type { Logger } from 'pino';

import { type LogLevel, loadConfig } from './config.js';

export type { Logger };

export type LoggerOptions = {
	level?: LogLevel;
	pretty?: boolean;
};

/** The environment is only consulted for options the caller leaves unset. */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
	const config = options.level === undefined || options.pretty === undefined ? loadConfig() : undefined;
	const baseOptions = {
		name,
		level: options.level ?? config?.LOG_LEVEL ?? 'info',
	};
	if (options.pretty ?? config?.NODE_ENV !== 'production') {
		return pino({ ...baseOptions, transport: { target: 'pino-pretty' } });
	}
	return pino(baseOptions);
}

/**
 * Child logger for one subsystem. Subsystems listed in `enabled` (or all of
 * them, with `*`) log at debug regardless of the parent's level.
 */
export function subsystemLogger(logger: Logger, subsystem: string, enabled: ReadonlyArray<string> = []): Logger {
	const debug = enabled.includes('*') || enabled.includes(subsystem);
	if (debug) {
		return logger.child({ subsystem }, { level: 'debug' });
	}
	return logger.child({ subsystem });
}
