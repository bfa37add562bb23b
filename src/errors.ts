export class ConfigError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigError';
	}
}

// Raised by a listener when the server refuses its registration for good.
export class ListenerRejectedError extends Error {
	readonly endpointId: string;
	readonly code: string;

	constructor(endpointId: string, code: string, message: string) {
		super(`listener ${endpointId} rejected: ${code}: ${message}`);
		this.name = 'ListenerRejectedError';
		this.endpointId = endpointId;
		this.code = code;
	}
}

export class ShutdownTimeoutError extends Error {
	readonly outstanding: Array<string>;

	constructor(outstanding: Array<string>, timeoutMs: number) {
		super(`workers did not stop within ${timeoutMs}ms: ${outstanding.join(', ')}`);
		this.name = 'ShutdownTimeoutError';
		this.outstanding = outstanding;
	}
}

export function toError(err: unknown): Error {
	if (err instanceof Error) return err;
	if (typeof err === 'string') return new Error(err);
	return new Error(`non-error thrown: ${String(err)}`);
}
