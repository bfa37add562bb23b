import type { Logger } from 'pino';

import { ShutdownTimeoutError, toError } from '../errors.js';
import type { SignalSource } from './signal-source.js';
import type { Outcome, StopTrigger, WorkerFactory, WorkerSet, WorkerSpec } from './types.js';

export type SuperviseOptions = {
	createWorker: WorkerFactory;
	signals: SignalSource;
	logger: Logger;
	/** Upper bound on the drain after cancellation; 0 or unset waits indefinitely. */
	shutdownTimeoutMs?: number | undefined;
};

type Failure = {
	identifier: string;
	error: Error;
};

/**
 * Runs one task per spec under a shared AbortSignal until a shutdown signal
 * arrives or any worker fails, then cancels all of them and waits for every
 * task to settle. Never rejects: failures are carried in the returned Outcome.
 */
export async function supervise(workers: WorkerSet, options: SuperviseOptions): Promise<Outcome> {
	const { createWorker, logger } = options;

	// Subscribe before any worker starts so an early signal is not lost.
	const subscription = options.signals.subscribe();
	const controller = new AbortController();

	let trigger: StopTrigger = { kind: 'none' };
	let failure: Failure | null = null;
	let requestStop: () => void = () => {};
	const stopRequested = new Promise<void>((resolve) => {
		requestStop = resolve;
	});

	const cancel = (next: StopTrigger): void => {
		if (controller.signal.aborted) return;
		trigger = next;
		if (next.kind === 'signal') {
			logger.info({ signal: next.signal }, 'received shutdown signal');
		} else if (next.kind === 'failure') {
			logger.warn({ identifier: next.identifier }, 'worker failed, cancelling remaining workers');
		}
		controller.abort();
		requestStop();
	};

	const outstanding = new Map<number, string>();

	const runTask = async (spec: WorkerSpec, index: number): Promise<void> => {
		outstanding.set(index, spec.identifier);
		try {
			const worker = createWorker(spec);
			await worker.run(controller.signal);
			logger.debug({ identifier: spec.identifier }, 'Worker stopped');
		} catch (err) {
			const error = toError(err);
			logger.debug({ err: error, identifier: spec.identifier }, 'Worker failed');
			if (failure === null) {
				failure = { identifier: spec.identifier, error };
			}
			cancel({ kind: 'failure', identifier: spec.identifier });
		} finally {
			outstanding.delete(index);
		}
	};

	const tasks = workers.map((spec, index) => runTask(spec, index));
	logger.debug({ workers: workers.length }, 'Workers started');

	subscription.notification
		.then((signal) => {
			cancel({ kind: 'signal', signal });
		})
		.catch((err: unknown) => {
			const error = toError(err);
			logger.error({ err: error }, 'Signal source failed');
			if (failure === null) {
				failure = { identifier: '', error };
			}
			cancel({ kind: 'none' });
		});

	await stopRequested;

	const drained = await waitForDrain(Promise.all(tasks), options.shutdownTimeoutMs);
	subscription.unsubscribe();

	if (!drained && failure === null) {
		const identifiers = [...outstanding.values()];
		failure = {
			identifier: identifiers[0] ?? '',
			error: new ShutdownTimeoutError(identifiers, options.shutdownTimeoutMs ?? 0),
		};
	}

	const first: Failure | null = failure;
	if (first === null) {
		return { status: 'clean', trigger };
	}
	return { status: 'failed', identifier: first.identifier, error: first.error, trigger };
}

async function waitForDrain(all: Promise<unknown>, timeoutMs: number | undefined): Promise<boolean> {
	if (!timeoutMs || timeoutMs <= 0) {
		await all;
		return true;
	}

	let timer: ReturnType<typeof setTimeout> | undefined;
	const timedOut = new Promise<false>((resolve) => {
		timer = setTimeout(() => resolve(false), timeoutMs);
	});
	try {
		return await Promise.race([all.then(() => true as const), timedOut]);
	} finally {
		clearTimeout(timer);
	}
}

export function exitCodeFor(outcome: Outcome): 0 | 1 {
	return outcome.status === 'clean' ? 0 : 1;
}
