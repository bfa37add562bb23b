/** One `<identifier>/<target>` entry, fixed once parsed from configuration. */
export type WorkerSpec = Readonly<{
	identifier: string;
	target: string;
}>;

export type WorkerSet = ReadonlyArray<WorkerSpec>;

/**
 * A long-running unit of work.
 *
 * `run` resolves when the worker stopped cleanly (including because `signal`
 * was aborted) and rejects on an unrecoverable failure. It must settle soon
 * after `signal` aborts.
 */
export interface Worker {
	run(signal: AbortSignal): Promise<void>;
}

export type WorkerFactory = (spec: WorkerSpec) => Worker;

export type StopTrigger =
	| { kind: 'signal'; signal: NodeJS.Signals }
	| { kind: 'failure'; identifier: string }
	| { kind: 'none' };

export type Outcome =
	| { status: 'clean'; trigger: StopTrigger }
	| { status: 'failed'; identifier: string; error: Error; trigger: StopTrigger };
