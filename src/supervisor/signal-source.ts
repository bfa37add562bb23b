export type SignalSubscription = {
	/** Resolves with the first signal received after `subscribe()`. */
	readonly notification: Promise<NodeJS.Signals>;
	unsubscribe(): void;
};

export interface SignalSource {
	subscribe(): SignalSubscription;
}

type SignalListener = (signal: NodeJS.Signals) => void;

// Satisfied by `process` and by a plain EventEmitter in tests.
export type SignalTarget = {
	on(event: NodeJS.Signals, listener: SignalListener): unknown;
	off(event: NodeJS.Signals, listener: SignalListener): unknown;
};

export type ProcessSignalSourceOptions = {
	signals?: ReadonlyArray<NodeJS.Signals>;
	target?: SignalTarget;
	onRepeat?: (signal: NodeJS.Signals) => void;
};

const DEFAULT_SIGNALS: ReadonlyArray<NodeJS.Signals> = ['SIGINT', 'SIGTERM'];

export function createProcessSignalSource(options: ProcessSignalSourceOptions = {}): SignalSource {
	const signals = options.signals ?? DEFAULT_SIGNALS;
	const target = options.target ?? process;
	const onRepeat = options.onRepeat;

	return {
		subscribe(): SignalSubscription {
			let received = false;
			let subscribed = true;
			let deliver: (signal: NodeJS.Signals) => void = () => {};

			const notification = new Promise<NodeJS.Signals>((resolve) => {
				deliver = resolve;
			});

			// Handlers stay installed after the first signal so a repeat is
			// never handled by Node's default (terminating) behaviour.
			const handler: SignalListener = (signal) => {
				if (!received) {
					received = true;
					deliver(signal);
					return;
				}
				onRepeat?.(signal);
			};

			for (const signal of signals) {
				target.on(signal, handler);
			}

			return {
				notification,
				unsubscribe(): void {
					if (!subscribed) return;
					subscribed = false;
					for (const signal of signals) {
						target.off(signal, handler);
					}
				},
			};
		},
	};
}
