import { EventEmitter } from "eventemitter3";

/**
 * Generic typed event map -- keys are event names, values are handler signatures.
 * Example: { fill: (fill: FillApplied) => void; divergence: (d: Divergence) => void }
 */
// biome-ignore lint/suspicious/noExplicitAny: base constraint for event handler signatures
export type EventMap = Record<string, (...args: any[]) => void>;

export interface TypedEmitterOptions {
	/**
	 * Called when a listener throws. When set, the remaining listeners still run and
	 * `emit` never throws; when unset, the error propagates to the emitter's caller.
	 */
	readonly onListenerError?: (event: string, error: unknown) => void;
}

/**
 * Type-safe event emitter wrapping eventemitter3 with compile-time handler validation.
 *
 * @example
 * ```ts
 * type Events = { fill: (size: string) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("fill", (size) => console.log(size));
 * emitter.emit("fill", "0.5");
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();
	private readonly onListenerError: ((event: string, error: unknown) => void) | undefined;

	constructor(options: TypedEmitterOptions = {}) {
		this.onListenerError = options.onListenerError;
	}

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler);
		return this;
	}

	/** @returns true if the event had listeners */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		const report = this.onListenerError;
		if (!report) {
			return this.ee.emit(event, ...args);
		}
		const listeners = this.ee.listeners(event);
		for (const listener of listeners) {
			try {
				listener(...args);
			} catch (error) {
				report(event, error);
			}
		}
		return listeners.length > 0;
	}

	/** Removes all listeners for one event, or for every event when none is given. */
	removeAllListeners<K extends keyof TEvents & string>(event?: K): this {
		if (event) {
			this.ee.removeAllListeners(event);
		} else {
			this.ee.removeAllListeners();
		}
		return this;
	}

	listenerCount<K extends keyof TEvents & string>(event: K): number {
		return this.ee.listenerCount(event);
	}
}
