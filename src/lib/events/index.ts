import EventEmitter from "eventemitter3";

/**
 * Typed event map -- keys are event names, values are handler signatures.
 * Declare maps with `type`, not `interface`, so they satisfy the index signature.
 */
export type EventMap = Record<string, (...args: never[]) => void>;

type Listener = (...args: unknown[]) => void;

/** Receives the exception of a handler that threw during `emit`. */
export type ListenerErrorHandler = (event: string, error: unknown) => void;

/**
 * Type-safe event emitter wrapping eventemitter3 with compile-time handler validation.
 *
 * @example
 * ```ts
 * type Events = { closed: (reason: string) => void };
 * const emitter = new TypedEmitter<Events>();
 * emitter.on("closed", (reason) => logger.info({ reason }, "session closed"));
 * emitter.emit("closed", "eof");
 * ```
 */
export class TypedEmitter<TEvents extends EventMap> {
	private readonly ee = new EventEmitter();

	/**
	 * With `onListenerError`, a throwing handler is reported there and `emit`
	 * returns normally; handlers after it miss that one event. Without it the
	 * exception reaches the caller of `emit`.
	 */
	constructor(private readonly onListenerError?: ListenerErrorHandler) {}

	on<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.on(event, handler as Listener);
		return this;
	}

	off<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.off(event, handler as Listener);
		return this;
	}

	once<K extends keyof TEvents & string>(event: K, handler: TEvents[K]): this {
		this.ee.once(event, handler as Listener);
		return this;
	}

	/** Invokes every handler for `event` synchronously, in registration order. */
	emit<K extends keyof TEvents & string>(event: K, ...args: Parameters<TEvents[K]>): boolean {
		if (this.onListenerError === undefined) {
			return this.ee.emit(event, ...args);
		}
		try {
			return this.ee.emit(event, ...args);
		} catch (e) {
			this.onListenerError(event, e);
			return true;
		}
	}

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
