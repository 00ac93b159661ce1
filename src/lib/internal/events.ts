/**
 * Typed event dispatcher for headless state classes.
 *
 * Each dispatcher owns a private EventTarget, so listeners registered on one
 * controller never observe another controller's events.
 */

export type EventCallback<T> = (event: CustomEvent<T>) => void;

export class CustomEventDispatcher<T> {
	readonly eventName: string;

	readonly #target = new EventTarget();

	/** Registered listeners, tracked so destroy() can release all of them. */
	readonly #listeners = new Set<EventListener>();

	constructor(eventName: string) {
		this.eventName = eventName;
	}

	/** Number of active listeners. */
	get listenerCount(): number {
		return this.#listeners.size;
	}

	/**
	 * Dispatch an event carrying `detail` to every listener, in registration order.
	 */
	dispatch(detail: T): CustomEvent<T> {
		const event = new CustomEvent<T>(this.eventName, { detail });
		this.#target.dispatchEvent(event);
		return event;
	}

	/**
	 * Register a listener. Returns the matching unsubscribe function.
	 */
	listen(callback: EventCallback<T>): () => void {
		const listener: EventListener = (event) => {
			if (event instanceof CustomEvent) {
				callback(event);
			}
		};
		this.#listeners.add(listener);
		this.#target.addEventListener(this.eventName, listener);

		return () => {
			if (this.#listeners.delete(listener)) {
				this.#target.removeEventListener(this.eventName, listener);
			}
		};
	}

	/** Remove all listeners. */
	clear(): void {
		for (const listener of this.#listeners) {
			this.#target.removeEventListener(this.eventName, listener);
		}
		this.#listeners.clear();
	}
}
