import type { EventHandler } from "./types";

/**
 * Payload of an event: declared for known events, unknown for custom ones.
 */
export type EventPayload<EventTypes, E extends string> =
	E extends keyof EventTypes ? EventTypes[E] : unknown;

export default
class EventBus<EventTypes> {
	private handlers: Map<string, Array<EventHandler<unknown>>> = new Map();

	/**
	 * Subscribe to an event
	 * @returns Unsubscribe function
	 */
	subscribe<E extends string>(
		eventType: E,
		callback: (data: EventPayload<EventTypes, E>) => void
	): () => void {
		return this.addHandler(eventType, callback, false);
	}

	/**
	 * Subscribe to an event once
	 */
	once<E extends string>(
		eventType: E,
		callback: (data: EventPayload<EventTypes, E>) => void
	): () => void {
		return this.addHandler(eventType, callback, true);
	}

	private addHandler<E extends string>(
		eventType: E,
		callback: (data: EventPayload<EventTypes, E>) => void,
		once: boolean
	): () => void {
		const handler: EventHandler<EventPayload<EventTypes, E>> = {
			callback,
			once
		};

		const handlers = this.handlers.get(eventType);
		if (handlers) {
			handlers.push(handler);
		} else {
			this.handlers.set(eventType, [handler]);
		}

		return () => {
			const current = this.handlers.get(eventType);
			if (current) {
				const index = current.indexOf(handler);
				if (index !== -1) {
					current.splice(index, 1);
				}
			}
		};
	}

	publish<E extends string>(
		eventType: E,
		data: EventPayload<EventTypes, E>
	): void {
		const handlers = this.handlers.get(eventType);
		if (!handlers) return;

		// Copy: handlers may unsubscribe while being called
		const handlersToCall = [...handlers];

		for (const handler of handlersToCall) {
			if (handler.once) {
				const index = handlers.indexOf(handler);
				if (index !== -1) {
					handlers.splice(index, 1);
				}
			}
			handler.callback(data);
		}
	}

	/**
	 * Whether anything listens to an event
	 */
	hasSubscribers(eventType: string): boolean {
		return (this.handlers.get(eventType)?.length ?? 0) > 0;
	}

	clear(): void {
		this.handlers.clear();
	}

	clearEvent(eventType: string): void {
		this.handlers.delete(eventType);
	}
}
