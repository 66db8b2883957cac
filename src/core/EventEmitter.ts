export type Listener<T extends unknown[] = unknown[]> = (...args: T) => void;

/**
 * Generic EventEmitter that supports type-safe events.
 * Events should be a record where keys are event names and values are tuple arrays of arguments.
 */
export class EventEmitter<Events extends Record<keyof Events, unknown[]>> {
	private _listeners: { [K in keyof Events]?: Listener<Events[K]>[] } = {};

	public on<K extends keyof Events>(
		event: K,
		listener: Listener<Events[K]>
	): this {
		const listeners = this._listeners[event] ?? [];
		listeners.push(listener);
		this._listeners[event] = listeners;
		return this;
	}

	public off<K extends keyof Events>(
		event: K,
		listener: Listener<Events[K]>
	): this {
		const listeners = this._listeners[event];
		if (!listeners) return this;

		const index = listeners.indexOf(listener);
		if (index !== -1) {
			listeners.splice(index, 1);
		}
		return this;
	}

	public emit<K extends keyof Events>(event: K, ...args: Events[K]): boolean {
		const listeners = this._listeners[event];
		if (!listeners || listeners.length === 0) return false;

		// Use a copy to avoid issues if listeners change during emission
		[...listeners].forEach((listener) => listener(...args));
		return true;
	}

	public once<K extends keyof Events>(
		event: K,
		listener: Listener<Events[K]>
	): this {
		const wrapper: Listener<Events[K]> = (...args) => {
			this.off(event, wrapper);
			listener(...args);
		};
		return this.on(event, wrapper);
	}
}
