/**
 * Handler Registry - Subscription bookkeeping for the change bus.
 *
 * @module events/handler-registry
 */

import type { ChangeHandler, ChangeTopic, Unsubscribe } from './change-bus.types';

/**
 * Interface for handler registry operations.
 */
export interface IHandlerRegistry {
	/**
	 * Registers a handler for a topic.
	 */
	subscribe(topic: ChangeTopic, handler: ChangeHandler): Unsubscribe;

	/**
	 * Gets a snapshot of the handlers for a topic.
	 */
	getHandlers(topic: ChangeTopic): readonly ChangeHandler[];

	getHandlerCount(topic: ChangeTopic): number;

	clear(): void;
}

/**
 * Default implementation of handler registry.
 *
 * Stores handlers in a Map for O(1) lookup by topic. The same function
 * subscribed twice is registered twice, and each unsubscribe removes
 * only its own registration.
 *
 * @example
 * ```ts
 * const registry = new HandlerRegistry();
 * const unsubscribe = registry.subscribe('profile-config.changed', (n) => {
 *   cache.invalidate(n.key);
 * });
 * ```
 */
export class HandlerRegistry implements IHandlerRegistry {
	private readonly handlers: Map<ChangeTopic, Array<{ handler: ChangeHandler }>> = new Map();

	public subscribe(topic: ChangeTopic, handler: ChangeHandler): Unsubscribe {
		const registration = { handler };
		const registrations = this.handlers.get(topic) ?? [];
		registrations.push(registration);
		this.handlers.set(topic, registrations);

		return () => {
			const current = this.handlers.get(topic);
			if (!current) {
				return;
			}
			const index = current.indexOf(registration);
			if (index !== -1) {
				current.splice(index, 1);
			}
			if (current.length === 0) {
				this.handlers.delete(topic);
			}
		};
	}

	public getHandlers(topic: ChangeTopic): readonly ChangeHandler[] {
		return (this.handlers.get(topic) ?? []).map((registration) => registration.handler);
	}

	public getHandlerCount(topic: ChangeTopic): number {
		return this.handlers.get(topic)?.length ?? 0;
	}

	public clear(): void {
		this.handlers.clear();
	}
}
