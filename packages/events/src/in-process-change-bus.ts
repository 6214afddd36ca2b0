/**
 * In-Process Change Bus - Local asynchronous notification delivery.
 *
 * Delivers notifications to subscribers in the same process, each on its
 * own microtask after publish() returns. A failing handler is logged and
 * does not affect other handlers or the publisher.
 *
 * @module events/in-process-change-bus
 */

import { Logger } from '@tonearm/logging';
import type { ChangeBus, ChangeHandler, ChangeNotification, ChangeTopic, Unsubscribe } from './change-bus.types';
import { HandlerRegistry, type IHandlerRegistry } from './handler-registry';

export interface InProcessChangeBusOptions {
	/**
	 * Custom handler registry (for testing).
	 */
	readonly registry?: IHandlerRegistry;

	/**
	 * Custom logger (for testing).
	 */
	readonly log?: Logger;
}

/**
 * @example
 * ```ts
 * const bus = new InProcessChangeBus();
 *
 * bus.subscribe('profile-config.changed', (notification) => {
 *   profileCache.invalidate(notification.key);
 * });
 *
 * bus.publish('profile-config.changed', createChangeNotification(7, 'settings-ui'));
 * await bus.drain();
 * ```
 */
export class InProcessChangeBus implements ChangeBus {
	private readonly registry: IHandlerRegistry;
	private readonly log: Logger;
	private readonly pending = new Set<Promise<void>>();

	public constructor(options: InProcessChangeBusOptions = {}) {
		this.registry = options.registry ?? new HandlerRegistry();
		this.log = options.log ?? new Logger('ChangeBus');
	}

	public publish(topic: ChangeTopic, notification: ChangeNotification): void {
		const handlers = this.registry.getHandlers(topic);

		if (handlers.length === 0) {
			this.log.debug(`Change Published Without Subscribers: ${topic}`, { key: notification.key });
			return;
		}

		this.log.debug(`Change Published: ${topic}`, {
			key: notification.key,
			eventId: notification.eventId,
			handlers: handlers.length
		});

		for (const handler of handlers) {
			this.track(this.deliver(topic, handler, notification));
		}
	}

	public subscribe(topic: ChangeTopic, handler: ChangeHandler): Unsubscribe {
		return this.registry.subscribe(topic, handler);
	}

	public getSubscriberCount(topic: ChangeTopic): number {
		return this.registry.getHandlerCount(topic);
	}

	/**
	 * Resolves once every delivery started so far has finished,
	 * including deliveries published by handlers while draining.
	 */
	public async drain(): Promise<void> {
		while (this.pending.size > 0) {
			await Promise.all([...this.pending]);
		}
	}

	/**
	 * Removes all subscribers. Deliveries already scheduled still run.
	 */
	public clear(): void {
		this.registry.clear();
	}

	private async deliver(topic: ChangeTopic, handler: ChangeHandler, notification: ChangeNotification): Promise<void> {
		try {
			await Promise.resolve();
			await handler(notification);
		} catch (error) {
			this.log.error(`Change Handler Failed: ${topic}`, {
				key: notification.key,
				eventId: notification.eventId,
				err: error
			});
		}
	}

	private track(delivery: Promise<void>): void {
		this.pending.add(delivery);
		void delivery.finally(() => this.pending.delete(delivery));
	}
}
