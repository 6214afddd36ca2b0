/**
 * Change Bus Types - Contract for settings change notifications.
 *
 * @module events/change-bus.types
 */

/**
 * Topics published by the settings layer.
 */
export const ChangeTopics = {
	ProfileConfig: 'profile-config.changed',
	GlobalConfig: 'global-config.changed',
	Blacklist: 'blacklist.changed'
} as const;

export type ChangeTopic = (typeof ChangeTopics)[keyof typeof ChangeTopics];

/**
 * Keys carried by notifications: profile ids, or a fixed name for
 * single-record settings.
 */
export type ChangeKey = string | number;

/**
 * Message delivered to subscribers when a settings record changed.
 */
export interface ChangeNotification {
	readonly eventId: string;
	readonly key: ChangeKey;
	/** Identifies the publisher so it can skip its own notifications */
	readonly origin: string;
	/** Milliseconds since epoch */
	readonly timestamp: number;
}

export type ChangeHandler = (notification: ChangeNotification) => void | Promise<void>;

/** Removes the subscription it was returned for. Safe to call twice. */
export type Unsubscribe = () => void;

/**
 * Publish/subscribe bus for change notifications.
 *
 * Publishing never throws because of a subscriber, and subscribers are
 * never invoked synchronously from publish().
 */
export interface ChangeBus {
	publish(topic: ChangeTopic, notification: ChangeNotification): void;
	subscribe(topic: ChangeTopic, handler: ChangeHandler): Unsubscribe;
}

/**
 * Creates a notification with a fresh event id.
 */
export function createChangeNotification(key: ChangeKey, origin: string, now: number = Date.now()): ChangeNotification {
	return {
		eventId: crypto.randomUUID(),
		key,
		origin,
		timestamp: now
	};
}
