/**
 * Tonearm Events
 *
 * Change notifications for settings records, published after a write
 * and consumed by caches that need to drop their copy.
 *
 * @module @tonearm/events
 */

export {
	ChangeTopics,
	createChangeNotification,
	type ChangeTopic,
	type ChangeKey,
	type ChangeNotification,
	type ChangeHandler,
	type ChangeBus,
	type Unsubscribe
} from './change-bus.types';

export { HandlerRegistry, type IHandlerRegistry } from './handler-registry';

export { InProcessChangeBus, type InProcessChangeBusOptions } from './in-process-change-bus';
