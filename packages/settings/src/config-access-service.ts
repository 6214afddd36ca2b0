import { SingleFlightCache, type Clock, type Duration } from '@tonearm/cache';
import {
	createChangeNotification,
	type ChangeBus,
	type ChangeKey,
	type ChangeNotification,
	type ChangeTopic,
	type Unsubscribe
} from '@tonearm/events';
import { Logger } from '@tonearm/logging';
import { NotFoundError, type Repository } from '@tonearm/store';

export interface ConfigAccessServiceOptions<K extends ChangeKey, R> {
	/** Entity name used in logs and errors */
	readonly name: string;
	readonly repository: Repository<K, R>;
	readonly bus: ChangeBus;
	/** Topic this service publishes to and invalidates from */
	readonly topic: ChangeTopic;
	/** Narrows a notification key to this service's key type */
	readonly isKey: (key: ChangeKey) => key is K;
	readonly keyOf: (record: R) => K;
	/** In-memory record served when the store cannot produce one */
	readonly createDefault: (key: K) => R;
	/** Cache TTL (default: '5m') */
	readonly ttl?: Duration;
	/** Identifies this instance on published notifications (default: random UUID) */
	readonly origin?: string;
	readonly clock?: Clock;
	readonly log?: Logger;
}

export interface GetConfigOptions {
	readonly signal?: AbortSignal;
}

/**
 * Cached, coalesced access to one kind of settings record.
 *
 * Reads go through a SingleFlightCache in front of the repository. A read
 * never fails because of the store: it falls back to the last cached value,
 * then to an in-memory default that is neither cached nor persisted, so the
 * next read after recovery persists a real record. Writes always propagate
 * their errors.
 *
 * @example
 * ```ts
 * const profiles = new ConfigAccessService({
 *   name: 'ProfileConfig',
 *   repository,
 *   bus,
 *   topic: ChangeTopics.ProfileConfig,
 *   isKey: (key): key is number => typeof key === 'number',
 *   keyOf: (config) => config.profileId,
 *   createDefault: (profileId) => defaultProfileConfig(profileId)
 * });
 * profiles.start();
 * const config = await profiles.getConfig(3);
 * ```
 */
export class ConfigAccessService<K extends ChangeKey, R> {
	public readonly origin: string;
	private readonly name: string;
	private readonly repository: Repository<K, R>;
	private readonly bus: ChangeBus;
	private readonly topic: ChangeTopic;
	private readonly isKey: (key: ChangeKey) => key is K;
	private readonly keyOf: (record: R) => K;
	private readonly createDefault: (key: K) => R;
	private readonly cache: SingleFlightCache<K, R>;
	private readonly log: Logger;
	private unsubscribe: Unsubscribe | null = null;

	public constructor(options: ConfigAccessServiceOptions<K, R>) {
		this.name = options.name;
		this.repository = options.repository;
		this.bus = options.bus;
		this.topic = options.topic;
		this.isKey = options.isKey;
		this.keyOf = options.keyOf;
		this.createDefault = options.createDefault;
		this.origin = options.origin ?? crypto.randomUUID();
		this.log = options.log ?? new Logger(`${options.name}Access`);
		this.cache = new SingleFlightCache<K, R>({
			ttl: options.ttl ?? '5m',
			clock: options.clock,
			onStale: ({ key, age, error }) => {
				this.log.info(`${this.name} Served Stale`, { key, ageMs: age, reason: describe(error) });
			}
		});
	}

	/**
	 * Subscribe to change notifications from other instances.
	 */
	public start(): void {
		if (this.unsubscribe) {
			return;
		}
		this.unsubscribe = this.bus.subscribe(this.topic, (notification) => this.onExternalInvalidation(notification));
	}

	public stop(): void {
		this.unsubscribe?.();
		this.unsubscribe = null;
	}

	/**
	 * Cached record for `key`, created with defaults on first access.
	 *
	 * @throws The signal's reason when the caller aborts; nothing else
	 */
	public async getConfig(key: K, options: GetConfigOptions = {}): Promise<R> {
		try {
			return await this.cache.get(key, (k) => this.load(k), { signal: options.signal });
		} catch (error) {
			if (options.signal?.aborted) {
				throw error;
			}
			this.log.warn(`${this.name} Unavailable: serving defaults`, { key, reason: describe(error) });
			return this.createDefault(key);
		}
	}

	/**
	 * Persist `record`, then make it the cached value and announce the change.
	 * On failure the cache is left as it was.
	 */
	public async updateConfig(record: R): Promise<void> {
		await this.repository.update(record);

		const key = this.keyOf(record);
		this.cache.set(key, record);
		this.bus.publish(this.topic, createChangeNotification(key, this.origin));
	}

	/**
	 * Drop the cached value for `key`, or every cached value when `key` is null.
	 */
	public invalidateCache(key: K | null): void {
		if (key === null) {
			this.cache.invalidateAll();
			this.log.debug(`${this.name} Cache Cleared`);
			return;
		}
		this.cache.invalidate(key);
	}

	/**
	 * Bus handler. Notifications this instance published are ignored, since
	 * the cache already holds the value it wrote.
	 */
	public onExternalInvalidation(notification: ChangeNotification): void {
		if (notification.origin === this.origin) {
			return;
		}
		if (!this.isKey(notification.key)) {
			this.log.warn(`${this.name} Ignored Notification With Foreign Key`, {
				key: notification.key,
				eventId: notification.eventId
			});
			return;
		}

		this.cache.invalidate(notification.key);
		this.log.debug(`${this.name} Invalidated By Notification`, {
			key: notification.key,
			origin: notification.origin
		});
	}

	private async load(key: K): Promise<R> {
		const existing = await this.repository.fetchByKey(key);
		if (existing.found) {
			return existing.record;
		}

		await this.repository.create(key);
		const created = await this.repository.fetchByKey(key);
		if (created.found) {
			return created.record;
		}
		throw new NotFoundError(this.name, key);
	}
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
