/**
 * Cache Types
 *
 * The cache is keyed by any Map-compatible key and stores opaque values.
 * Time is read through an injectable Clock so TTL behaviour is testable.
 */

/**
 * Human-readable duration or milliseconds
 *
 * @example
 * '250ms' // 250 milliseconds
 * '30s'   // 30 seconds
 * '5m'    // 5 minutes
 * 1500    // 1500 milliseconds
 * '0'     // zero (no reuse)
 */
export type Duration = `${number}${'ms' | 's' | 'm' | 'h' | 'd'}` | number | '0';

/** Injectable time source, in milliseconds since epoch */
export interface Clock {
	now(): number;
}

export const systemClock: Clock = { now: () => Date.now() };

/**
 * A stored value with its insertion time.
 */
export interface CacheEntry<K, V> {
	readonly key: K;
	readonly value: V;
	readonly insertedAt: number;
}

/**
 * Fetches the value for a key on a cache miss.
 */
export type FetchFn<K, V> = (key: K) => Promise<V>;

export interface CacheGetOptions {
	/** Overrides the cache's default TTL for this lookup */
	readonly ttl?: Duration;
	/**
	 * Cancels this caller's wait. The fetch itself, and every other caller
	 * waiting on it, carries on.
	 */
	readonly signal?: AbortSignal;
}

/**
 * Details handed to the onStale hook when a refresh failed and an older
 * value was served instead.
 */
export interface StaleServedEvent<K> {
	readonly key: K;
	readonly error: unknown;
	/** Milliseconds since the stale entry was inserted */
	readonly age: number;
}

export interface SingleFlightCacheOptions<K> {
	/** TTL for get() calls that do not pass one. Default: '5m' */
	readonly ttl?: Duration;
	/** Time source. Default: Date.now */
	readonly clock?: Clock;
	/** Called once per failed refresh that was answered with a stale value */
	readonly onStale?: (event: StaleServedEvent<K>) => void;
}
