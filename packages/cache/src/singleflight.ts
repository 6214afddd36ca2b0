/**
 * SingleFlightCache - TTL cache with thundering herd prevention
 *
 * When multiple callers request the same missing or expired key:
 * - First caller registers a flight and starts the fetch
 * - Subsequent callers join that flight and share its outcome
 * - Only one fetch happens per key at a time
 *
 * Stale Fallback:
 * - A failed refresh is answered with the previous entry, if any
 * - Without a previous entry every waiter sees the same error
 * - Errors are never stored, the next call starts a new fetch
 *
 * @example
 * const cache = new SingleFlightCache<number, ProfileConfig>({ ttl: '5m' });
 *
 * // These 3 concurrent calls result in only 1 database query
 * const [a, b, c] = await Promise.all([
 *   cache.get(7, (id) => repo.load(id)),
 *   cache.get(7, (id) => repo.load(id)),
 *   cache.get(7, (id) => repo.load(id)),
 * ]);
 */

import { parseDuration } from './duration';
import {
	systemClock,
	type CacheEntry,
	type CacheGetOptions,
	type Clock,
	type FetchFn,
	type SingleFlightCacheOptions,
	type StaleServedEvent
} from './types';

interface Flight<V> {
	promise: Promise<V>;
	/** Set when set() wrote a newer value while this fetch was running */
	superseded: boolean;
}

/** Default TTL: 5 minutes */
const DEFAULT_TTL_MS = 300_000;

export class SingleFlightCache<K, V> {
	private readonly entries = new Map<K, CacheEntry<K, V>>();
	private readonly flights = new Map<K, Flight<V>>();
	private readonly defaultTtlMs: number;
	private readonly clock: Clock;
	private readonly onStale: ((event: StaleServedEvent<K>) => void) | undefined;

	constructor(options: SingleFlightCacheOptions<K> = {}) {
		this.defaultTtlMs = options.ttl === undefined ? DEFAULT_TTL_MS : parseDuration(options.ttl);
		this.clock = options.clock ?? systemClock;
		this.onStale = options.onStale;
	}

	/**
	 * Get a value, fetching it at most once per key at a time
	 *
	 * Lookup and flight registration happen without suspending, so two
	 * callers can never both decide to start a fetch for the same key.
	 *
	 * @throws The fetch error when the fetch failed and no entry exists
	 * @throws The signal's reason when this caller's wait is aborted
	 */
	async get(key: K, fetchFn: FetchFn<K, V>, options: CacheGetOptions = {}): Promise<V> {
		const { signal } = options;
		if (signal?.aborted) {
			throw signal.reason;
		}

		const ttlMs = options.ttl === undefined ? this.defaultTtlMs : parseDuration(options.ttl);
		const entry = this.entries.get(key);
		if (entry && this.isFresh(entry, ttlMs)) {
			return entry.value;
		}

		const flight = this.flights.get(key) ?? this.startFlight(key, fetchFn);
		return signal ? detach(flight.promise, signal) : flight.promise;
	}

	/**
	 * Write a value through to the cache with a fresh timestamp.
	 *
	 * A fetch already in flight for the key still answers its own waiters,
	 * but its result no longer replaces this entry.
	 */
	set(key: K, value: V): void {
		this.entries.set(key, { key, value, insertedAt: this.clock.now() });
		const flight = this.flights.get(key);
		if (flight) {
			flight.superseded = true;
		}
	}

	/**
	 * Current entry regardless of age, without fetching
	 */
	peek(key: K): CacheEntry<K, V> | undefined {
		return this.entries.get(key);
	}

	/**
	 * Remove the entry for a key. A fetch in flight is not cancelled and
	 * stores its result when it completes.
	 */
	invalidate(key: K): void {
		this.entries.delete(key);
	}

	/**
	 * Remove every entry. Fetches in flight still populate on completion.
	 */
	invalidateAll(): void {
		this.entries.clear();
	}

	isInflight(key: K): boolean {
		return this.flights.has(key);
	}

	getInflightCount(): number {
		return this.flights.size;
	}

	/** Number of stored entries, fresh or stale */
	get size(): number {
		return this.entries.size;
	}

	private isFresh(entry: CacheEntry<K, V>, ttlMs: number): boolean {
		return ttlMs > 0 && this.clock.now() - entry.insertedAt < ttlMs;
	}

	private startFlight(key: K, fetchFn: FetchFn<K, V>): Flight<V> {
		const flight: Flight<V> = { promise: Promise.resolve().then(() => fetchFn(key)), superseded: false };

		flight.promise = flight.promise
			.then(
				(value) => {
					if (!flight.superseded) {
						this.entries.set(key, { key, value, insertedAt: this.clock.now() });
					}
					return value;
				},
				(error: unknown) => {
					const stale = this.entries.get(key);
					if (!stale) {
						throw error;
					}
					this.onStale?.({ key, error, age: this.clock.now() - stale.insertedAt });
					return stale.value;
				}
			)
			.finally(() => {
				if (this.flights.get(key) === flight) {
					this.flights.delete(key);
				}
			});

		this.flights.set(key, flight);
		return flight;
	}
}

/**
 * Follow a shared promise until it settles or the signal aborts,
 * whichever comes first. Aborting leaves the shared promise running.
 */
function detach<V>(promise: Promise<V>, signal: AbortSignal): Promise<V> {
	return new Promise<V>((resolve, reject) => {
		const onAbort = (): void => reject(signal.reason);
		signal.addEventListener('abort', onAbort, { once: true });

		promise.then(
			(value) => {
				signal.removeEventListener('abort', onAbort);
				resolve(value);
			},
			(error: unknown) => {
				signal.removeEventListener('abort', onAbort);
				reject(error);
			}
		);
	});
}
