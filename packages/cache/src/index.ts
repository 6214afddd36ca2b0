/**
 * Tonearm Cache
 *
 * A keyed TTL cache with single-flight fetches and stale fallback.
 *
 * @example
 * const cache = new SingleFlightCache<number, ProfileConfig>({
 *   ttl: '5m',
 *   onStale: ({ key, age }) => log.info('Serving stale profile config', { key, age })
 * });
 *
 * const config = await cache.get(profileId, (id) => loadProfileConfig(id));
 *
 * @module @tonearm/cache
 */

export { SingleFlightCache } from './singleflight';

export {
	systemClock,
	type Duration,
	type Clock,
	type CacheEntry,
	type FetchFn,
	type CacheGetOptions,
	type StaleServedEvent,
	type SingleFlightCacheOptions
} from './types';

// Utilities - Duration parsing
export { parseDuration } from './duration';
