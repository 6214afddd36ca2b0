/**
 * Outcome of a lookup. A missing record is a result, not an error.
 */
export type FetchResult<R> = { readonly found: true; readonly record: R } | { readonly found: false };

export function found<R>(record: R): FetchResult<R> {
	return { found: true, record };
}

export function notFound<R>(): FetchResult<R> {
	return { found: false };
}

/**
 * Keyed access to one kind of settings record.
 *
 * Infrastructure failures surface as the ConnectionManager's errors
 * (CircuitOpenError, RetriesExhaustedError, ConfigurationError, and
 * TransientConnectivityError for a connection that broke mid-query).
 */
export interface Repository<K, R> {
	fetchByKey(key: K): Promise<FetchResult<R>>;

	/** Insert a record with default values and return it */
	create(key: K): Promise<R>;

	/**
	 * @throws WriteConflictError when no stored record matched
	 */
	update(record: R): Promise<void>;
}
