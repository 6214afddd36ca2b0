/**
 * Low-level access to a backing store. ConnectionManager layers retries,
 * the circuit breaker and liveness checks on top of it.
 */
export interface Connector<Handle> {
	/**
	 * Establish or check out a connection.
	 *
	 * @throws ConfigurationError when connection parameters are unusable
	 */
	connect(): Promise<Handle>;

	/** Cheap round trip proving the handle works. Rejects if it does not. */
	ping(handle: Handle): Promise<void>;

	/** Give the handle back. A broken handle must not be reused. */
	release(handle: Handle, broken: boolean): Promise<void>;

	/** Close every underlying connection. */
	close(): Promise<void>;
}
