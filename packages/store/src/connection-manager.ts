import { Logger } from '@tonearm/logging';
import type { CircuitBreakerState, ConnectionState } from './circuit-breaker';
import type { Connector } from './connector';
import { ConfigurationError, RetriesExhaustedError, StoreError, TransientConnectivityError } from './errors';
import { RetryPolicy, defaultSleep, type Sleep } from './retry-policy';

export interface ConnectionManagerOptions<Handle> {
	readonly connector: Connector<Handle>;
	/** Shared with every other manager of the same store */
	readonly breaker: CircuitBreakerState;
	readonly retry?: RetryPolicy;
	/** Injectable for tests. Default: node:timers/promises setTimeout */
	readonly sleep?: Sleep;
	/** Upper bound for the liveness probe in ms (default: 2000) */
	readonly probeTimeoutMs?: number;
	readonly log?: Logger;
}

export interface OpenOptions {
	readonly signal?: AbortSignal;
}

/**
 * Opens validated connections with bounded retries behind a circuit breaker.
 *
 * Under a sustained outage at most one round of connect attempts per
 * cool-down window reaches the store.
 *
 * @example
 * ```ts
 * const manager = new ConnectionManager({ connector, breaker });
 * const rows = await manager.withConnection((handle) => handle.query('SELECT 1', []));
 * ```
 */
export class ConnectionManager<Handle> {
	private readonly connector: Connector<Handle>;
	private readonly breaker: CircuitBreakerState;
	private readonly retry: RetryPolicy;
	private readonly sleep: Sleep;
	private readonly probeTimeoutMs: number;
	private readonly log: Logger;

	public constructor(options: ConnectionManagerOptions<Handle>) {
		this.connector = options.connector;
		this.breaker = options.breaker;
		this.retry = options.retry ?? new RetryPolicy();
		this.sleep = options.sleep ?? defaultSleep;
		this.probeTimeoutMs = options.probeTimeoutMs ?? 2000;
		this.log = options.log ?? new Logger('ConnectionManager');
	}

	public get state(): ConnectionState {
		return this.breaker.state;
	}

	/**
	 * Open a connection that passed the liveness probe.
	 *
	 * @throws CircuitOpenError when the breaker rejects the attempt
	 * @throws RetriesExhaustedError when every attempt failed
	 * @throws ConfigurationError when connection parameters are unusable
	 * @throws The signal's reason when aborted
	 */
	public async open(options: OpenOptions = {}): Promise<Handle> {
		const { signal } = options;
		signal?.throwIfAborted();

		const admission = this.breaker.admit();
		const maxAttempts = this.retry.maxAttempts;
		let lastError: unknown;

		for (let attempt = 1; attempt <= maxAttempts; attempt++) {
			try {
				if (attempt > 1) {
					const delayMs = this.retry.delayFor(attempt - 2);
					this.log.debug('Connection Retry Scheduled', { attempt, maxAttempts, delayMs });
					await this.sleep(delayMs, signal);
				}
				signal?.throwIfAborted();

				const handle = await this.connector.connect();
				if (await this.validate(handle)) {
					this.breaker.recordSuccess(admission);
					return handle;
				}

				await this.dispose(handle, true);
				lastError = new TransientConnectivityError('Connection failed the liveness probe');
			} catch (error) {
				if (signal?.aborted) {
					this.breaker.abandon(admission);
					throw signal.reason;
				}
				if (error instanceof ConfigurationError) {
					this.breaker.abandon(admission);
					throw error;
				}
				lastError = error;
			}

			this.log.warn('Connection Attempt Failed', { attempt, maxAttempts, reason: describe(lastError) });
		}

		this.breaker.recordFailure(admission);
		throw new RetriesExhaustedError(maxAttempts, lastError);
	}

	/**
	 * Liveness probe bounded by the probe timeout. Never throws.
	 */
	public async validate(handle: Handle): Promise<boolean> {
		let timer: ReturnType<typeof setTimeout> | undefined;
		const timeout = new Promise<never>((_, reject) => {
			timer = setTimeout(
				() => reject(new Error(`Liveness probe timed out after ${this.probeTimeoutMs}ms`)),
				this.probeTimeoutMs
			);
		});

		try {
			await Promise.race([this.connector.ping(handle), timeout]);
			return true;
		} catch (error) {
			this.log.warn('Liveness Probe Failed', { reason: describe(error) });
			return false;
		} finally {
			clearTimeout(timer);
		}
	}

	/**
	 * Release a handle. Never throws; failures are logged.
	 */
	public async dispose(handle: Handle, broken = false): Promise<void> {
		try {
			await this.connector.release(handle, broken);
		} catch (error) {
			this.log.warn('Connection Release Failed', { broken, reason: describe(error) });
		}
	}

	/**
	 * Open a connection, run `fn` with it and always release it. The handle
	 * is released as broken when `fn` throws.
	 *
	 * Failures of `fn` that are not already a StoreError surface as
	 * TransientConnectivityError with the original as `cause`. They do not
	 * count toward the breaker: the next open() probes the store and is
	 * counted there if the store is really gone.
	 *
	 * @throws Whatever open() throws
	 * @throws TransientConnectivityError when `fn` fails with a driver error
	 */
	public async withConnection<T>(fn: (handle: Handle) => Promise<T>, options: OpenOptions = {}): Promise<T> {
		const handle = await this.open(options);
		let result: T;
		try {
			result = await fn(handle);
		} catch (error) {
			await this.dispose(handle, true);
			if (error instanceof StoreError) {
				throw error;
			}
			this.log.warn('Connection Failed In Use', { reason: describe(error) });
			throw new TransientConnectivityError(`Store operation failed: ${describe(error)}`, { cause: error });
		}
		await this.dispose(handle);
		return result;
	}

	public async close(): Promise<void> {
		await this.connector.close();
	}
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
