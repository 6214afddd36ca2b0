/**
 * Store Errors
 *
 * Every failure raised by the store layer extends StoreError, so callers
 * can separate store problems from programming errors with one check.
 *
 * @example
 * ```typescript
 * try {
 *   await manager.open();
 * } catch (error) {
 *   if (error instanceof CircuitOpenError) {
 *     log.info('Store unavailable', { retryAfterMs: error.retryAfterMs });
 *   }
 * }
 * ```
 */

export class StoreError extends Error {
	public override readonly name: string = 'StoreError';

	public constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);

		// Maintains proper stack trace for where error was thrown (V8 engines)
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, new.target);
		}
	}
}

/**
 * Connection parameters are missing or invalid. Never retried.
 */
export class ConfigurationError extends StoreError {
	public override readonly name = 'ConfigurationError';

	public constructor(
		message: string,
		public readonly keys: readonly string[] = [],
		options?: { cause?: unknown }
	) {
		super(message, options);
	}
}

/**
 * A connection could not be established or broke while in use.
 */
export class TransientConnectivityError extends StoreError {
	public override readonly name: string = 'TransientConnectivityError';
}

/**
 * Every attempt of one open() failed. `cause` holds the last failure.
 */
export class RetriesExhaustedError extends TransientConnectivityError {
	public override readonly name = 'RetriesExhaustedError';

	public constructor(
		public readonly attempts: number,
		lastError: unknown
	) {
		super(`Connection failed after ${attempts} attempt(s): ${describe(lastError)}`, { cause: lastError });
	}
}

/**
 * The circuit breaker is tripped and no attempt was made.
 */
export class CircuitOpenError extends StoreError {
	public override readonly name = 'CircuitOpenError';

	public constructor(public readonly retryAfterMs: number) {
		super(`Circuit breaker is open, retry in ${retryAfterMs}ms`);
	}
}

export class NotFoundError extends StoreError {
	public override readonly name = 'NotFoundError';

	public constructor(
		public readonly entity: string,
		public readonly key: unknown
	) {
		super(`${entity} not found for key ${String(key)}`);
	}
}

/**
 * An update matched no row, usually because the record was deleted.
 */
export class WriteConflictError extends StoreError {
	public override readonly name = 'WriteConflictError';

	public constructor(
		public readonly entity: string,
		public readonly key: unknown
	) {
		super(`Update of ${entity} ${String(key)} matched no row`);
	}
}

/**
 * A stored row does not have the expected shape.
 */
export class RecordFormatError extends StoreError {
	public override readonly name = 'RecordFormatError';

	public constructor(
		public readonly entity: string,
		public readonly issues: readonly string[]
	) {
		super(`Malformed ${entity} row: ${issues.join('; ')}`);
	}
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
