/**
 * Circuit Breaker State - shared failure bookkeeping for one backing store.
 *
 * States: closed → open → half-open → closed
 *
 * - closed: attempts proceed; each exhausted open() is one failure
 * - open: admit() throws CircuitOpenError until the cool-down has passed
 * - half-open: the first admission after cool-down resets the counters and
 *   becomes the only probe; everyone else is rejected until it settles
 *
 * One instance is shared by every ConnectionManager of the same store.
 */

import { Logger } from '@tonearm/logging';
import { REAL_CLOCK, type Clock } from './clock';
import { CircuitOpenError } from './errors';

export type CircuitPhase = 'closed' | 'open' | 'half-open';

/**
 * Snapshot of the breaker. `circuitTrippedUntil` is non-null only while
 * `consecutiveFailures` is at or above the threshold.
 */
export interface ConnectionState {
	readonly isOpen: boolean;
	readonly consecutiveFailures: number;
	readonly circuitTrippedUntil: number | null;
}

/**
 * Ticket returned by admit(). Hand it back to exactly one of
 * recordSuccess(), recordFailure() or abandon().
 */
export interface Admission {
	readonly probe: boolean;
}

export interface CircuitBreakerOptions {
	/** Consecutive failures that trip the breaker (default: 5) */
	readonly failureThreshold?: number;
	/** Time the breaker stays open in ms (default: 120_000) */
	readonly coolDownMs?: number;
	readonly clock?: Clock;
	readonly log?: Logger;
}

export const DEFAULT_FAILURE_THRESHOLD = 5;
export const DEFAULT_COOL_DOWN_MS = 120_000;

export class CircuitBreakerState {
	public readonly failureThreshold: number;
	public readonly coolDownMs: number;
	private readonly clock: Clock;
	private readonly log: Logger;

	private consecutiveFailures = 0;
	private circuitTrippedUntil: number | null = null;
	private probe: Admission | null = null;

	public constructor(options: CircuitBreakerOptions = {}) {
		this.failureThreshold = options.failureThreshold ?? DEFAULT_FAILURE_THRESHOLD;
		this.coolDownMs = options.coolDownMs ?? DEFAULT_COOL_DOWN_MS;
		this.clock = options.clock ?? REAL_CLOCK;
		this.log = options.log ?? new Logger('CircuitBreaker');

		if (!Number.isInteger(this.failureThreshold) || this.failureThreshold < 1) {
			throw new Error(`failureThreshold must be a positive integer, got ${this.failureThreshold}`);
		}
		if (this.coolDownMs < 0) {
			throw new Error(`coolDownMs must be non-negative, got ${this.coolDownMs}`);
		}
	}

	public get state(): ConnectionState {
		return {
			isOpen: this.circuitTrippedUntil !== null,
			consecutiveFailures: this.consecutiveFailures,
			circuitTrippedUntil: this.circuitTrippedUntil
		};
	}

	public get phase(): CircuitPhase {
		if (this.circuitTrippedUntil !== null) {
			return 'open';
		}
		return this.probe ? 'half-open' : 'closed';
	}

	/**
	 * Ask to make a connection attempt.
	 *
	 * @throws CircuitOpenError while tripped, or while a probe is running
	 */
	public admit(): Admission {
		const now = this.clock.now();

		if (this.circuitTrippedUntil !== null) {
			if (now <= this.circuitTrippedUntil) {
				throw new CircuitOpenError(this.circuitTrippedUntil - now);
			}

			this.log.warn('Circuit Breaker Reset: allowing one probe attempt', {
				previousFailures: this.consecutiveFailures,
				openForMs: now - this.circuitTrippedUntil + this.coolDownMs
			});
			this.consecutiveFailures = 0;
			this.circuitTrippedUntil = null;
			this.probe = { probe: true };
			return this.probe;
		}

		if (this.probe) {
			throw new CircuitOpenError(0);
		}

		return { probe: false };
	}

	public recordSuccess(admission: Admission): void {
		if (admission === this.probe) {
			this.probe = null;
			this.log.info('Circuit Breaker Closed: probe attempt succeeded');
		} else if (this.circuitTrippedUntil !== null) {
			this.log.info('Circuit Breaker Closed: connection succeeded while open');
		}
		this.consecutiveFailures = 0;
		this.circuitTrippedUntil = null;
	}

	public recordFailure(admission: Admission): void {
		const now = this.clock.now();

		if (admission === this.probe) {
			this.probe = null;
			this.consecutiveFailures = Math.max(this.consecutiveFailures + 1, this.failureThreshold);
			this.trip(now, 'probe attempt failed');
			return;
		}

		this.consecutiveFailures++;

		// Attempts admitted before the trip still count, but neither extend
		// the window nor log again.
		if (this.circuitTrippedUntil !== null) {
			return;
		}

		if (this.consecutiveFailures >= this.failureThreshold) {
			this.trip(now, 'failure threshold reached');
		}
	}

	/**
	 * Release an admission without counting it either way, e.g. when the
	 * caller aborted or the failure was not about connectivity.
	 */
	public abandon(admission: Admission): void {
		if (admission === this.probe) {
			this.probe = null;
		}
	}

	private trip(now: number, reason: string): void {
		this.circuitTrippedUntil = now + this.coolDownMs;
		this.log.error(`Circuit Breaker Tripped: ${reason}`, {
			consecutiveFailures: this.consecutiveFailures,
			coolDownMs: this.coolDownMs,
			circuitTrippedUntil: this.circuitTrippedUntil
		});
	}
}
