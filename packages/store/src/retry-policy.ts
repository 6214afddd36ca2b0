import { setTimeout as sleepFor } from 'node:timers/promises';

export interface RetryPolicyOptions {
	/** Retries after the initial attempt (default: 3) */
	readonly maxRetries?: number;
	/** Delay before the first retry in ms (default: 1000) */
	readonly initialDelayMs?: number;
	/** Multiplier applied per retry (default: 2) */
	readonly backoffFactor?: number;
	/** Upper bound, exclusive, of the random delay added to each wait (default: 500) */
	readonly maxJitterMs?: number;
	/** Returns a number in [0, 1). Default: Math.random */
	readonly random?: () => number;
}

/** Cancellable wait. Rejects when the signal aborts. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const defaultSleep: Sleep = async (ms, signal) => {
	await sleepFor(ms, undefined, { signal });
};

/**
 * Exponential backoff with additive jitter.
 *
 * With the defaults an exhausted open() makes 4 attempts, waiting
 * 1s, 2s and 4s (each plus up to 500ms) in between.
 */
export class RetryPolicy {
	public readonly maxRetries: number;
	public readonly initialDelayMs: number;
	public readonly backoffFactor: number;
	public readonly maxJitterMs: number;
	private readonly random: () => number;

	public constructor(options: RetryPolicyOptions = {}) {
		this.maxRetries = options.maxRetries ?? 3;
		this.initialDelayMs = options.initialDelayMs ?? 1000;
		this.backoffFactor = options.backoffFactor ?? 2;
		this.maxJitterMs = options.maxJitterMs ?? 500;
		this.random = options.random ?? Math.random;

		if (!Number.isInteger(this.maxRetries) || this.maxRetries < 0) {
			throw new Error(`maxRetries must be a non-negative integer, got ${this.maxRetries}`);
		}
	}

	public get maxAttempts(): number {
		return this.maxRetries + 1;
	}

	/**
	 * Wait before retry `retry` (0-based).
	 */
	public delayFor(retry: number): number {
		const base = this.initialDelayMs * this.backoffFactor ** retry;
		return base + Math.floor(this.random() * this.maxJitterMs);
	}
}
