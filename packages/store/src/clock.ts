/** Injectable clock, in milliseconds since epoch */
export interface Clock {
	now(): number;
}

export const REAL_CLOCK: Clock = { now: () => Date.now() };
