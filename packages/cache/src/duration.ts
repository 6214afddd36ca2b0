/**
 * Duration Parser
 *
 * Converts human-readable duration strings to milliseconds.
 * Supports: ms, s (seconds), m (minutes), h (hours), d (days)
 *
 * @example
 * parseDuration('250ms') // 250
 * parseDuration('5m')    // 300000
 * parseDuration('2h')    // 7200000
 * parseDuration(1500)    // 1500 (passthrough)
 */

import type { Duration } from './types';

const UNITS: Record<string, number> = {
	ms: 1,
	s: 1000,
	m: 60_000,
	h: 3_600_000,
	d: 86_400_000
};

/**
 * Maximum allowed duration: 365 days
 */
export const MAX_DURATION_MS = 365 * 86_400_000;

/**
 * Parse a duration value to milliseconds
 *
 * @throws Error if the format is invalid, negative or above MAX_DURATION_MS
 */
export function parseDuration(duration: Duration): number {
	if (typeof duration === 'number') {
		if (!Number.isFinite(duration)) {
			throw new Error('Duration must be a finite number');
		}
		if (duration < 0) {
			throw new Error('Duration must be non-negative');
		}
		if (duration > MAX_DURATION_MS) {
			throw new Error(`Duration exceeds maximum of 365 days (${MAX_DURATION_MS} ms)`);
		}
		return duration;
	}

	if (!duration || typeof duration !== 'string') {
		throw new Error('Invalid duration format: empty or not a string');
	}

	if (duration === '0') {
		return 0;
	}

	const match = duration.toLowerCase().match(/^(\d+)(ms|s|m|h|d)$/);
	if (!match) {
		throw new Error(`Invalid duration format: ${duration}`);
	}

	const [, valueStr = '', unit = ''] = match;
	const multiplier = UNITS[unit];
	if (multiplier === undefined) {
		throw new Error(`Unknown duration unit: ${unit}`);
	}

	const ms = parseInt(valueStr, 10) * multiplier;
	if (ms > MAX_DURATION_MS) {
		throw new Error(`Duration exceeds maximum of 365 days (${MAX_DURATION_MS} ms)`);
	}

	return ms;
}
