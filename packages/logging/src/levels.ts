/**
 * Logging level utilities.
 */
import type { LevelName, LevelNumber } from './types';

export type { LevelName, LevelNumber };

export type LogLevels = Record<LevelName, LevelNumber>;

/**
 * Log level constants (Pino-compatible numbering)
 */
export const levels: LogLevels = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40
};

const levelNames: Record<LevelNumber, LevelName> = {
	10: 'debug',
	20: 'info',
	30: 'warn',
	40: 'error'
};

export function getLevelName(level: LevelNumber): LevelName {
	return levelNames[level];
}

export function isLevelName(value: string | undefined): value is LevelName {
	return value === 'debug' || value === 'info' || value === 'warn' || value === 'error';
}

export function isLevelEnabled(current: LevelNumber, threshold: LevelNumber): boolean {
	return current >= threshold;
}
