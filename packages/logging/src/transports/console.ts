import { inspect } from 'node:util';
import type { Transport, LogObject, LevelNumber } from '../types';

export interface ConsoleTransportOptions {
	pretty?: boolean;
	json?: boolean;
	/** Depth for object inspection (default: 4) */
	depth?: number;
	/** Show colors in pretty mode (default: auto-detect TTY) */
	colors?: boolean;
}

const colors = {
	reset: '\x1b[0m',
	gray: '\x1b[90m',
	red: '\x1b[31m',
	yellow: '\x1b[33m',
	magenta: '\x1b[35m',
	cyan: '\x1b[36m',
	white: '\x1b[37m'
} as const;

const levelColors: Record<LevelNumber, string> = {
	10: colors.magenta,
	20: colors.cyan,
	30: colors.yellow,
	40: colors.red
};

const levelChars: Record<LevelNumber, string> = {
	10: 'D',
	20: 'I',
	30: 'W',
	40: 'E'
};

export interface FormatOptions {
	colors: boolean;
	depth: number;
}

function paint(color: string, text: string, options: FormatOptions): string {
	return options.colors ? `${color}${text}${colors.reset}` : text;
}

function formatTime(timestamp: number): string {
	const date = new Date(timestamp);
	const hours = date.getHours().toString().padStart(2, '0');
	const minutes = date.getMinutes().toString().padStart(2, '0');
	const seconds = date.getSeconds().toString().padStart(2, '0');
	return `${hours}:${minutes}:${seconds}`;
}

function formatValue(value: unknown, options: FormatOptions): string {
	if (value === null || value === undefined) {
		return String(value);
	}
	if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
		return String(value);
	}
	return inspect(value, { colors: options.colors, depth: options.depth, breakLength: Infinity });
}

/**
 * Formats a log object as a single human-readable line:
 * `HH:MM:SS:L:Name message: key:value key:value`
 * followed by the stack of an `err`/`error` field, if any.
 */
export function formatPretty(obj: LogObject, options: FormatOptions): string {
	const { time, level, msg, name, error, err, ...context } = obj;
	const levelChar = levelChars[level] ?? '?';
	const levelColor = levelColors[level] ?? colors.reset;

	const contextParts = Object.entries(context).map(
		([key, value]) => `${key}:${formatValue(value, options)}`
	);
	const contextStr = contextParts.length > 0 ? `: ${contextParts.join(' ')}` : '';

	const message = level >= 40 ? paint(colors.red, msg, options) : level === 30 ? paint(colors.yellow, msg, options) : msg;

	let output = `${paint(colors.gray, formatTime(time), options)}:${paint(levelColor, levelChar, options)}:${paint(colors.yellow, name ?? 'App', options)} ${message}${contextStr}`;

	const errorObj = error ?? err;
	if (errorObj instanceof Error) {
		output += '\n' + inspect(errorObj, { colors: options.colors, depth: options.depth });
	}

	return output;
}

function toJsonSafe(obj: LogObject): Record<string, unknown> {
	const result: Record<string, unknown> = {};
	for (const [key, value] of Object.entries(obj)) {
		result[key] =
			value instanceof Error ? { type: value.name, message: value.message, stack: value.stack } : value;
	}
	return result;
}

function isPrettyMode(options: ConsoleTransportOptions): boolean {
	if (options.pretty !== undefined) return options.pretty;
	if (options.json !== undefined) return !options.json;
	return process.env.NODE_ENV !== 'production';
}

function shouldUseColors(options: ConsoleTransportOptions): boolean {
	if (options.colors !== undefined) return options.colors;
	return process.stdout.isTTY ?? false;
}

/**
 * Console transport - outputs to stdout with pretty or JSON formatting.
 *
 * Pretty in development, JSON when NODE_ENV=production, unless forced.
 *
 * @example
 * ```ts
 * transports.console({ json: true })
 * ```
 */
export function consoleTransport(options: ConsoleTransportOptions = {}): Transport {
	const pretty = isPrettyMode(options);
	const formatOptions: FormatOptions = {
		colors: shouldUseColors(options),
		depth: options.depth ?? 4
	};

	return {
		write(obj: LogObject): void {
			const output = pretty ? formatPretty(obj, formatOptions) : JSON.stringify(toJsonSafe(obj));
			console.log(output);
		},

		async flush(): Promise<void> {
			// Console writes are synchronous, nothing to flush
		},

		async close(): Promise<void> {
			// Console has no resources to close
		}
	};
}
