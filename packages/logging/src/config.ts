import type { Transport, LoggerOptions } from './types';
import { isLevelName, type LevelName } from './levels';
import { consoleTransport } from './transports/console';
import { filterTransport } from './transports/filter';

/**
 * Minimal ConfigProvider shape for logging configuration.
 * Declared locally so logging does not depend on @tonearm/config.
 */
interface ConfigProvider {
	get(key: string): Promise<string | undefined>;
}

export interface LogConfig {
	/** Log level threshold. Default: 'info' */
	level: LevelName;
	/** Logger names to include (empty = all) */
	includeNames: string[];
	/** Logger names to exclude */
	excludeNames: string[];
	/** Use JSON format (production) vs pretty format (dev) */
	jsonFormat: boolean;
}

function parseList(value: string | undefined): string[] {
	if (!value || value.trim() === '') return [];
	return value
		.split(',')
		.map((s) => s.trim())
		.filter(Boolean);
}

/**
 * Read logging configuration from a config provider.
 *
 * Keys:
 * - LOG_LEVEL: debug | info | warn | error (default: info)
 * - LOG_INCLUDE_NAMES: comma-separated logger names to include
 * - LOG_EXCLUDE_NAMES: comma-separated logger names to exclude
 * - LOG_JSON: true | false (default: false)
 */
export async function readLogConfig(config: ConfigProvider): Promise<LogConfig> {
	const [level, includeNames, excludeNames, jsonFormat] = await Promise.all([
		config.get('LOG_LEVEL'),
		config.get('LOG_INCLUDE_NAMES'),
		config.get('LOG_EXCLUDE_NAMES'),
		config.get('LOG_JSON')
	]);

	return {
		level: isLevelName(level) ? level : 'info',
		includeNames: parseList(includeNames),
		excludeNames: parseList(excludeNames),
		jsonFormat: jsonFormat === 'true'
	};
}

/**
 * Build logger options from a LogConfig, wrapping the console transport in
 * a name filter when include/exclude lists are set.
 */
export function buildLoggerOptions(config: LogConfig): LoggerOptions {
	let transport: Transport = consoleTransport({
		json: config.jsonFormat,
		pretty: !config.jsonFormat
	});

	if (config.includeNames.length > 0 || config.excludeNames.length > 0) {
		transport = filterTransport(transport, {
			includeNames: config.includeNames.length > 0 ? config.includeNames : undefined,
			excludeNames: config.excludeNames.length > 0 ? config.excludeNames : undefined
		});
	}

	return {
		level: config.level,
		transports: [transport]
	};
}
