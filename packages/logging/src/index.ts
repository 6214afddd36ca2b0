export { Logger, type LogObject, type Transport, type LoggerOptions, type LoggerGlobalOptions } from './logger';
export { levels, getLevelName, isLevelName, isLevelEnabled, type LevelName, type LevelNumber } from './levels';
export {
	transports,
	consoleTransport,
	filterTransport,
	memoryTransport,
	formatPretty,
	type ConsoleTransportOptions,
	type FilterOptions,
	type MemoryTransport
} from './transports/index';
export { readLogConfig, buildLoggerOptions, type LogConfig } from './config';
