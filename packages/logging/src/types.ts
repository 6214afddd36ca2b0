/**
 * Logging types shared by the logger and its transports.
 */

export type LevelName = 'debug' | 'info' | 'warn' | 'error';

export type LevelNumber = 10 | 20 | 30 | 40;

/**
 * A single structured log line as handed to transports.
 */
export interface LogObject {
	time: number;
	level: LevelNumber;
	msg: string;
	name?: string;
	[key: string]: unknown;
}

/**
 * Destination for log objects. Writes are synchronous; flush/close let
 * buffered transports drain during shutdown.
 */
export interface Transport {
	write(obj: LogObject): void;
	flush(): Promise<void>;
	close(): Promise<void>;
}

export interface LoggerOptions {
	level?: LevelName;
	transports?: Transport[];
}

export interface LoggerGlobalOptions {
	level?: LevelName;
	transports?: Transport[];
}
