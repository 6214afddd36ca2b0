import { levels, getLevelName, type LevelName, type LevelNumber, isLevelEnabled } from './levels';
import { consoleTransport } from './transports/console';
import type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions } from './types';

export type { LogObject, Transport, LoggerOptions, LoggerGlobalOptions };

/**
 * Small structured logger with a Pino-inspired shape.
 *
 * - Produces structured log objects
 * - Writes synchronously to configurable transports
 * - Immutable context via with()
 * - Global defaults via Logger.configure(), resettable for tests
 */
export class Logger {
	private static globalTransports: Transport[] | null = null;
	private static globalLevel: LevelName = 'info';

	private readonly name: string;
	private readonly level: LevelNumber | null;
	private readonly explicitTransports: Transport[] | null;
	private readonly context: Record<string, unknown>;

	constructor(name: string, options: LoggerOptions = {}, context: Record<string, unknown> = {}) {
		this.name = name;
		// null level follows the global level at write time
		this.level = options.level ? levels[options.level] : null;
		this.explicitTransports = options.transports ?? null;
		this.context = context;
	}

	private get transports(): Transport[] {
		return this.explicitTransports ?? Logger.globalTransports ?? [Logger.defaultTransport()];
	}

	private get threshold(): LevelNumber {
		return this.level ?? levels[Logger.globalLevel];
	}

	/**
	 * Configure global defaults for all Logger instances that were not given
	 * explicit transports or a level.
	 */
	static configure(options: LoggerGlobalOptions): void {
		if (options.level) {
			Logger.globalLevel = options.level;
		}
		if (options.transports) {
			Logger.globalTransports = options.transports;
		}
	}

	/**
	 * Reset global configuration to defaults.
	 *
	 * Tests that call Logger.configure() must call this in afterEach().
	 */
	static reset(): void {
		Logger.globalLevel = 'info';
		Logger.globalTransports = null;
	}

	/**
	 * Flush and close the global transports. Uses allSettled so one failing
	 * transport does not keep the others open.
	 */
	static async shutdown(): Promise<void> {
		const transports = Logger.globalTransports ?? [];
		await Promise.allSettled(transports.map((transport) => transport.flush()));
		await Promise.allSettled(transports.map((transport) => transport.close()));
	}

	debug(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.debug, msg, data);
	}

	info(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.info, msg, data);
	}

	warn(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.warn, msg, data);
	}

	error(msg: string, data?: Record<string, unknown>): void {
		this.log(levels.error, msg, data);
	}

	isLevelEnabled(level: LevelName): boolean {
		return isLevelEnabled(levels[level], this.threshold);
	}

	/**
	 * Creates a new logger with additional context (immutable)
	 */
	with(data: Record<string, unknown>): Logger {
		return new Logger(this.name, this.inheritedOptions(), { ...this.context, ...data });
	}

	private inheritedOptions(): LoggerOptions {
		const options: LoggerOptions = {};
		if (this.level !== null) {
			options.level = getLevelName(this.level);
		}
		if (this.explicitTransports) {
			options.transports = this.explicitTransports;
		}
		return options;
	}

	private log(level: LevelNumber, msg: string, data?: Record<string, unknown>): void {
		if (!isLevelEnabled(level, this.threshold)) {
			return;
		}

		const logObj: LogObject = {
			time: Date.now(),
			level,
			msg,
			name: this.name,
			...this.context,
			...data
		};

		for (const transport of this.transports) {
			transport.write(logObj);
		}
	}

	private static defaultTransport(): Transport {
		return consoleTransport();
	}
}
