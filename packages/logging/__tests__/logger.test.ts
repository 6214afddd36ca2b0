import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { Logger, levels, memoryTransport, type MemoryTransport } from '../src/index';

describe('Logger', () => {
	let transport: MemoryTransport;

	beforeEach(() => {
		Logger.reset();
		transport = memoryTransport();
	});

	afterEach(() => {
		Logger.reset();
	});

	describe('log levels', () => {
		test('should log debug messages when level is debug', () => {
			const log = new Logger('Test', { level: 'debug', transports: [transport] });
			log.debug('debug message');
			expect(transport.logs).toHaveLength(1);
			expect(transport.logs[0]!.level).toBe(levels.debug);
			expect(transport.logs[0]!.msg).toBe('debug message');
		});

		test('should not log debug messages when level is info', () => {
			const log = new Logger('Test', { level: 'info', transports: [transport] });
			log.debug('debug message');
			expect(transport.logs).toHaveLength(0);
		});

		test('should log warn and error messages at info level', () => {
			const log = new Logger('Test', { level: 'info', transports: [transport] });
			log.warn('warn message');
			log.error('error message');
			expect(transport.logs.map((l) => l.level)).toEqual([levels.warn, levels.error]);
		});

		test('should follow the global level when none is given', () => {
			const log = new Logger('Test', { transports: [transport] });
			log.debug('hidden');
			Logger.configure({ level: 'debug' });
			log.debug('shown');
			expect(transport.logs.map((l) => l.msg)).toEqual(['shown']);
		});

		test('should report whether a level is enabled', () => {
			const log = new Logger('Test', { level: 'warn', transports: [transport] });
			expect(log.isLevelEnabled('info')).toBe(false);
			expect(log.isLevelEnabled('error')).toBe(true);
		});
	});

	describe('context', () => {
		test('should include logger name and data in log output', () => {
			const log = new Logger('ConnectionManager', { transports: [transport] });
			log.info('connected', { attempt: 2 });
			expect(transport.logs[0]).toMatchObject({ name: 'ConnectionManager', msg: 'connected', attempt: 2 });
		});

		test('with() should add context without changing the parent', () => {
			const parent = new Logger('Cache', { transports: [transport] });
			const child = parent.with({ key: 'profile:1' });

			child.info('child');
			parent.info('parent');

			expect(transport.logs[0]!.key).toBe('profile:1');
			expect(transport.logs[1]!.key).toBeUndefined();
		});

		test('call data should override context with the same key', () => {
			const log = new Logger('Test', { transports: [transport] }).with({ profileId: 1 });
			log.info('override', { profileId: 2 });
			expect(transport.logs[0]!.profileId).toBe(2);
		});
	});

	describe('global transports', () => {
		test('should write to configured global transports', () => {
			Logger.configure({ transports: [transport] });
			new Logger('Global').info('via global');
			expect(transport.logs[0]!.msg).toBe('via global');
		});

		test('should prefer explicit transports over global ones', () => {
			const global = memoryTransport();
			Logger.configure({ transports: [global] });
			new Logger('Explicit', { transports: [transport] }).info('explicit');
			expect(transport.logs).toHaveLength(1);
			expect(global.logs).toHaveLength(0);
		});

		test('shutdown should flush and close global transports', async () => {
			const calls: string[] = [];
			Logger.configure({
				transports: [
					{
						write() {},
						async flush() {
							calls.push('flush');
						},
						async close() {
							calls.push('close');
						}
					}
				]
			});

			await Logger.shutdown();

			expect(calls).toEqual(['flush', 'close']);
		});
	});
});
