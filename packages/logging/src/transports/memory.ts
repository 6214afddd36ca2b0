import type { Transport, LogObject } from '../types';

/**
 * Transport that keeps every log object in an array.
 * Used by tests to assert on what was logged.
 */
export interface MemoryTransport extends Transport {
	readonly logs: LogObject[];
	clear(): void;
}

export function memoryTransport(): MemoryTransport {
	const logs: LogObject[] = [];
	return {
		logs,
		write(obj: LogObject): void {
			logs.push(obj);
		},
		clear(): void {
			logs.length = 0;
		},
		async flush(): Promise<void> {},
		async close(): Promise<void> {}
	};
}
