import { Logger, memoryTransport, type MemoryTransport } from '@tonearm/logging';
import type { Clock } from '../src/clock';
import type { Connector } from '../src/connector';
import type { Sleep } from '../src/retry-policy';
import type { SqlExecutor, SqlHandle, SqlResult } from '../src/sql-handle';

export class ManualClock implements Clock {
	public constructor(public time = 0) {}

	public now(): number {
		return this.time;
	}

	public advance(ms: number): void {
		this.time += ms;
	}
}

export function captureLogger(name = 'Test'): { log: Logger; transport: MemoryTransport } {
	const transport = memoryTransport();
	return { log: new Logger(name, { level: 'debug', transports: [transport] }), transport };
}

export function messagesAt(transport: MemoryTransport, level: 10 | 20 | 30 | 40): string[] {
	return transport.logs.filter((log) => log.level === level).map((log) => log.msg);
}

/**
 * Sleep that records requested delays and returns at once, rejecting with
 * the signal's reason when already aborted.
 */
export function recordingSleep(): { sleep: Sleep; delays: number[] } {
	const delays: number[] = [];
	const sleep: Sleep = async (ms, signal) => {
		delays.push(ms);
		signal?.throwIfAborted();
	};
	return { sleep, delays };
}

export interface FakeHandle {
	readonly serial: number;
	readonly alive: boolean;
}

/** One scripted outcome per connect() call */
export type ConnectOutcome = 'ok' | 'dead' | Error;

/**
 * Connector whose connect() outcomes are scripted. Once the script runs
 * out, `fallback` is used.
 */
export class FakeConnector implements Connector<FakeHandle> {
	public connectCount = 0;
	public readonly released: Array<{ handle: FakeHandle; broken: boolean }> = [];
	public closed = false;
	public releaseError: Error | null = null;
	private readonly script: ConnectOutcome[];

	public constructor(
		script: ConnectOutcome[] = [],
		public fallback: ConnectOutcome = 'ok'
	) {
		this.script = [...script];
	}

	public async connect(): Promise<FakeHandle> {
		this.connectCount++;
		const outcome = this.script.shift() ?? this.fallback;
		if (outcome instanceof Error) {
			throw outcome;
		}
		return { serial: this.connectCount, alive: outcome === 'ok' };
	}

	public async ping(handle: FakeHandle): Promise<void> {
		if (!handle.alive) {
			throw new Error('server closed the connection');
		}
	}

	public async release(handle: FakeHandle, broken: boolean): Promise<void> {
		if (this.releaseError) {
			throw this.releaseError;
		}
		this.released.push({ handle, broken });
	}

	public async close(): Promise<void> {
		this.closed = true;
	}
}

export interface RecordedQuery {
	readonly text: string;
	readonly values: readonly unknown[];
}

/**
 * SqlExecutor over a scripted handle: each query() takes the next result.
 */
export class ScriptedExecutor implements SqlExecutor {
	public readonly queries: RecordedQuery[] = [];
	public connections = 0;
	private readonly results: SqlResult[];

	public constructor(results: SqlResult[]) {
		this.results = [...results];
	}

	public async withConnection<T>(fn: (handle: SqlHandle) => Promise<T>): Promise<T> {
		this.connections++;
		const handle: SqlHandle = {
			query: async (text, values = []) => {
				this.queries.push({ text, values });
				const next = this.results.shift();
				if (!next) {
					throw new Error(`No scripted result for query: ${text}`);
				}
				return next;
			}
		};
		return fn(handle);
	}
}

export function rows(...records: Record<string, unknown>[]): SqlResult {
	return { rows: records, rowCount: records.length };
}

export function affected(rowCount: number): SqlResult {
	return { rows: [], rowCount };
}
