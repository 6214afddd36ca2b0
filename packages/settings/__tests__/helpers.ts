import { InProcessChangeBus } from '@tonearm/events';
import { Logger, memoryTransport, type MemoryTransport } from '@tonearm/logging';
import {
	WriteConflictError,
	defaultGlobalConfig,
	defaultProfileConfig,
	found,
	notFound,
	type FetchResult,
	type GlobalConfig,
	type GlobalConfigKey,
	type ProfileConfig,
	type Repository
} from '@tonearm/store';

export class ManualClock {
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

export function quietBus(): InProcessChangeBus {
	return new InProcessChangeBus({ log: captureLogger('ChangeBus').log });
}

/**
 * Repository over a Map with call counters and switchable failures.
 */
abstract class InMemoryRepository<K, R> implements Repository<K, R> {
	public readonly records = new Map<K, R>();
	public fetchCount = 0;
	public createCount = 0;
	public updateCount = 0;
	/** Thrown by every operation while set */
	public failure: Error | null = null;
	/** Thrown by update() only while set */
	public updateFailure: Error | null = null;
	/** Awaited by fetchByKey() while set */
	public gate: Promise<void> | null = null;
	protected nextId = 1;
	private fetchFailures: Error[] = [];

	/** Make the next `count` fetchByKey() calls throw `error` */
	public failFetches(count: number, error: Error): void {
		this.fetchFailures = Array.from({ length: count }, () => error);
	}

	public async fetchByKey(key: K): Promise<FetchResult<R>> {
		this.fetchCount++;
		if (this.gate) {
			await this.gate;
		}
		this.throwIfFailing();
		const scripted = this.fetchFailures.shift();
		if (scripted) {
			throw scripted;
		}
		const record = this.records.get(key);
		return record === undefined ? notFound() : found(record);
	}

	public async create(key: K): Promise<R> {
		this.createCount++;
		this.throwIfFailing();
		const record = this.defaults(key, this.nextId++);
		this.records.set(key, record);
		return record;
	}

	public async update(record: R): Promise<void> {
		this.updateCount++;
		this.throwIfFailing();
		if (this.updateFailure) {
			throw this.updateFailure;
		}
		const key = this.keyOf(record);
		if (!this.records.has(key)) {
			throw new WriteConflictError('record', key);
		}
		this.records.set(key, record);
	}

	protected abstract defaults(key: K, id: number): R;
	protected abstract keyOf(record: R): K;

	private throwIfFailing(): void {
		if (this.failure) {
			throw this.failure;
		}
	}
}

export class InMemoryProfileRepository extends InMemoryRepository<number, ProfileConfig> {
	public seed(profileId: number, fields: Partial<ProfileConfig> = {}): ProfileConfig {
		const record = { ...defaultProfileConfig(profileId, this.nextId++), ...fields };
		this.records.set(profileId, record);
		return record;
	}

	protected defaults(profileId: number, id: number): ProfileConfig {
		return defaultProfileConfig(profileId, id);
	}

	protected keyOf(record: ProfileConfig): number {
		return record.profileId;
	}
}

export class InMemoryGlobalRepository extends InMemoryRepository<GlobalConfigKey, GlobalConfig> {
	protected defaults(_key: GlobalConfigKey, id: number): GlobalConfig {
		return defaultGlobalConfig(id);
	}

	protected keyOf(): GlobalConfigKey {
		return 'global';
	}
}

export interface Deferred<T> {
	promise: Promise<T>;
	resolve(value: T): void;
}

export function deferred<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => {};
	const promise = new Promise<T>((res) => {
		resolve = res;
	});
	return { promise, resolve };
}
