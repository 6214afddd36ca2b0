import { Pool } from 'pg';
import { Logger } from '@tonearm/logging';
import type { Connector } from './connector';
import { ConfigurationError } from './errors';
import type { StoreSettings } from './settings';
import type { SqlHandle, SqlResult } from './sql-handle';

/**
 * The part of a pg PoolClient the connector uses.
 */
export interface PgClient {
	query(text: string, values?: unknown[]): Promise<{ rows: Record<string, unknown>[]; rowCount: number | null }>;
	release(destroy?: boolean): void;
}

/**
 * The part of a pg Pool the connector uses.
 */
export interface PgPool {
	connect(): Promise<PgClient>;
	end(): Promise<void>;
}

/**
 * SQLSTATE classes that mean the connection parameters are wrong rather
 * than the server being unreachable.
 */
const CONFIGURATION_SQLSTATES = new Set([
	'28000', // invalid_authorization_specification
	'28P01', // invalid_password
	'3D000' // invalid_catalog_name
]);

export class PgHandle implements SqlHandle {
	public constructor(public readonly client: PgClient) {}

	public async query(text: string, values: readonly unknown[] = []): Promise<SqlResult> {
		const result = await this.client.query(text, [...values]);
		return { rows: result.rows, rowCount: result.rowCount ?? 0 };
	}
}

export interface PgConnectorOptions {
	/** Pool to use instead of one built from the settings (for testing) */
	readonly pool?: PgPool;
	readonly log?: Logger;
}

/**
 * Connector over a pg Pool. Each handle is one checked-out pool client.
 */
export class PgConnector implements Connector<PgHandle> {
	private readonly pool: PgPool;
	private readonly log: Logger;

	public constructor(settings: StoreSettings, options: PgConnectorOptions = {}) {
		this.log = options.log ?? new Logger('PgConnector');
		this.pool =
			options.pool ??
			new Pool({
				connectionString: settings.connectionString,
				max: settings.poolMax,
				connectionTimeoutMillis: settings.connectTimeoutMs,
				application_name: 'tonearm'
			});
	}

	public async connect(): Promise<PgHandle> {
		try {
			return new PgHandle(await this.pool.connect());
		} catch (error) {
			const code = sqlState(error);
			if (code !== undefined && CONFIGURATION_SQLSTATES.has(code)) {
				throw new ConfigurationError(`Database rejected the connection parameters (${code})`, [], { cause: error });
			}
			throw error;
		}
	}

	public async ping(handle: PgHandle): Promise<void> {
		await handle.client.query('SELECT 1');
	}

	public async release(handle: PgHandle, broken: boolean): Promise<void> {
		handle.client.release(broken);
	}

	public async close(): Promise<void> {
		this.log.info('Closing Connection Pool');
		await this.pool.end();
	}
}

function sqlState(error: unknown): string | undefined {
	if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
		return error.code;
	}
	return undefined;
}
