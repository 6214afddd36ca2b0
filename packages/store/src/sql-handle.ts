import type { OpenOptions } from './connection-manager';

export interface SqlResult {
	readonly rows: readonly Record<string, unknown>[];
	readonly rowCount: number;
}

/**
 * A checked-out connection that runs parameterised SQL.
 */
export interface SqlHandle {
	query(text: string, values?: readonly unknown[]): Promise<SqlResult>;
}

/**
 * What repositories need from a ConnectionManager.
 */
export interface SqlExecutor {
	withConnection<T>(fn: (handle: SqlHandle) => Promise<T>, options?: OpenOptions): Promise<T>;
}
