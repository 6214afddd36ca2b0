import { Logger } from '@tonearm/logging';
import { WriteConflictError } from './errors';
import { GlobalConfigRowSchema, decodeRow, defaultGlobalConfig, toGlobalConfig, type GlobalConfig } from './records';
import { found, notFound, type FetchResult, type Repository } from './repository';
import type { SqlExecutor, SqlHandle } from './sql-handle';

const ENTITY = 'global_config';

/** The only key of the single-row global settings table */
export const GLOBAL_CONFIG_KEY = 'global';
export type GlobalConfigKey = typeof GLOBAL_CONFIG_KEY;

/** Fixed primary key of the single `global_config` row */
export const GLOBAL_CONFIG_ROW_ID = 1;

const COLUMNS = `id, last_used_profile, language_preference, window_width, window_height,
	window_x, window_y, is_window_maximized`;

/**
 * Application-wide settings, the single row of `global_config`. The row id
 * is fixed, so concurrent creators cannot end up with two rows.
 */
export class PgGlobalConfigRepository implements Repository<GlobalConfigKey, GlobalConfig> {
	private readonly log: Logger;

	public constructor(
		private readonly connections: SqlExecutor,
		log?: Logger
	) {
		this.log = log ?? new Logger('GlobalConfigRepository');
	}

	public async fetchByKey(_key: GlobalConfigKey): Promise<FetchResult<GlobalConfig>> {
		return this.connections.withConnection((handle) => this.select(handle));
	}

	/**
	 * Insert the default row. When another writer created it first, that row
	 * is returned instead.
	 */
	public async create(_key: GlobalConfigKey): Promise<GlobalConfig> {
		const defaults = defaultGlobalConfig();

		return this.connections.withConnection(async (handle) => {
			const result = await handle.query(
				`INSERT INTO global_config (id, language_preference, window_width, window_height, is_window_maximized)
				VALUES ($1, $2, $3, $4, $5)
				ON CONFLICT (id) DO NOTHING
				RETURNING ${COLUMNS}`,
				[
					GLOBAL_CONFIG_ROW_ID,
					defaults.languagePreference,
					defaults.windowWidth,
					defaults.windowHeight,
					defaults.isWindowMaximized
				]
			);

			const [row] = result.rows;
			if (row) {
				this.log.info('Global Config Created');
				return toGlobalConfig(decodeRow(GlobalConfigRowSchema, ENTITY, row));
			}

			const existing = await this.select(handle);
			if (!existing.found) {
				throw new WriteConflictError(ENTITY, GLOBAL_CONFIG_ROW_ID);
			}
			return existing.record;
		});
	}

	public async update(config: GlobalConfig): Promise<void> {
		const result = await this.connections.withConnection((handle) =>
			handle.query(
				`UPDATE global_config SET
					last_used_profile = $2,
					language_preference = $3,
					window_width = $4,
					window_height = $5,
					window_x = $6,
					window_y = $7,
					is_window_maximized = $8
				WHERE id = $1`,
				[
					config.id,
					config.lastUsedProfile,
					config.languagePreference,
					config.windowWidth,
					config.windowHeight,
					config.windowX,
					config.windowY,
					config.isWindowMaximized
				]
			)
		);

		if (result.rowCount === 0) {
			throw new WriteConflictError(ENTITY, config.id);
		}
	}

	private async select(handle: SqlHandle): Promise<FetchResult<GlobalConfig>> {
		const result = await handle.query(`SELECT ${COLUMNS} FROM global_config WHERE id = $1`, [GLOBAL_CONFIG_ROW_ID]);
		const [row] = result.rows;
		return row ? found(toGlobalConfig(decodeRow(GlobalConfigRowSchema, ENTITY, row))) : notFound();
	}
}
