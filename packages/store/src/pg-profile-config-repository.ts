import { Logger } from '@tonearm/logging';
import { WriteConflictError } from './errors';
import {
	ProfileConfigRowSchema,
	decodeRow,
	defaultProfileConfig,
	toProfileConfig,
	type ProfileConfig
} from './records';
import { found, notFound, type FetchResult, type Repository } from './repository';
import type { SqlExecutor, SqlHandle } from './sql-handle';

const ENTITY = 'profile_config';

const COLUMNS = `id, profile_id, equalizer_presets, last_volume, theme, dynamic_pause,
	blacklist_directory, view_state, sorting_state`;

/**
 * Profile settings, one row per profile in `profile_config`.
 */
export class PgProfileConfigRepository implements Repository<number, ProfileConfig> {
	private readonly log: Logger;

	public constructor(
		private readonly connections: SqlExecutor,
		log?: Logger
	) {
		this.log = log ?? new Logger('ProfileConfigRepository');
	}

	public async fetchByKey(profileId: number): Promise<FetchResult<ProfileConfig>> {
		return this.connections.withConnection((handle) => this.select(handle, profileId));
	}

	/**
	 * Insert the default record. When another writer created the row first,
	 * that row is returned instead.
	 */
	public async create(profileId: number): Promise<ProfileConfig> {
		const defaults = defaultProfileConfig(profileId);

		return this.connections.withConnection(async (handle) => {
			const result = await handle.query(
				`INSERT INTO profile_config (profile_id, equalizer_presets, last_volume, theme, dynamic_pause,
					blacklist_directory, view_state, sorting_state)
				VALUES ($1, $2, $3, $4, $5, $6, $7, $8)
				ON CONFLICT (profile_id) DO NOTHING
				RETURNING ${COLUMNS}`,
				[
					profileId,
					defaults.equalizerPresets,
					defaults.lastVolume,
					defaults.theme,
					defaults.dynamicPause,
					defaults.blacklistDirectory,
					defaults.viewState,
					defaults.sortingState
				]
			);

			const [row] = result.rows;
			if (row) {
				this.log.info('Profile Config Created', { profileId });
				return toProfileConfig(decodeRow(ProfileConfigRowSchema, ENTITY, row));
			}

			const existing = await this.select(handle, profileId);
			if (!existing.found) {
				throw new WriteConflictError(ENTITY, profileId);
			}
			return existing.record;
		});
	}

	public async update(config: ProfileConfig): Promise<void> {
		const result = await this.connections.withConnection((handle) =>
			handle.query(
				`UPDATE profile_config SET
					equalizer_presets = $2,
					last_volume = $3,
					theme = $4,
					dynamic_pause = $5,
					blacklist_directory = $6,
					view_state = $7,
					sorting_state = $8
				WHERE profile_id = $1`,
				[
					config.profileId,
					config.equalizerPresets,
					config.lastVolume,
					config.theme,
					config.dynamicPause,
					config.blacklistDirectory,
					config.viewState,
					config.sortingState
				]
			)
		);

		if (result.rowCount === 0) {
			throw new WriteConflictError(ENTITY, config.profileId);
		}
	}

	/**
	 * Remove the settings of a deleted profile. Returns false if there were none.
	 */
	public async delete(profileId: number): Promise<boolean> {
		const result = await this.connections.withConnection((handle) =>
			handle.query('DELETE FROM profile_config WHERE profile_id = $1', [profileId])
		);
		return result.rowCount > 0;
	}

	private async select(handle: SqlHandle, profileId: number): Promise<FetchResult<ProfileConfig>> {
		const result = await handle.query(`SELECT ${COLUMNS} FROM profile_config WHERE profile_id = $1`, [profileId]);
		const [row] = result.rows;
		return row ? found(toProfileConfig(decodeRow(ProfileConfigRowSchema, ENTITY, row))) : notFound();
	}
}
