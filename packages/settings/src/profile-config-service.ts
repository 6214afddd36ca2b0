import { ChangeTopics, createChangeNotification, type ChangeBus } from '@tonearm/events';
import { Logger } from '@tonearm/logging';
import { EPHEMERAL_RECORD_ID, TransientConnectivityError, defaultProfileConfig, type ProfileConfig } from '@tonearm/store';
import type { ConfigAccessService } from './config-access-service';
import { InvalidSettingError } from './errors';
import { normalizeDirectory, sameDirectory, uniqueDirectories } from './paths';

/** Volume changes this small are not worth a write */
const VOLUME_WRITE_THRESHOLD = 1;

/**
 * Per-profile settings.
 *
 * Negative profile ids belong to emergency profiles, which exist only in
 * memory: reads return defaults without touching the store and updates
 * are skipped.
 */
export class ProfileConfigService {
	private readonly log: Logger;

	public constructor(
		private readonly access: ConfigAccessService<number, ProfileConfig>,
		private readonly bus: ChangeBus,
		log?: Logger
	) {
		this.log = log ?? new Logger('ProfileConfig');
	}

	public async getProfileConfig(profileId: number, options: { signal?: AbortSignal } = {}): Promise<ProfileConfig> {
		if (isEmergencyProfile(profileId)) {
			return defaultProfileConfig(profileId);
		}
		return this.access.getConfig(profileId, options);
	}

	/**
	 * Copy the mutable fields of `config` onto the stored record.
	 */
	public async updateProfileConfig(config: ProfileConfig): Promise<void> {
		await this.modify(config.profileId, () => ({
			equalizerPresets: config.equalizerPresets,
			lastVolume: config.lastVolume,
			theme: config.theme,
			dynamicPause: config.dynamicPause,
			blacklistDirectory: uniqueDirectories(config.blacklistDirectory),
			viewState: config.viewState,
			sortingState: config.sortingState
		}));
	}

	/**
	 * Store the volume, skipping changes of one step or less.
	 */
	public async updateVolume(profileId: number, volume: number): Promise<void> {
		if (!Number.isInteger(volume) || volume < 0 || volume > 100) {
			throw new InvalidSettingError('lastVolume', `Volume must be an integer from 0 to 100, got ${volume}`);
		}
		await this.modify(profileId, (current) =>
			Math.abs(current.lastVolume - volume) <= VOLUME_WRITE_THRESHOLD ? null : { lastVolume: volume }
		);
	}

	public async updatePlaybackSettings(profileId: number, dynamicPause: boolean): Promise<void> {
		await this.modify(profileId, () => ({ dynamicPause }));
	}

	public async updateTheme(profileId: number, theme: string): Promise<void> {
		await this.modify(profileId, () => ({ theme: requireJson('theme', theme) }));
	}

	public async updateViewState(profileId: number, viewState: string): Promise<void> {
		await this.modify(profileId, () => ({ viewState: requireJson('viewState', viewState) }));
	}

	public async updateSortState(profileId: number, sortingState: string): Promise<void> {
		await this.modify(profileId, () => ({ sortingState: requireJson('sortingState', sortingState) }));
	}

	public async updateEqualizer(profileId: number, equalizerPresets: string): Promise<void> {
		await this.modify(profileId, () => ({ equalizerPresets: requireJson('equalizerPresets', equalizerPresets) }));
	}

	/**
	 * Overwrite every setting of a profile with its defaults.
	 */
	public async resetProfileToDefaults(profileId: number): Promise<void> {
		await this.modify(profileId, () => {
			const { id: _id, profileId: _profileId, ...defaults } = defaultProfileConfig(profileId);
			return defaults;
		});
		this.log.warn('Profile Config Reset To Defaults', { profileId });
	}

	public async getBlacklistedDirectories(profileId: number): Promise<string[]> {
		if (isEmergencyProfile(profileId)) {
			return [];
		}
		const config = await this.access.getConfig(profileId);
		return uniqueDirectories(config.blacklistDirectory);
	}

	/**
	 * Add a directory to the blacklist unless an equivalent path is already on it.
	 */
	public async addBlacklistDirectory(profileId: number, directory: string): Promise<void> {
		const normalized = requireDirectory(directory);
		const changed = await this.modifyFresh(profileId, (current) =>
			current.blacklistDirectory.some((existing) => sameDirectory(existing, normalized))
				? null
				: { blacklistDirectory: [...current.blacklistDirectory, normalized] }
		);
		if (changed) {
			this.bus.publish(ChangeTopics.Blacklist, createChangeNotification(profileId, this.access.origin));
		}
	}

	public async removeBlacklistDirectory(profileId: number, directory: string): Promise<void> {
		const normalized = requireDirectory(directory);
		const changed = await this.modifyFresh(profileId, (current) => {
			const remaining = current.blacklistDirectory.filter((existing) => !sameDirectory(existing, normalized));
			return remaining.length === current.blacklistDirectory.length ? null : { blacklistDirectory: remaining };
		});
		if (changed) {
			this.bus.publish(ChangeTopics.Blacklist, createChangeNotification(profileId, this.access.origin));
		}
	}

	/**
	 * Blacklist edits start from the stored record rather than the cached one,
	 * so an edit made elsewhere is not lost.
	 */
	private async modifyFresh(
		profileId: number,
		change: (current: ProfileConfig) => Partial<ProfileConfig> | null
	): Promise<boolean> {
		if (!isEmergencyProfile(profileId)) {
			this.access.invalidateCache(profileId);
		}
		return this.modify(profileId, change);
	}

	/**
	 * Apply `change` to the current record and write it. A null change skips
	 * the write. Returns whether anything was written.
	 *
	 * @throws TransientConnectivityError when the stored record could not be
	 * read, since writing onto the fallback defaults would overwrite it
	 */
	private async modify(
		profileId: number,
		change: (current: ProfileConfig) => Partial<ProfileConfig> | null
	): Promise<boolean> {
		if (isEmergencyProfile(profileId)) {
			this.log.warn('Skipped Update Of Emergency Profile', { profileId });
			return false;
		}

		const current = await this.access.getConfig(profileId);
		if (current.id === EPHEMERAL_RECORD_ID) {
			throw new TransientConnectivityError(`ProfileConfig ${profileId} could not be read, update not applied`);
		}
		const fields = change(current);
		if (fields === null) {
			return false;
		}

		await this.access.updateConfig({ ...current, ...fields, id: current.id, profileId: current.profileId });
		return true;
	}
}

export function isEmergencyProfile(profileId: number): boolean {
	return profileId < 0;
}

function requireDirectory(directory: string): string {
	const normalized = normalizeDirectory(directory);
	if (normalized === '') {
		throw new InvalidSettingError('blacklistDirectory', 'Blacklist path cannot be empty');
	}
	return normalized;
}

function requireJson(setting: string, value: string): string {
	try {
		JSON.parse(value);
	} catch (error) {
		throw new InvalidSettingError(setting, `${setting} must be valid JSON: ${error instanceof Error ? error.message : String(error)}`);
	}
	return value;
}
