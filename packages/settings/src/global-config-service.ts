import { Logger } from '@tonearm/logging';
import {
	EPHEMERAL_RECORD_ID,
	GLOBAL_CONFIG_KEY,
	TransientConnectivityError,
	type GlobalConfig,
	type GlobalConfigKey
} from '@tonearm/store';
import type { ConfigAccessService } from './config-access-service';
import { InvalidSettingError } from './errors';

export interface WindowState {
	readonly width: number;
	readonly height: number;
	readonly x: number | null;
	readonly y: number | null;
	readonly isMaximized: boolean;
}

/**
 * Application-wide settings. Every update is skipped when it would not
 * change the stored value, and refused while only the fallback defaults
 * could be read.
 */
export class GlobalConfigService {
	private readonly log: Logger;

	public constructor(
		private readonly access: ConfigAccessService<GlobalConfigKey, GlobalConfig>,
		log?: Logger
	) {
		this.log = log ?? new Logger('GlobalConfig');
	}

	public async getGlobalConfig(options: { signal?: AbortSignal } = {}): Promise<GlobalConfig> {
		return this.access.getConfig(GLOBAL_CONFIG_KEY, options);
	}

	public async updateLastUsedProfile(profileId: number): Promise<void> {
		await this.modify((current) => (current.lastUsedProfile === profileId ? null : { lastUsedProfile: profileId }));
	}

	public async updateLanguage(languageCode: string): Promise<void> {
		const language = languageCode.trim();
		if (!/^[A-Za-z]{2,3}(-[A-Za-z0-9]{2,4})?$/.test(language)) {
			throw new InvalidSettingError('languagePreference', `Not a language code: '${languageCode}'`);
		}
		await this.modify((current) => (current.languagePreference === language ? null : { languagePreference: language }));
	}

	public async updateWindowState(state: WindowState): Promise<void> {
		if (state.width <= 0 || state.height <= 0) {
			throw new InvalidSettingError('window', `Window size must be positive, got ${state.width}x${state.height}`);
		}
		await this.modify((current) => {
			const next = {
				windowWidth: state.width,
				windowHeight: state.height,
				windowX: state.x,
				windowY: state.y,
				isWindowMaximized: state.isMaximized
			};
			const unchanged =
				current.windowWidth === next.windowWidth &&
				current.windowHeight === next.windowHeight &&
				current.windowX === next.windowX &&
				current.windowY === next.windowY &&
				current.isWindowMaximized === next.isWindowMaximized;
			return unchanged ? null : next;
		});
	}

	private async modify(change: (current: GlobalConfig) => Partial<GlobalConfig> | null): Promise<void> {
		const current = await this.access.getConfig(GLOBAL_CONFIG_KEY);
		if (current.id === EPHEMERAL_RECORD_ID) {
			throw new TransientConnectivityError('GlobalConfig could not be read, update not applied');
		}
		const fields = change(current);
		if (fields === null) {
			this.log.debug('Global Config Unchanged');
			return;
		}
		await this.access.updateConfig({ ...current, ...fields, id: current.id });
	}
}
