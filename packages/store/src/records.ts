/**
 * Settings records and the row schemas they are decoded from.
 *
 * JSON-valued settings (equalizer presets, theme, view and sort state) are
 * kept as JSON text; this layer does not interpret them.
 */

import { Type, type Static, type TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { RecordFormatError } from './errors';

/** Id of a record that exists only in memory because it could not be persisted */
export const EPHEMERAL_RECORD_ID = -1;

export interface ProfileConfig {
	readonly id: number;
	readonly profileId: number;
	readonly equalizerPresets: string;
	readonly lastVolume: number;
	readonly theme: string;
	readonly dynamicPause: boolean;
	readonly blacklistDirectory: readonly string[];
	readonly viewState: string;
	readonly sortingState: string;
}

export interface GlobalConfig {
	readonly id: number;
	readonly lastUsedProfile: number | null;
	readonly languagePreference: string;
	readonly windowWidth: number;
	readonly windowHeight: number;
	readonly windowX: number | null;
	readonly windowY: number | null;
	readonly isWindowMaximized: boolean;
}

export const DEFAULT_VIEW_STATE = '{"tracks": "grid"}';
export const DEFAULT_SORTING_STATE = '{"library": {"field": "title", "order": "asc"}}';

export function defaultProfileConfig(profileId: number, id: number = EPHEMERAL_RECORD_ID): ProfileConfig {
	return {
		id,
		profileId,
		equalizerPresets: '{}',
		lastVolume: 50,
		theme: '{}',
		dynamicPause: false,
		blacklistDirectory: [],
		viewState: DEFAULT_VIEW_STATE,
		sortingState: DEFAULT_SORTING_STATE
	};
}

export function defaultGlobalConfig(id: number = EPHEMERAL_RECORD_ID): GlobalConfig {
	return {
		id,
		lastUsedProfile: null,
		languagePreference: 'en',
		windowWidth: 1440,
		windowHeight: 760,
		windowX: null,
		windowY: null,
		isWindowMaximized: false
	};
}

const NullableText = Type.Union([Type.String(), Type.Null()]);
const NullableInteger = Type.Union([Type.Integer(), Type.Null()]);

export const ProfileConfigRowSchema = Type.Object({
	id: Type.Integer(),
	profile_id: Type.Integer(),
	equalizer_presets: NullableText,
	last_volume: Type.Integer({ minimum: 0, maximum: 100 }),
	theme: NullableText,
	dynamic_pause: Type.Boolean(),
	blacklist_directory: Type.Union([Type.Array(Type.String()), Type.Null()]),
	view_state: NullableText,
	sorting_state: NullableText
});

export type ProfileConfigRow = Static<typeof ProfileConfigRowSchema>;

export const GlobalConfigRowSchema = Type.Object({
	id: Type.Integer(),
	last_used_profile: NullableInteger,
	language_preference: Type.String({ minLength: 2, maxLength: 10 }),
	window_width: Type.Integer({ minimum: 0 }),
	window_height: Type.Integer({ minimum: 0 }),
	window_x: NullableInteger,
	window_y: NullableInteger,
	is_window_maximized: Type.Boolean()
});

export type GlobalConfigRow = Static<typeof GlobalConfigRowSchema>;

/**
 * @throws RecordFormatError listing every schema violation
 */
export function decodeRow<S extends TSchema>(schema: S, entity: string, row: unknown): Static<S> {
	if (Value.Check(schema, row)) {
		return row;
	}
	const issues = [...Value.Errors(schema, row)].map((error) => `${error.path || '/'}: ${error.message}`);
	throw new RecordFormatError(entity, issues);
}

export function toProfileConfig(row: ProfileConfigRow): ProfileConfig {
	const defaults = defaultProfileConfig(row.profile_id, row.id);
	return {
		id: row.id,
		profileId: row.profile_id,
		equalizerPresets: row.equalizer_presets ?? defaults.equalizerPresets,
		lastVolume: row.last_volume,
		theme: row.theme ?? defaults.theme,
		dynamicPause: row.dynamic_pause,
		blacklistDirectory: row.blacklist_directory ?? defaults.blacklistDirectory,
		viewState: row.view_state ?? defaults.viewState,
		sortingState: row.sorting_state ?? defaults.sortingState
	};
}

export function toGlobalConfig(row: GlobalConfigRow): GlobalConfig {
	return {
		id: row.id,
		lastUsedProfile: row.last_used_profile,
		languagePreference: row.language_preference,
		windowWidth: row.window_width,
		windowHeight: row.window_height,
		windowX: row.window_x,
		windowY: row.window_y,
		isWindowMaximized: row.is_window_maximized
	};
}
