/**
 * Tonearm Settings
 *
 * Cached, fault-tolerant access to profile and global settings.
 *
 * @module @tonearm/settings
 */

export { ConfigAccessService, type ConfigAccessServiceOptions, type GetConfigOptions } from './config-access-service';
export { ProfileConfigService, isEmergencyProfile } from './profile-config-service';
export { GlobalConfigService, type WindowState } from './global-config-service';
export { createSettingsLayer, type SettingsLayerOptions, type SettingsLayer } from './create-settings-layer';
export { InvalidSettingError } from './errors';
export { normalizeDirectory, uniqueDirectories } from './paths';
