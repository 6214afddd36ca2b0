import type { Clock, Duration } from '@tonearm/cache';
import { EnvConfigProvider, type ConfigProvider } from '@tonearm/config';
import { ChangeTopics, InProcessChangeBus, type ChangeBus } from '@tonearm/events';
import { Logger, buildLoggerOptions, readLogConfig } from '@tonearm/logging';
import {
	CircuitBreakerState,
	ConnectionManager,
	GLOBAL_CONFIG_KEY,
	PgConnector,
	PgGlobalConfigRepository,
	PgProfileConfigRepository,
	RetryPolicy,
	defaultGlobalConfig,
	defaultProfileConfig,
	readStoreSettings,
	type CircuitBreakerOptions,
	type Connector,
	type GlobalConfig,
	type GlobalConfigKey,
	type ProfileConfig,
	type RetryPolicyOptions,
	type Sleep,
	type SqlHandle
} from '@tonearm/store';
import { ConfigAccessService } from './config-access-service';
import { GlobalConfigService } from './global-config-service';
import { ProfileConfigService } from './profile-config-service';

export interface SettingsLayerOptions {
	/** Source of DB_* and LOG_* keys (default: process.env) */
	readonly config?: ConfigProvider;
	/** Apply LOG_* keys to the global logger configuration (default: false) */
	readonly configureLogging?: boolean;
	/** Store connector (default: PgConnector built from DB_* keys) */
	readonly connector?: Connector<SqlHandle>;
	/** Change bus shared with the rest of the application (default: in-process) */
	readonly bus?: ChangeBus;
	readonly breaker?: Omit<CircuitBreakerOptions, 'clock'>;
	readonly retry?: RetryPolicyOptions;
	readonly sleep?: Sleep;
	/** Cache TTL for both record kinds (default: '5m') */
	readonly ttl?: Duration;
	/** Identifies this process on published notifications */
	readonly origin?: string;
	/** Time source for the caches and the circuit breaker */
	readonly clock?: Clock;
}

export interface SettingsLayer {
	readonly profiles: ProfileConfigService;
	readonly global: GlobalConfigService;
	readonly bus: ChangeBus;
	readonly connections: ConnectionManager<SqlHandle>;
	/** Unsubscribe from the bus and close the store connections */
	stop(): Promise<void>;
}

/**
 * Wire config, connector, circuit breaker, connection manager, repositories,
 * caches and services into a running settings layer.
 *
 * @throws ConfigurationError when no connector is given and DB_CONNECTION_STRING is missing
 *
 * @example
 * ```ts
 * const settings = await createSettingsLayer({ configureLogging: true });
 * const config = await settings.profiles.getProfileConfig(1);
 * await settings.profiles.updateVolume(1, 65);
 * await settings.stop();
 * ```
 */
export async function createSettingsLayer(options: SettingsLayerOptions = {}): Promise<SettingsLayer> {
	const config = options.config ?? new EnvConfigProvider();

	if (options.configureLogging) {
		Logger.configure(buildLoggerOptions(await readLogConfig(config)));
	}

	const log = new Logger('Settings');
	const connector = options.connector ?? new PgConnector(await readStoreSettings(config));
	const origin = options.origin ?? crypto.randomUUID();
	const bus = options.bus ?? new InProcessChangeBus();

	const connections = new ConnectionManager<SqlHandle>({
		connector,
		breaker: new CircuitBreakerState({ ...options.breaker, clock: options.clock }),
		retry: new RetryPolicy(options.retry),
		sleep: options.sleep
	});

	const profileAccess = new ConfigAccessService<number, ProfileConfig>({
		name: 'ProfileConfig',
		repository: new PgProfileConfigRepository(connections),
		bus,
		topic: ChangeTopics.ProfileConfig,
		isKey: (key): key is number => typeof key === 'number',
		keyOf: (record) => record.profileId,
		createDefault: (profileId) => defaultProfileConfig(profileId),
		ttl: options.ttl,
		origin,
		clock: options.clock
	});

	const globalAccess = new ConfigAccessService<GlobalConfigKey, GlobalConfig>({
		name: 'GlobalConfig',
		repository: new PgGlobalConfigRepository(connections),
		bus,
		topic: ChangeTopics.GlobalConfig,
		isKey: (key): key is GlobalConfigKey => key === GLOBAL_CONFIG_KEY,
		keyOf: () => GLOBAL_CONFIG_KEY,
		createDefault: () => defaultGlobalConfig(),
		ttl: options.ttl,
		origin,
		clock: options.clock
	});

	profileAccess.start();
	globalAccess.start();
	log.info('Settings Layer Started', { origin });

	return {
		profiles: new ProfileConfigService(profileAccess, bus),
		global: new GlobalConfigService(globalAccess),
		bus,
		connections,
		async stop(): Promise<void> {
			profileAccess.stop();
			globalAccess.stop();
			await connections.close();
			log.info('Settings Layer Stopped');
		}
	};
}
