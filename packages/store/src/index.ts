/**
 * Tonearm Store
 *
 * Resilient access to the settings database: a connection manager with
 * retries and a shared circuit breaker, and repositories on top of it.
 *
 * @example
 * const settings = await readStoreSettings(new EnvConfigProvider());
 * const breaker = new CircuitBreakerState();
 * const connections = new ConnectionManager({ connector: new PgConnector(settings), breaker });
 * const profiles = new PgProfileConfigRepository(connections);
 *
 * const result = await profiles.fetchByKey(1);
 *
 * @module @tonearm/store
 */

export {
	StoreError,
	ConfigurationError,
	TransientConnectivityError,
	RetriesExhaustedError,
	CircuitOpenError,
	NotFoundError,
	WriteConflictError,
	RecordFormatError
} from './errors';

export { REAL_CLOCK, type Clock } from './clock';

export {
	CircuitBreakerState,
	DEFAULT_FAILURE_THRESHOLD,
	DEFAULT_COOL_DOWN_MS,
	type CircuitPhase,
	type ConnectionState,
	type Admission,
	type CircuitBreakerOptions
} from './circuit-breaker';

export { RetryPolicy, defaultSleep, type RetryPolicyOptions, type Sleep } from './retry-policy';

export type { Connector } from './connector';

export { ConnectionManager, type ConnectionManagerOptions, type OpenOptions } from './connection-manager';

export type { SqlHandle, SqlResult, SqlExecutor } from './sql-handle';

export { PgConnector, PgHandle, type PgClient, type PgPool, type PgConnectorOptions } from './pg-connector';

export { readStoreSettings, StoreSettingsSchema, STORE_CONFIG_KEYS, type StoreSettings } from './settings';

export {
	EPHEMERAL_RECORD_ID,
	DEFAULT_VIEW_STATE,
	DEFAULT_SORTING_STATE,
	defaultProfileConfig,
	defaultGlobalConfig,
	type ProfileConfig,
	type GlobalConfig
} from './records';

export { found, notFound, type FetchResult, type Repository } from './repository';

export { PgProfileConfigRepository } from './pg-profile-config-repository';

export {
	PgGlobalConfigRepository,
	GLOBAL_CONFIG_KEY,
	GLOBAL_CONFIG_ROW_ID,
	type GlobalConfigKey
} from './pg-global-config-repository';
