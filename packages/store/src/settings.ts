import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import type { ConfigProvider } from '@tonearm/config';
import { ConfigurationError } from './errors';

export const STORE_CONFIG_KEYS = {
	connectionString: 'DB_CONNECTION_STRING',
	poolMax: 'DB_POOL_MAX',
	connectTimeoutMs: 'DB_CONNECT_TIMEOUT_MS'
} as const;

export const StoreSettingsSchema = Type.Object({
	connectionString: Type.String({ minLength: 1 }),
	poolMax: Type.Integer({ minimum: 1, maximum: 100 }),
	connectTimeoutMs: Type.Integer({ minimum: 100, maximum: 60_000 })
});

export type StoreSettings = Static<typeof StoreSettingsSchema>;

const DEFAULT_POOL_MAX = 10;
const DEFAULT_CONNECT_TIMEOUT_MS = 5000;

/**
 * Read and validate connection settings.
 *
 * @throws ConfigurationError when DB_CONNECTION_STRING is missing or a value is invalid
 */
export async function readStoreSettings(provider: ConfigProvider): Promise<StoreSettings> {
	const values = await provider.loadKeys(Object.values(STORE_CONFIG_KEYS));

	const connectionString = values[STORE_CONFIG_KEYS.connectionString];
	if (connectionString === undefined || connectionString === '') {
		throw new ConfigurationError(
			`Required config '${STORE_CONFIG_KEYS.connectionString}' is not set. Add it to your .env file or environment.`,
			[STORE_CONFIG_KEYS.connectionString]
		);
	}

	const candidate = {
		connectionString,
		poolMax: toNumber(values[STORE_CONFIG_KEYS.poolMax], DEFAULT_POOL_MAX),
		connectTimeoutMs: toNumber(values[STORE_CONFIG_KEYS.connectTimeoutMs], DEFAULT_CONNECT_TIMEOUT_MS)
	};

	if (Value.Check(StoreSettingsSchema, candidate)) {
		return candidate;
	}

	const invalid = new Set<string>();
	for (const error of Value.Errors(StoreSettingsSchema, candidate)) {
		const field = error.path.replace(/^\//, '');
		invalid.add(isSettingsField(field) ? STORE_CONFIG_KEYS[field] : field);
	}
	const keys = [...invalid];
	throw new ConfigurationError(`Invalid store config: ${keys.join(', ')}`, keys);
}

function toNumber(value: string | undefined, fallback: number): number {
	return value === undefined || value.trim() === '' ? fallback : Number(value);
}

function isSettingsField(field: string): field is keyof typeof STORE_CONFIG_KEYS {
	return Object.hasOwn(STORE_CONFIG_KEYS, field);
}
