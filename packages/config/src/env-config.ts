import type { ConfigProvider } from './types';
import { MissingConfigError } from './errors';

/**
 * Configuration provider that reads from environment variables.
 *
 * Reads `process.env` on every call, so values set after construction
 * (tests, late dotenv loading) are seen.
 *
 * @example
 * ```ts
 * const config = new EnvConfigProvider();
 * const connectionString = await config.getRequired('DB_CONNECTION_STRING');
 * ```
 */
export class EnvConfigProvider implements ConfigProvider {
	public constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

	async get(key: string): Promise<string | undefined> {
		return this.env[key];
	}

	/**
	 * @throws MissingConfigError if the variable is not set or empty
	 */
	async getRequired(key: string): Promise<string> {
		const value = this.env[key];
		if (value === undefined || value === '') {
			throw new MissingConfigError([key]);
		}
		return value;
	}

	async loadKeys(keys: string[]): Promise<Record<string, string | undefined>> {
		const result: Record<string, string | undefined> = {};
		for (const key of keys) {
			result[key] = this.env[key];
		}
		return result;
	}
}

/**
 * Provider backed by a fixed record of values. Useful for tests and for
 * embedding defaults under an environment provider.
 */
export class StaticConfigProvider implements ConfigProvider {
	public constructor(private readonly values: Readonly<Record<string, string | undefined>>) {}

	async get(key: string): Promise<string | undefined> {
		return this.values[key];
	}

	async getRequired(key: string): Promise<string> {
		const value = this.values[key];
		if (value === undefined || value === '') {
			throw new MissingConfigError([key]);
		}
		return value;
	}

	async loadKeys(keys: string[]): Promise<Record<string, string | undefined>> {
		const result: Record<string, string | undefined> = {};
		for (const key of keys) {
			result[key] = this.values[key];
		}
		return result;
	}
}
