/**
 * Configuration provider interface.
 *
 * Implementations can be swapped per environment: EnvConfigProvider reads
 * the process environment; tests pass a plain object-backed provider.
 *
 * @example
 * ```ts
 * const config = new EnvConfigProvider();
 * const connectionString = await config.getRequired('DB_CONNECTION_STRING');
 * ```
 */
export interface ConfigProvider {
	/**
	 * Gets a configuration value by key.
	 * @returns The value, or undefined if not found
	 */
	get(key: string): Promise<string | undefined>;

	/**
	 * Gets a required configuration value.
	 * @throws MissingConfigError if the value is not found or empty
	 */
	getRequired(key: string): Promise<string>;

	/**
	 * Loads multiple configuration values at once.
	 */
	loadKeys(keys: string[]): Promise<Record<string, string | undefined>>;
}
