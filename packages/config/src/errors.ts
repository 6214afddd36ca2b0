/**
 * Raised when one or more required configuration keys are absent or empty.
 */
export class MissingConfigError extends Error {
	public override readonly name = 'MissingConfigError';

	public constructor(public readonly keys: readonly string[]) {
		super(
			keys.length === 1
				? `Required config '${keys[0]}' is not set. Add it to your .env file or environment.`
				: `Missing required config keys: ${keys.join(', ')}`
		);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, MissingConfigError);
		}
	}
}
