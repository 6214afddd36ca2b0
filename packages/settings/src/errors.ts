/**
 * A settings value was rejected before anything was written.
 */
export class InvalidSettingError extends Error {
	public override readonly name = 'InvalidSettingError';

	public constructor(
		public readonly setting: string,
		message: string
	) {
		super(message);

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, InvalidSettingError);
		}
	}
}
