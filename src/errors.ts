/**
 * Raised when a separator policy (or the configuration it was read from) is invalid
 */
export class ConfigurationError extends Error {
	override readonly name = 'ConfigurationError';

	/**
	 * @param field - Name of the policy field or configuration source at fault
	 * @param message - Human-readable description of the problem
	 */
	constructor(readonly field: string, message: string, options?: ErrorOptions) {
		super(`Invalid ${field}: ${message}`, options);
	}
}
