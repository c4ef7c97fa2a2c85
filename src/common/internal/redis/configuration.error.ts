/**
 * Raised when a Redis URL cannot be used to build a connection. Never retried.
 */
export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'ConfigurationError';
	}
}
