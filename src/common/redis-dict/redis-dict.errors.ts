export class KeyNotFoundError extends Error {
	constructor(public readonly key: string) {
		super(`Key "${key}" not found`);
		this.name = 'KeyNotFoundError';
	}
}

/**
 * A stored value could not be parsed as JSON. Only written by something other than `RedisDict`.
 */
export class DecodeError extends Error {
	constructor(
		public readonly dictName: string,
		/** Unset when the value was read without its field name */
		public readonly key: string | undefined,
		cause: unknown,
	) {
		super(key === undefined ? `A value in "${dictName}" is not valid JSON` : `Value of "${key}" in "${dictName}" is not valid JSON`, { cause });
		this.name = 'DecodeError';
	}
}
