import { FactoryProvider } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { validateSync } from 'class-validator';

export function validateEnv<E extends object>(envClass: ClassConstructor<E>, env: NodeJS.ProcessEnv = process.env): E {
	const validatedEnv = plainToInstance(envClass, env, { enableImplicitConversion: true });
	const errors = validateSync(validatedEnv, { skipMissingProperties: false });

	if (errors.length > 0) {
		throw new Error(errors.toString());
	}
	return validatedEnv;
}

/**
 * Provides an instance of the env class, populated from `process.env` and validated when the module is created.
 */
export function createEnvProvider<E extends object>(envClass: ClassConstructor<E>): FactoryProvider<E> {
	return {
		provide: envClass,
		useFactory: () => validateEnv(envClass),
	};
}

export function parseBooleanEnv(value: string | undefined, defaultValue: boolean): boolean {
	if (value === undefined) {
		return defaultValue;
	}
	return value === 'true' || value === '1';
}
