import { IsBooleanString, IsNumber, IsOptional, Min } from 'class-validator';

export class DistributedLockEnv {
	@IsOptional()
	@IsNumber()
	@Min(1)
	readonly LOCK_EXPIRATION_TIME_IN_SECONDS?: number;

	@IsOptional()
	@IsBooleanString()
	readonly LOCK_ATOMIC_RELEASE?: string;
}
