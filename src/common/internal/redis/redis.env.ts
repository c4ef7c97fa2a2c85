import { IsBooleanString, IsInt, IsOptional, IsString, Max, Min, MinLength } from 'class-validator';

export class RedisEnv {
	@IsOptional()
	@IsString()
	@MinLength(1)
	/**Direct Redis URL, or the locator URL when sentinels are configured*/
	readonly REDIS_URL?: string;

	@IsOptional()
	@IsString()
	/**Comma-separated sentinel hosts*/
	readonly REDIS_SENTINEL_HOSTS?: string;

	@IsOptional()
	@IsInt()
	@Min(1)
	@Max(65535)
	readonly REDIS_SENTINEL_PORT?: number;

	@IsOptional()
	@IsBooleanString()
	readonly REDIS_DECODE_RESPONSES?: string;
}
