import { Injectable } from '@nestjs/common';
import { parseBooleanEnv } from '../../config/config-factory';
import { RedisEnv } from './redis.env';
import { parseSentinelHosts, SentinelAddress } from './redis-url';

@Injectable()
export class RedisConfigService {
	public readonly url: string;
	public readonly sentinels: SentinelAddress[];
	public readonly decodeResponses: boolean;

	constructor(env: RedisEnv) {
		this.url = env.REDIS_URL ?? 'redis://localhost:6379/0';
		this.sentinels = parseSentinelHosts(env.REDIS_SENTINEL_HOSTS, env.REDIS_SENTINEL_PORT ?? 26379);
		this.decodeResponses = parseBooleanEnv(env.REDIS_DECODE_RESPONSES, true);
	}
}
