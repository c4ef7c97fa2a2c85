import { Module } from '@nestjs/common';
import { createEnvProvider } from '../../config/config-factory';
import { RedisConfigService } from './redis-config.service';
import { RedisEnv } from './redis.env';
import { RedisService } from './redis.service';

@Module({
	providers: [createEnvProvider(RedisEnv), RedisConfigService, RedisService],
	exports: [RedisService],
})
export class RedisModule {}
