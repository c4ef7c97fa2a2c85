import { Module } from '@nestjs/common';
import { RedisModule } from '../internal/redis/redis.module';
import { RedisService } from '../internal/redis/redis.service';
import { HashStore } from './redis-dict.interface';
import { RedisDictService } from './redis-dict.service';

@Module({
	imports: [RedisModule],
	providers: [
		RedisDictService,
		{
			provide: HashStore,
			useExisting: RedisService,
		},
	],
	exports: [RedisDictService],
})
export class RedisDictModule {}
