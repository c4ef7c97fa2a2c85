import { Module } from '@nestjs/common';
import { DistributedLockService } from './distributed-lock.service';
import { createEnvProvider } from '../config/config-factory';
import { DistributedLockConfigService } from './distributed-lock-config.service';
import { DistributedLockEnv } from './distributed-lock.env';
import { LockStore } from './lock/lock.interface';
import { RedisService } from '../internal/redis/redis.service';
import { RedisModule } from '../internal/redis/redis.module';

@Module({
	imports: [RedisModule],
	providers: [
		DistributedLockService,
		createEnvProvider(DistributedLockEnv),
		DistributedLockConfigService,
		{
			provide: LockStore,
			useExisting: RedisService,
		},
	],
	exports: [DistributedLockService],
})
export class DistributedLockModule {}
