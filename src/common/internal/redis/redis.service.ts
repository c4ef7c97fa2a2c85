import { Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { RedisConfigService } from './redis-config.service';
import { createRedisClient, RedisStore } from './redis-store';

/**
 * Store shared by every lock and dict created through the Nest services.
 */
@Injectable()
export class RedisService extends RedisStore implements OnModuleInit, OnModuleDestroy {
	private readonly logger = new Logger(RedisService.name);

	constructor(private readonly redisConfigService: RedisConfigService) {
		super(createRedisClient(redisConfigService.url, redisConfigService.sentinels, { lazyConnect: true }), redisConfigService.decodeResponses);
	}

	async onModuleInit() {
		this.client.on('error', (error: Error) => {
			this.logger.warn(`Redis error: ${error.message}`);
		});
		await this.client.connect();
		const sentinelCount = this.redisConfigService.sentinels.length;
		this.logger.log(sentinelCount > 0 ? `Connected to Redis master through ${sentinelCount} sentinel(s)` : 'Connected to Redis');
	}

	async onModuleDestroy() {
		await this.quit();
		this.logger.log('Redis connection closed');
	}
}
