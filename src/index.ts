import 'reflect-metadata';

export { ConfigurationError } from './common/internal/redis/configuration.error';
export { parseSentinelHosts, parseSentinelUrl, SentinelAddress, SentinelUrlConfig } from './common/internal/redis/redis-url';
export { createRedisClient, RedisStore, RedisStoreOptions, resolveRedisStore } from './common/internal/redis/redis-store';
export { StoreValue } from './common/internal/redis/store-value';
export { RedisModule } from './common/internal/redis/redis.module';
export { RedisService } from './common/internal/redis/redis.service';

export { LockStore } from './common/distributed-lock/lock/lock.interface';
export { RedisLock, RedisLockOptions } from './common/distributed-lock/lock/redis-lock';
export { Lock } from './common/distributed-lock/lock/lock';
export { CreateLockOptions, DistributedLockOptions, DistributedLockService } from './common/distributed-lock/distributed-lock.service';
export { DistributedLockModule } from './common/distributed-lock/distributed-lock.module';

export { HashStore, JsonValue, PersistentMapping, UpdateSource } from './common/redis-dict/redis-dict.interface';
export { RedisDict } from './common/redis-dict/redis-dict';
export { DecodeError, KeyNotFoundError } from './common/redis-dict/redis-dict.errors';
export { RedisDictService } from './common/redis-dict/redis-dict.service';
export { RedisDictModule } from './common/redis-dict/redis-dict.module';
