import Redis, { Result } from 'ioredis';
import { HashStore } from '../../redis-dict/redis-dict.interface';
import { LockStore } from '../../distributed-lock/lock/lock.interface';
import { parseSentinelUrl, SentinelAddress } from './redis-url';
import { StoreValue } from './store-value';

declare module 'ioredis' {
	interface RedisCommander<Context> {
		renewLock(key: string, value: string, ttlSeconds: number): Result<number, Context>;
		releaseLock(key: string, value: string): Result<number, Context>;
	}
}

export interface RedisStoreOptions {
	/**
	 * Return values as strings instead of Buffers.
	 *
	 * @default true
	 */
	decodeResponses?: boolean;

	/**
	 * Defer connecting until `connect()` is called on the client.
	 *
	 * @default false
	 */
	lazyConnect?: boolean;
}

/**
 * Creates a client for a direct Redis URL, or for the master currently elected by the given sentinels.
 */
export function createRedisClient(redisUrl: string, sentinels: readonly SentinelAddress[] = [], options: RedisStoreOptions = {}): Redis {
	const lazyConnect = options.lazyConnect ?? false;
	// direct urls go to ioredis as they are, it also takes unix socket paths and bare host:port
	if (sentinels.length === 0) {
		return new Redis(redisUrl, { lazyConnect });
	}
	const sentinelConfig = parseSentinelUrl(redisUrl);
	return new Redis({
		sentinels: sentinels.map(({ host, port }) => ({ host, port })),
		name: sentinelConfig.service,
		db: sentinelConfig.db,
		username: sentinelConfig.username,
		password: sentinelConfig.password,
		lazyConnect,
	});
}

export function resolveRedisStore(redisUrl: string, sentinels: readonly SentinelAddress[] = [], options: RedisStoreOptions = {}): RedisStore {
	return new RedisStore(createRedisClient(redisUrl, sentinels, options), options.decodeResponses ?? true);
}

export class RedisStore implements LockStore, HashStore {
	constructor(
		protected readonly client: Redis,
		public readonly decodeResponses: boolean,
	) {
		this.defineLuaCommands();
	}

	private defineLuaCommands(): void {
		this.client.defineCommand('renewLock', {
			numberOfKeys: 1,
			lua: `
                if redis.call("get", KEYS[1]) == ARGV[1] then
                    return redis.call("expire", KEYS[1], ARGV[2])
                else
                    return 0
                end
            `,
		});
		this.client.defineCommand('releaseLock', {
			numberOfKeys: 1,
			lua: `
                if redis.call("get", KEYS[1]) == ARGV[1] then
                    return redis.call("del", KEYS[1])
                else
                    return 0
                end
            `,
		});
	}

	async acquire(key: string, value: string, ttlSeconds: number): Promise<boolean> {
		const result = await this.client.set(key, value, 'EX', ttlSeconds, 'NX');
		return result === 'OK';
	}

	async renew(key: string, value: string, ttlSeconds: number): Promise<boolean> {
		const res = await this.client.renewLock(key, value, ttlSeconds);
		return res === 1;
	}

	async release(key: string, value: string): Promise<boolean> {
		const res = await this.client.releaseLock(key, value);
		return res === 1;
	}

	async get(key: string): Promise<StoreValue | null> {
		return this.decodeResponses ? this.client.get(key) : this.client.getBuffer(key);
	}

	async delete(key: string): Promise<boolean> {
		const res = await this.client.del(key);
		return res === 1;
	}

	async hset(key: string, field: string, value: string): Promise<void> {
		await this.client.hset(key, field, value);
	}

	async hget(key: string, field: string): Promise<StoreValue | null> {
		return this.decodeResponses ? this.client.hget(key, field) : this.client.hgetBuffer(key, field);
	}

	async hdel(key: string, field: string): Promise<number> {
		return this.client.hdel(key, field);
	}

	async hexists(key: string, field: string): Promise<boolean> {
		const res = await this.client.hexists(key, field);
		return res === 1;
	}

	async hlen(key: string): Promise<number> {
		return this.client.hlen(key);
	}

	// field names are always text, whatever decodeResponses says
	async hkeys(key: string): Promise<string[]> {
		return this.client.hkeys(key);
	}

	async hvals(key: string): Promise<StoreValue[]> {
		return this.decodeResponses ? this.client.hvals(key) : this.client.hvalsBuffer(key);
	}

	async hgetall(key: string): Promise<Record<string, StoreValue>> {
		return this.decodeResponses ? this.client.hgetall(key) : this.client.hgetallBuffer(key);
	}

	async quit(): Promise<void> {
		await this.client.quit();
	}
}
