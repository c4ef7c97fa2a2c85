import { resolveRedisStore, RedisStoreOptions } from '../internal/redis/redis-store';
import { SentinelAddress } from '../internal/redis/redis-url';
import { StoreValue } from '../internal/redis/store-value';
import { DecodeError, KeyNotFoundError } from './redis-dict.errors';
import { HashStore, JsonValue, PersistentMapping, UpdateSource } from './redis-dict.interface';

function isEntryIterable<T>(source: UpdateSource<T>): source is Iterable<readonly [string, T]> {
	return Symbol.iterator in source;
}

/**
 * JSON values kept in the Redis hash `name`, one field per key. Nothing is cached locally.
 */
export class RedisDict<T extends JsonValue = JsonValue> extends PersistentMapping<T> {
	private ownedStore: HashStore | null = null;

	constructor(
		private readonly hashStore: HashStore,
		public readonly name: string,
	) {
		super();
	}

	/**
	 * Creates a dict with its own connection, closed by `close()`.
	 */
	static fromUrl<T extends JsonValue = JsonValue>(
		name: string,
		redisUrl: string,
		sentinels: readonly SentinelAddress[] = [],
		options: Pick<RedisStoreOptions, 'decodeResponses'> = {},
	): RedisDict<T> {
		const store = resolveRedisStore(redisUrl, sentinels, { decodeResponses: options.decodeResponses ?? true });
		const dict = new RedisDict<T>(store, name);
		dict.ownedStore = store;
		return dict;
	}

	async set(key: string, value: T): Promise<void> {
		await this.hashStore.hset(this.name, key, JSON.stringify(value));
	}

	get(key: string): Promise<T>;
	get<D>(key: string, defaultValue: D): Promise<T | D>;
	async get<D>(key: string, ...defaultValue: [] | [D]): Promise<T | D> {
		const value = await this.hashStore.hget(this.name, key);
		if (value !== null) {
			return this.decode(value, key);
		}
		if (defaultValue.length === 0) {
			throw new KeyNotFoundError(key);
		}
		return defaultValue[0];
	}

	async delete(key: string): Promise<void> {
		const removed = await this.hashStore.hdel(this.name, key);
		if (removed === 0) {
			throw new KeyNotFoundError(key);
		}
	}

	contains(key: string): Promise<boolean> {
		return this.hashStore.hexists(this.name, key);
	}

	size(): Promise<number> {
		return this.hashStore.hlen(this.name);
	}

	keys(): Promise<string[]> {
		return this.hashStore.hkeys(this.name);
	}

	async values(): Promise<T[]> {
		const values = await this.hashStore.hvals(this.name);
		return values.map((value) => this.decode(value));
	}

	async items(): Promise<Array<[string, T]>> {
		const entries = await this.hashStore.hgetall(this.name);
		return Object.entries(entries).map(([key, value]): [string, T] => [key, this.decode(value, key)]);
	}

	/**
	 * Not atomic: a concurrent writer can land between the existence check and the write.
	 */
	async setDefault(key: string, defaultValue: T): Promise<T> {
		if (!(await this.contains(key))) {
			await this.set(key, defaultValue);
		}
		return this.get(key);
	}

	/**
	 * Writes each entry in turn. Entries written before a failure stay written.
	 */
	async update(source: UpdateSource<T>): Promise<void> {
		const entries = source instanceof PersistentMapping ? await source.items() : isEntryIterable(source) ? source : Object.entries(source);
		for (const [key, value] of entries) {
			await this.set(key, value);
		}
	}

	async clear(): Promise<void> {
		await this.hashStore.delete(this.name);
	}

	async close(): Promise<void> {
		if (this.ownedStore) {
			await this.ownedStore.quit();
			this.ownedStore = null;
		}
	}

	private decode(value: StoreValue, key?: string): T {
		try {
			return JSON.parse(value.toString());
		} catch (error) {
			throw new DecodeError(this.name, key, error);
		}
	}
}
